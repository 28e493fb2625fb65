export * from './airportDistance';
