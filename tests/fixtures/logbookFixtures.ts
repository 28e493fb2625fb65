import type { FlightDurations, FlightRecord } from '../../packages/utils/src/types';

export const STANDARD_HEADERS = [
  'Date',
  'From',
  'To',
  'Registration',
  'Aircraft Type',
  'Total Time',
  'PIC',
  'SIC',
  'Night',
  'Cross Country',
  'Actual Instrument',
  'Simulated Instrument',
  'Dual Received',
  'Solo',
  'Day Landings',
  'Night Landings',
  'Instructor',
  'Remarks',
  'Distance'
];

/**
 * Seven data rows (source lines 2-8):
 *   2 dual lesson, 3 solo cross-country, 4 night PIC, 5 airline SIC,
 *   6 full flight simulator, 7 safety pilot, 8 impossible date.
 */
export const SAMPLE_ROWS: string[][] = [
  ['15/01/2024', 'LLHZ', 'LLHZ', '4X-ABC', 'C172', '1.5', '0', '0', '0', '0', '0', '0.5', '1.5', '0', '3', '0', 'Dan Levi', 'Pattern work', ''],
  ['02/03/2024', 'LLHZ', 'LLIB', '4X-ABC', 'C172', '2.0', '2.0', '0', '0', '2.0', '0', '0', '0', '2.0', '1', '0', '', 'Solo cross country', '62'],
  ['10/04/2024', 'LLHZ', 'LLHA', '4X-DEF', 'PA28', '2.0', '2.0', '0', '1.0', '0', '0', '0', '0', '0', '0', '2', '', 'Night flight', '45'],
  ['05/05/2024', 'LLBG', 'LCLK', '4X-GHI', 'A320', '3.0', '0', '3.0', '0', '3.0', '1.0', '0', '0', '0', '1', '0', '', 'Line flight', '180'],
  ['12/05/2024', 'LLBG', 'LLBG', 'CAE', 'A320 FFS', '4.0', '0', '0', '0', '0', '0', '0', '0', '0', '0', '0', '', 'Type rating', ''],
  ['20/06/2024', 'LLHZ', 'LLHZ', '4X-ABC', 'C172', '1.0', '1.0', '0', '0', '0', '0', '0', '0', '0', '1', '0', '', 'Safety pilot for J. Cohen', ''],
  ['31/02/2024', 'LLHZ', 'LLHZ', '4X-ABC', 'C172', '1.0', '1.0', '0', '0', '0', '0', '0', '0', '0', '1', '0', '', '', '']
];

export const SAMPLE_CSV = [STANDARD_HEADERS, ...SAMPLE_ROWS].map(row => row.join(',')).join('\n') + '\n';

const ZERO_DURATIONS: FlightDurations = {
  TotalTime: 0,
  PIC: 0,
  SIC: 0,
  Night: 0,
  CrossCountry: 0,
  ActualInstrument: 0,
  SimulatedInstrument: 0,
  DualReceived: 0,
  DualGiven: 0,
  Solo: 0,
  MultiPilot: 0,
  Simulator: 0
};

export type RecordOverrides = Partial<Omit<FlightRecord, 'durations'>> & {
  durations?: Partial<FlightDurations>;
};

/** A one-hour local C172 flight with nothing else logged, plus overrides. */
export function makeRecord(overrides: RecordOverrides = {}): FlightRecord {
  const { durations, ...fields } = overrides;
  return {
    row_number: 2,
    date: '2024-01-15',
    from: 'LLHZ',
    to: 'LLHZ',
    registration: '4X-ABC',
    aircraft_type: 'C172',
    engine_type: '',
    aircraft_class: '',
    day_landings: 1,
    night_landings: 0,
    instructor: '',
    remarks: '',
    distance_nm: null,
    ...fields,
    durations: { ...ZERO_DURATIONS, TotalTime: 1, ...durations }
  };
}
