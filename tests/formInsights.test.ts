/**
 * Form Insights Tests
 */

import { summarizeForm } from '../packages/utils/src/export/formInsights';
import { runLogbookPipeline } from '../packages/utils/src/solver/logbookPipeline';
import { readDelimitedLogbook } from '../packages/utils/src/parser/logbookReader';
import { classifyFlight } from '../packages/utils/src/solver/classificationEngine';
import { finalizeForm, foldFlights } from '../packages/utils/src/solver/formAggregator';
import { makeRecord, SAMPLE_CSV } from './fixtures/logbookFixtures';

describe('summarizeForm', () => {
  test('should explain the sample logbook totals', () => {
    const summary = summarizeForm(runLogbookPipeline(readDelimitedLogbook(SAMPLE_CSV)).form);

    expect(summary.insights.map(i => i.id)).toEqual(['half_credit_total', 'safety_pilot_excluded', 'device_time']);
    expect(summary.lines).toEqual([
      'Regulation 42(b) Total: PIC 4.0 + SIC 3.0/2 + Student 1.5 = 7.0 hrs',
      'Safety Pilot Time Excluded: 1.0 hrs logged as safety pilot on single-engine aircraft are not counted.',
      'Training Device Time: 4.0 hrs in 1 session(s), shown in Table 2 only.'
    ]);
  });

  test('should always state the half-credit total', () => {
    const summary = summarizeForm(finalizeForm(foldFlights([])));

    expect(summary.lines).toEqual(['Regulation 42(b) Total: PIC 0.0 + SIC 0.0/2 + Student 0.0 = 0.0 hrs']);
  });

  test('should warn about ungrouped types and advisories', () => {
    const form = finalizeForm(foldFlights([
      classifyFlight(makeRecord({ row_number: 4, aircraft_type: 'XYZ1', durations: { TotalTime: 1, PIC: 1 } })),
      classifyFlight(makeRecord({ row_number: 3, to: 'ZZZZ', durations: { TotalTime: 1, PIC: 1 } }))
    ]));
    const summary = summarizeForm(form);

    const unresolved = summary.insights.find(i => i.id === 'unresolved_types');
    expect(unresolved?.severity).toBe('warning');
    expect(unresolved?.description).toBe('1 type(s) missing from the group totals: XYZ1 (1.0 hrs)');

    const advisories = summary.insights.find(i => i.id === 'classification_advisories');
    expect(advisories?.description).toBe('1 advisory note(s) on 1 flight(s).');
    expect(advisories?.affected_rows).toEqual([3]);
  });
});
