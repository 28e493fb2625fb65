/**
 * Logbook Conversion - Form Insights
 *
 * Short readable notes on a finalized form: how the half-credit total is
 * made up and what was left out of it.
 */

import { FormInsight, FormSummary, FormValues } from '../types';

function hrs(value: number): string {
  return value.toFixed(1);
}

export function summarizeForm(values: FormValues): FormSummary {
  const insights: FormInsight[] = [];
  const { totals, report, table2 } = values;

  insights.push({
    id: 'half_credit_total',
    category: 'totals',
    severity: 'info',
    title: 'Regulation 42(b) Total',
    description: `PIC ${hrs(totals.pic)} + SIC ${hrs(totals.sic)}/2 + Student ${hrs(totals.student)} = ${hrs(totals.overall_total)} hrs`
  });

  if (totals.safety_pilot_excluded > 0) {
    insights.push({
      id: 'safety_pilot_excluded',
      category: 'exclusion',
      severity: 'info',
      title: 'Safety Pilot Time Excluded',
      description: `${hrs(totals.safety_pilot_excluded)} hrs logged as safety pilot on single-engine aircraft are not counted.`
    });
  }

  if (report.device_sessions > 0) {
    insights.push({
      id: 'device_time',
      category: 'totals',
      severity: 'info',
      title: 'Training Device Time',
      description: `${hrs(table2.device_total)} hrs in ${report.device_sessions} session(s), shown in Table 2 only.`
    });
  }

  if (report.unresolved_aircraft_types.length > 0) {
    const listed = report.unresolved_aircraft_types
      .map(t => `${t.aircraft_type} (${hrs(t.hours)} hrs)`)
      .join(', ');
    insights.push({
      id: 'unresolved_types',
      category: 'data_quality',
      severity: 'warning',
      title: 'Aircraft Types Without Group',
      description: `${report.unresolved_aircraft_types.length} type(s) missing from the group totals: ${listed}`,
      recommendation: 'Add Engine Type and Class columns to the logbook so these types can be grouped.'
    });
  }

  if (report.advisories.length > 0) {
    const rows = [...new Set(report.advisories.map(a => a.row_number))].sort((a, b) => a - b);
    insights.push({
      id: 'classification_advisories',
      category: 'data_quality',
      severity: 'warning',
      title: 'Classification Advisories',
      description: `${report.advisories.length} advisory note(s) on ${rows.length} flight(s).`,
      affected_rows: rows,
      recommendation: 'Review the listed rows in the source logbook.'
    });
  }

  return {
    insights,
    lines: insights.map(i => `${i.title}: ${i.description}`)
  };
}
