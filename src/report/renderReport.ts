import type { DiagnosticReport, KindHistogram } from '../diagnostics/types.js';
import { VALUE_KINDS } from '../table/types.js';

const REPORT_TITLE = '=== Data Diagnostics ===';
const NONE = 'None';

function listOrNone(values: string[]): string {
  return values.length === 0 ? NONE : values.join(', ');
}

function formatHistogram(histogram: KindHistogram): string {
  return VALUE_KINDS.flatMap((kind) => {
    const count = histogram[kind];
    return count === undefined ? [] : [`${kind}: ${count}`];
  }).join(', ');
}

export function renderReport(report: DiagnosticReport): string[] {
  const lines = [
    REPORT_TITLE,
    `Shape: (${report.row_count}, ${report.column_count})`,
    `Columns: ${listOrNone(report.column_names)}`
  ];

  if (report.empty_columns !== undefined) {
    lines.push(`Empty columns: ${listOrNone(report.empty_columns)}`);
  }

  if (report.empty_row_count !== undefined) {
    lines.push(`Empty rows: ${report.empty_row_count}`);
  }

  if (report.mixed_type_columns !== undefined) {
    const entries = Object.entries(report.mixed_type_columns).map(
      ([name, histogram]) => `${name} (${formatHistogram(histogram)})`
    );
    lines.push(`Mixed-type columns: ${entries.length === 0 ? NONE : entries.join('; ')}`);
  }

  if (report.headers_missing_suspected !== undefined) {
    lines.push(
      report.headers_missing_suspected ? 'Potential missing headers detected.' : 'Headers appear present.'
    );
  }

  return lines;
}

export function formatReportJson(report: DiagnosticReport): string {
  return JSON.stringify(report, null, 2);
}
