import { columnNames, type TabularDataset } from '../table/types.js';
import {
  countEmptyRows,
  detectMissingHeaders,
  findEmptyColumns,
  findMixedTypeColumns
} from './checks.js';
import { DEFAULT_DIAGNOSTICS_CONFIG, type DiagnosticReport, type DiagnosticsConfig } from './types.js';

export function diagnose(
  dataset: TabularDataset,
  config: DiagnosticsConfig = DEFAULT_DIAGNOSTICS_CONFIG
): DiagnosticReport {
  const report: DiagnosticReport = {
    row_count: dataset.rowCount,
    column_count: dataset.columns.length,
    column_names: columnNames(dataset)
  };

  if (config.empty_columns) {
    report.empty_columns = findEmptyColumns(dataset);
  }
  if (config.empty_rows) {
    report.empty_row_count = countEmptyRows(dataset);
  }
  if (config.mixed_types) {
    report.mixed_type_columns = findMixedTypeColumns(dataset);
  }
  if (config.missing_headers) {
    report.headers_missing_suspected = detectMissingHeaders(dataset);
  }

  return report;
}

export * from './checks.js';
export * from './types.js';
