import type { ValueKind } from '../table/types.js';

export const CHECK_IDS = ['empty_columns', 'empty_rows', 'missing_headers', 'mixed_types'] as const;

export type CheckId = (typeof CHECK_IDS)[number];

export type DiagnosticsConfig = Readonly<Record<CheckId, boolean>>;

export const DEFAULT_DIAGNOSTICS_CONFIG: DiagnosticsConfig = Object.freeze({
  empty_columns: true,
  empty_rows: true,
  missing_headers: true,
  mixed_types: true
});

export type KindHistogram = Partial<Record<ValueKind, number>>;

/**
 * Result of one diagnostics run. A check that was switched off leaves its
 * key out entirely, so "not checked" and "nothing found" stay distinct.
 */
export interface DiagnosticReport {
  row_count: number;
  column_count: number;
  column_names: string[];
  empty_columns?: string[];
  empty_row_count?: number;
  mixed_type_columns?: Record<string, KindHistogram>;
  headers_missing_suspected?: boolean;
}

export function isCheckId(value: string): value is CheckId {
  return CHECK_IDS.some((id) => id === value);
}

export function resolveDiagnosticsConfig(partial: Partial<Record<CheckId, boolean>> = {}): DiagnosticsConfig {
  return Object.freeze({
    empty_columns: partial.empty_columns ?? true,
    empty_rows: partial.empty_rows ?? true,
    missing_headers: partial.missing_headers ?? true,
    mixed_types: partial.mixed_types ?? true
  });
}
