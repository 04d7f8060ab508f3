import { log } from '../lib/log.js';
import { cellText } from './cells.js';
import { MISSING, type Cell, type Column, type TabularDataset } from './types.js';

export type HeaderMode = 'auto' | 'present' | 'absent';

const PLACEHOLDER_COLUMN_PREFIX = 'Column_';
export const PLACEHOLDER_COLUMN_PATTERN = /^Column_\d+$/;

export function placeholderColumnName(index: number): string {
  return `${PLACEHOLDER_COLUMN_PREFIX}${index}`;
}

/**
 * `auto` treats the first row as data as soon as one of its cells reads as
 * a number or a boolean; header rows are text.
 */
export function firstRowIsHeader(firstRow: Cell[], mode: HeaderMode): boolean {
  if (mode !== 'auto') {
    return mode === 'present';
  }
  return !firstRow.some(
    (cell) => cell.kind === 'integer' || cell.kind === 'float' || cell.kind === 'boolean'
  );
}

export function dedupeColumnNames(names: string[]): string[] {
  const used = new Set<string>();
  const counters = new Map<string, number>();

  return names.map((name) => {
    if (!used.has(name)) {
      used.add(name);
      return name;
    }
    let suffix = counters.get(name) ?? 1;
    let candidate = `${name}.${suffix}`;
    while (used.has(candidate)) {
      suffix += 1;
      candidate = `${name}.${suffix}`;
    }
    counters.set(name, suffix + 1);
    used.add(candidate);
    return candidate;
  });
}

function headerNames(headerRow: Cell[], width: number): string[] {
  const names: string[] = [];
  for (let index = 0; index < width; index += 1) {
    const text = cellText(headerRow[index] ?? MISSING);
    names.push(text === null ? placeholderColumnName(index) : text);
  }
  return dedupeColumnNames(names);
}

export function buildTable(rows: Cell[][], options: { header?: HeaderMode } = {}): TabularDataset {
  const firstRow = rows[0];
  if (!firstRow) {
    return { columns: [], rowCount: 0 };
  }

  const hasHeader = firstRowIsHeader(firstRow, options.header ?? 'auto');
  const dataRows = hasHeader ? rows.slice(1) : rows;
  const widest = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const width = hasHeader ? firstRow.length : widest;
  if (widest > width) {
    const overlong = dataRows.filter((row) => row.length > width).length;
    log.warn(`truncated ${overlong} row(s) longer than the ${width}-column header`);
  }
  const names = hasHeader
    ? headerNames(firstRow, width)
    : Array.from({ length: width }, (_, index) => placeholderColumnName(index));

  const columns: Column[] = names.map((name, columnIndex) => ({
    name,
    cells: dataRows.map((row) => row[columnIndex] ?? MISSING)
  }));

  return { columns, rowCount: dataRows.length };
}
