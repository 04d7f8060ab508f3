export type ValueKind = 'integer' | 'float' | 'string' | 'boolean';

export const VALUE_KINDS: readonly ValueKind[] = ['integer', 'float', 'string', 'boolean'];

export type Cell =
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'missing' };

export interface Column {
  name: string;
  cells: Cell[];
}

/**
 * An in-memory table. `rowCount` is stored explicitly so a table without
 * columns still knows how many rows it had.
 */
export interface TabularDataset {
  columns: Column[];
  rowCount: number;
}

export const MISSING: Cell = Object.freeze({ kind: 'missing' });

export function isMissing(cell: Cell): boolean {
  return cell.kind === 'missing';
}

export function assertRectangular(dataset: TabularDataset): void {
  const ragged = dataset.columns.filter((column) => column.cells.length !== dataset.rowCount);
  if (ragged.length === 0) {
    return;
  }
  const details = ragged.map((column) => `${column.name}=${column.cells.length}`).join(', ');
  throw new Error(`Dataset is not rectangular: expected ${dataset.rowCount} cells per column (${details}).`);
}

export function columnNames(dataset: TabularDataset): string[] {
  return dataset.columns.map((column) => column.name);
}
