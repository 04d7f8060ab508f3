import { PLACEHOLDER_COLUMN_PATTERN } from '../table/buildTable.js';
import { VALUE_KINDS, isMissing, type Column, type TabularDataset, type ValueKind } from '../table/types.js';
import type { KindHistogram } from './types.js';

export function isEmptyColumn(column: Column): boolean {
  return column.cells.every(isMissing);
}

export function findEmptyColumns(dataset: TabularDataset): string[] {
  return dataset.columns.filter(isEmptyColumn).map((column) => column.name);
}

export function isEmptyRow(dataset: TabularDataset, rowIndex: number): boolean {
  if (dataset.columns.length === 0) {
    return false;
  }
  return dataset.columns.every((column) => {
    const cell = column.cells[rowIndex];
    return cell === undefined || isMissing(cell);
  });
}

export function findEmptyRowIndices(dataset: TabularDataset): number[] {
  const indices: number[] = [];
  for (let rowIndex = 0; rowIndex < dataset.rowCount; rowIndex += 1) {
    if (isEmptyRow(dataset, rowIndex)) {
      indices.push(rowIndex);
    }
  }
  return indices;
}

export function countEmptyRows(dataset: TabularDataset): number {
  return findEmptyRowIndices(dataset).length;
}

export function kindHistogram(column: Column): KindHistogram {
  const counts = new Map<ValueKind, number>();
  for (const cell of column.cells) {
    if (cell.kind === 'missing') {
      continue;
    }
    counts.set(cell.kind, (counts.get(cell.kind) ?? 0) + 1);
  }

  const histogram: KindHistogram = {};
  for (const kind of VALUE_KINDS) {
    const count = counts.get(kind);
    if (count !== undefined) {
      histogram[kind] = count;
    }
  }
  return histogram;
}

export function findMixedTypeColumns(dataset: TabularDataset): Record<string, KindHistogram> {
  const mixed: Record<string, KindHistogram> = {};
  for (const column of dataset.columns) {
    const histogram = kindHistogram(column);
    if (Object.keys(histogram).length > 1) {
      mixed[column.name] = histogram;
    }
  }
  return mixed;
}

export function isPlaceholderColumnName(name: string): boolean {
  return PLACEHOLDER_COLUMN_PATTERN.test(name);
}

export function detectMissingHeaders(dataset: TabularDataset): boolean {
  return dataset.columns.some((column) => isPlaceholderColumnName(column.name));
}
