import { findEmptyRowIndices, isEmptyColumn } from '../diagnostics/checks.js';
import type { TabularDataset } from '../table/types.js';

export interface CleanSummary {
  droppedRows: number;
  droppedColumns: string[];
}

/**
 * Drops fully-missing rows and fully-missing columns. Both sets are decided
 * on the input table, so removing one never changes which of the other goes.
 */
export function cleanDataset(dataset: TabularDataset): TabularDataset {
  return cleanDatasetWithSummary(dataset).dataset;
}

export function cleanDatasetWithSummary(dataset: TabularDataset): {
  dataset: TabularDataset;
  summary: CleanSummary;
} {
  const emptyRows = new Set(findEmptyRowIndices(dataset));
  const keptColumns = dataset.columns.filter((column) => !isEmptyColumn(column));
  const droppedColumns = dataset.columns
    .filter((column) => isEmptyColumn(column))
    .map((column) => column.name);

  const columns = keptColumns.map((column) => ({
    name: column.name,
    cells: column.cells.filter((_, rowIndex) => !emptyRows.has(rowIndex))
  }));

  return {
    dataset: {
      columns,
      rowCount: dataset.rowCount - emptyRows.size
    },
    summary: {
      droppedRows: emptyRows.size,
      droppedColumns
    }
  };
}
