import { numberCell } from '../table/cells.js';
import { MISSING, type Cell, type TabularDataset } from '../table/types.js';

export type PlainValue = string | number | boolean | null;

export function toCell(value: PlainValue): Cell {
  if (value === null) {
    return MISSING;
  }
  if (typeof value === 'number') {
    return numberCell(value);
  }
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  return { kind: 'string', value };
}

export function datasetFromRows(names: string[], rows: PlainValue[][]): TabularDataset {
  return {
    columns: names.map((name, columnIndex) => ({
      name,
      cells: rows.map((row) => toCell(row[columnIndex] ?? null))
    })),
    rowCount: rows.length
  };
}

export function rowsOf(dataset: TabularDataset): PlainValue[][] {
  const rows: PlainValue[][] = [];
  for (let rowIndex = 0; rowIndex < dataset.rowCount; rowIndex += 1) {
    rows.push(
      dataset.columns.map((column) => {
        const cell = column.cells[rowIndex];
        return cell === undefined || cell.kind === 'missing' ? null : cell.value;
      })
    );
  }
  return rows;
}

export function goodDataset(): TabularDataset {
  return datasetFromRows(
    ['Name', 'Age', 'City'],
    [
      ['Alice', 25, 'New York'],
      ['Bob', 30, 'Los Angeles'],
      ['Charlie', 35, 'Chicago']
    ]
  );
}

export function emptyColumnsDataset(): TabularDataset {
  return datasetFromRows(
    ['Name', 'Unused1', 'Age', 'Unused2'],
    [
      ['Alice', null, 25, null],
      ['Bob', null, 30, null],
      ['Charlie', null, 35, null]
    ]
  );
}

export function mixedTypesDataset(): TabularDataset {
  return datasetFromRows(
    ['ID', 'Value'],
    [
      [1, 10.5],
      [2, 'unknown'],
      ['three', 8.2],
      [4, 7.1]
    ]
  );
}

export function emptyRowsDataset(): TabularDataset {
  return datasetFromRows(
    ['Name', 'Age', 'City'],
    [
      ['Alice', 25, 'NYC'],
      [null, null, null],
      ['Charlie', 35, 'Chi'],
      [null, null, null]
    ]
  );
}
