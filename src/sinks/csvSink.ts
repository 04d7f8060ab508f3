import { cellText } from '../table/cells.js';
import type { TabularDataset } from '../table/types.js';

function escapeCsvValue(value: string | null): string {
  if (value === null) {
    return '';
  }
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv(dataset: TabularDataset): string {
  const lines: string[] = [dataset.columns.map((column) => escapeCsvValue(column.name)).join(',')];

  for (let rowIndex = 0; rowIndex < dataset.rowCount; rowIndex += 1) {
    const values = dataset.columns.map((column) => {
      const cell = column.cells[rowIndex];
      return escapeCsvValue(cell === undefined ? null : cellText(cell));
    });
    lines.push(values.join(','));
  }

  return `${lines.join('\n')}\n`;
}
