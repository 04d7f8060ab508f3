import ExcelJS, { type CellValue, type Workbook } from 'exceljs';
import type { Cell, TabularDataset } from '../../table/types.js';

const CLEANED_SHEET_NAME = 'Cleaned';

function excelValue(cell: Cell | undefined): CellValue {
  if (cell === undefined || cell.kind === 'missing') {
    return null;
  }
  return cell.value;
}

export function buildWorkbook(dataset: TabularDataset, sheetName = CLEANED_SHEET_NAME): Workbook {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(sheetName);

  worksheet.addRow(dataset.columns.map((column) => column.name));
  const headerRow = worksheet.getRow(1);
  headerRow.font = { bold: true };
  headerRow.fill = {
    type: 'pattern',
    pattern: 'solid',
    fgColor: { argb: 'FFE0E0E0' }
  };

  for (let rowIndex = 0; rowIndex < dataset.rowCount; rowIndex += 1) {
    worksheet.addRow(dataset.columns.map((column) => excelValue(column.cells[rowIndex])));
  }

  dataset.columns.forEach((column, index) => {
    worksheet.getColumn(index + 1).width = Math.max(column.name.length + 2, 15);
  });

  return workbook;
}

export async function writeExcelFile(input: { dataset: TabularDataset; outputPath: string }): Promise<void> {
  const workbook = buildWorkbook(input.dataset);
  await workbook.xlsx.writeFile(input.outputPath);
}
