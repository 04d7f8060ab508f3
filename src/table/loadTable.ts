import path from 'node:path';
import ExcelJS, { type CellValue, type Worksheet } from 'exceljs';
import { TableLoadError } from '../lib/errors.js';
import { log } from '../lib/log.js';
import { buildTable, type HeaderMode } from './buildTable.js';
import { inferCell, numberCell, textCell } from './cells.js';
import { MISSING, assertRectangular, type Cell, type TabularDataset } from './types.js';

export const SUPPORTED_EXTENSIONS = ['.csv', '.xlsx'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export interface LoadOptions {
  header?: HeaderMode;
  /** Worksheet to read from an .xlsx workbook; defaults to the first one. */
  sheet?: string;
}

export function supportedExtension(filePath: string): SupportedExtension | null {
  const extension = path.extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.find((candidate) => candidate === extension) ?? null;
}

export function fromWorkbookValue(value: CellValue): Cell {
  if (value === null || value === undefined) {
    return MISSING;
  }
  if (typeof value === 'number') {
    return numberCell(value);
  }
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (typeof value === 'string') {
    return textCell(value);
  }
  if (value instanceof Date) {
    return { kind: 'string', value: value.toISOString() };
  }
  if ('error' in value) {
    return MISSING;
  }
  if ('richText' in value) {
    return textCell(value.richText.map((part) => part.text).join(''));
  }
  if ('hyperlink' in value) {
    return textCell(value.text);
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return fromWorkbookValue(value.result ?? null);
  }
  return MISSING;
}

function worksheetValues(worksheet: Worksheet): CellValue[][] {
  const rows: CellValue[][] = [];
  worksheet.eachRow({ includeEmpty: true }, (row) => {
    const values: CellValue[] = [];
    for (let column = 1; column <= row.cellCount; column += 1) {
      values.push(row.getCell(column).value);
    }
    rows.push(values);
  });
  return rows;
}

function isBlankLine(values: CellValue[]): boolean {
  return values.length === 0 || (values.length === 1 && (values[0] ?? '') === '');
}

function csvCell(value: CellValue): Cell {
  return typeof value === 'string' ? inferCell(value) : fromWorkbookValue(value);
}

async function readCsvRows(filePath: string): Promise<Cell[][]> {
  const workbook = new ExcelJS.Workbook();
  // Identity map keeps every field as the raw text; kinds are inferred per cell.
  const worksheet = await workbook.csv.readFile(filePath, { map: (value: unknown) => value });
  return worksheetValues(worksheet)
    .filter((values) => !isBlankLine(values))
    .map((values) => values.map(csvCell));
}

async function readXlsxRows(filePath: string, sheet: string | undefined): Promise<Cell[][]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);

  if (workbook.worksheets.length === 0) {
    throw new TableLoadError(filePath, 'workbook has no sheets');
  }
  const worksheet = sheet === undefined ? workbook.worksheets[0] : workbook.getWorksheet(sheet);
  if (!worksheet) {
    const available = workbook.worksheets.map((candidate) => candidate.name).join(', ');
    throw new TableLoadError(filePath, `sheet "${sheet ?? ''}" not found (available: ${available})`);
  }

  return worksheetValues(worksheet).map((values) => values.map(fromWorkbookValue));
}

export async function loadTable(filePath: string, options: LoadOptions = {}): Promise<TabularDataset> {
  const extension = supportedExtension(filePath);
  if (extension === null) {
    throw new TableLoadError(
      filePath,
      `unsupported file type; expected one of ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }

  let rows: Cell[][];
  try {
    rows = extension === '.csv' ? await readCsvRows(filePath) : await readXlsxRows(filePath, options.sheet);
  } catch (error) {
    if (error instanceof TableLoadError) {
      throw error;
    }
    throw new TableLoadError(filePath, 'file is unreadable or not a valid table', { cause: error });
  }

  if (rows.length === 0) {
    throw new TableLoadError(filePath, 'file contains no rows');
  }

  const dataset = buildTable(rows, { header: options.header });
  assertRectangular(dataset);
  log.debug('table loaded', {
    filePath,
    rows: dataset.rowCount,
    columns: dataset.columns.length
  });
  return dataset;
}
