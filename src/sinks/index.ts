import path from 'node:path';
import { rename, rm, writeFile } from 'node:fs/promises';
import { TableSaveError } from '../lib/errors.js';
import { ensureDir } from '../lib/fs.js';
import { log } from '../lib/log.js';
import { supportedExtension } from '../table/loadTable.js';
import type { TabularDataset } from '../table/types.js';
import { formatCsv } from './csvSink.js';
import { writeExcelFile } from './excel/index.js';

export interface SaveResult {
  outputPath: string;
  rows: number;
  columns: number;
}

/**
 * Writes beside the target first and renames into place, so a failed write
 * leaves any existing file untouched.
 */
export async function writeDataset(dataset: TabularDataset, outputPath: string): Promise<SaveResult> {
  const extension = supportedExtension(outputPath);
  if (extension === null) {
    throw new TableSaveError(outputPath, 'unsupported file type; expected .csv or .xlsx');
  }

  const tempPath = path.join(
    path.dirname(outputPath),
    `.${path.basename(outputPath)}.${process.pid}.tmp`
  );

  try {
    await ensureDir(path.dirname(outputPath));
    if (extension === '.csv') {
      await writeFile(tempPath, formatCsv(dataset), 'utf8');
    } else {
      await writeExcelFile({ dataset, outputPath: tempPath });
    }
    await rename(tempPath, outputPath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      log.warn('could not remove temporary file', { tempPath, cleanupError });
    });
    throw new TableSaveError(outputPath, 'write failed', { cause: error });
  }

  log.debug('dataset written', { outputPath, rows: dataset.rowCount });
  return { outputPath, rows: dataset.rowCount, columns: dataset.columns.length };
}
