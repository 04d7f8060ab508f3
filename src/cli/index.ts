#!/usr/bin/env node
import path from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { loadConfig } from '../config/env.js';
import {
  diagnosticsConfigFromStore,
  loadStore,
  saveStore,
  withDefaultFolder,
  withDiagnostics,
  type StoreDocument
} from '../config/store.js';
import {
  CHECK_IDS,
  isCheckId,
  resolveDiagnosticsConfig,
  type CheckId,
  type DiagnosticsConfig
} from '../diagnostics/types.js';
import { listSupportedFiles } from '../lib/fs.js';
import { log, setLogLevel } from '../lib/log.js';
import { formatReportJson, renderReport } from '../report/renderReport.js';
import { DiagnosticsSession } from '../session/session.js';
import type { HeaderMode } from '../table/buildTable.js';
import type { LoadOptions } from '../table/loadTable.js';

interface LoadFlags {
  header: HeaderMode;
  sheet?: string;
}

function parseCheckId(value: string, previous: CheckId[] = []): CheckId[] {
  if (!isCheckId(value)) {
    throw new InvalidArgumentError(`Unknown check "${value}". Expected one of: ${CHECK_IDS.join(', ')}.`);
  }
  return [...previous, value];
}

function headerOption(): Option {
  return new Option('--header <mode>', 'whether the first row holds column names')
    .choices(['auto', 'present', 'absent'])
    .default('auto');
}

function loadOptionsFrom(flags: LoadFlags): LoadOptions {
  return { header: flags.header, sheet: flags.sheet };
}

function selectChecks(base: DiagnosticsConfig, only?: CheckId[], skip?: CheckId[]): DiagnosticsConfig {
  const selected: Partial<Record<CheckId, boolean>> = { ...base };
  if (only && only.length > 0) {
    for (const id of CHECK_IDS) {
      selected[id] = only.includes(id);
    }
  }
  for (const id of skip ?? []) {
    selected[id] = false;
  }
  return resolveDiagnosticsConfig(selected);
}

async function storedSettings(): Promise<{ storePath: string; document: StoreDocument }> {
  const config = loadConfig();
  setLogLevel(config.LOG_LEVEL);
  const document = await loadStore(config.resolvedStorePath);
  return { storePath: config.resolvedStorePath, document };
}

async function runFiles(folder: string | undefined, flags: { saveDefault?: boolean }): Promise<void> {
  const { storePath, document } = await storedSettings();
  const target = folder ?? document.default_folder;
  if (!target) {
    throw new Error('No folder given and no default folder stored. Run: tabprep files <folder> --save-default');
  }

  const resolved = path.resolve(target);
  if (flags.saveDefault) {
    await saveStore(storePath, withDefaultFolder(document, resolved));
    log.info('saved default folder', { folder: resolved, storePath });
  }

  const files = await listSupportedFiles(resolved);
  console.log(`Folder: ${resolved}`);
  if (files.length === 0) {
    console.log('No supported files found.');
    return;
  }
  for (const file of files) {
    console.log(path.basename(file));
  }
}

async function runDiagnose(
  file: string,
  flags: LoadFlags & { only?: CheckId[]; skip?: CheckId[]; json?: boolean }
): Promise<void> {
  const { document } = await storedSettings();
  const checks = selectChecks(diagnosticsConfigFromStore(document), flags.only, flags.skip);
  const session = new DiagnosticsSession({ config: checks });
  const report = await session.onFileSelected(path.resolve(file), loadOptionsFrom(flags));

  if (flags.json) {
    console.log(formatReportJson(report));
    return;
  }
  for (const line of renderReport(report)) {
    console.log(line);
  }
}

async function runClean(file: string, flags: LoadFlags & { out: string }): Promise<void> {
  const { document } = await storedSettings();
  const session = new DiagnosticsSession({ config: diagnosticsConfigFromStore(document) });
  await session.onFileSelected(path.resolve(file), loadOptionsFrom(flags));
  const result = await session.onSaveRequested(path.resolve(flags.out));
  console.log(`Saved cleaned file to: ${result.outputPath}`);
  console.log(
    `Dropped ${result.summary.droppedRows} empty rows and ${result.summary.droppedColumns.length} empty columns.`
  );
}

async function runConfigShow(): Promise<void> {
  const { storePath, document } = await storedSettings();
  console.log(`Config file: ${storePath}`);
  console.log(`Default folder: ${document.default_folder ?? 'None'}`);
  const checks = diagnosticsConfigFromStore(document);
  for (const id of CHECK_IDS) {
    console.log(`${id}: ${checks[id] ? 'enabled' : 'disabled'}`);
  }
}

async function runConfigSetFolder(folder: string): Promise<void> {
  const { storePath, document } = await storedSettings();
  const resolved = path.resolve(folder);
  await saveStore(storePath, withDefaultFolder(document, resolved));
  log.info('saved default folder', { folder: resolved, storePath });
}

async function runConfigChecks(flags: {
  enable?: CheckId[];
  disable?: CheckId[];
  all?: boolean;
  none?: boolean;
}): Promise<void> {
  const { storePath, document } = await storedSettings();
  const selected: Partial<Record<CheckId, boolean>> = { ...diagnosticsConfigFromStore(document) };
  if (flags.all || flags.none) {
    for (const id of CHECK_IDS) {
      selected[id] = Boolean(flags.all);
    }
  }
  for (const id of flags.enable ?? []) {
    selected[id] = true;
  }
  for (const id of flags.disable ?? []) {
    selected[id] = false;
  }

  const checks = resolveDiagnosticsConfig(selected);
  await saveStore(storePath, withDiagnostics(document, checks));
  log.info('updated diagnostics settings', checks);
}

const program = new Command();
program
  .name('tabprep')
  .description('Run data-quality diagnostics on CSV and Excel files')
  .version('0.1.0');

program
  .command('files')
  .description('List CSV and Excel files in a folder (defaults to the stored folder)')
  .argument('[folder]', 'folder to scan')
  .option('--save-default', 'store the folder as the default')
  .action(runFiles);

program
  .command('diagnose')
  .description('Load a table and print its diagnostics report')
  .argument('<file>', '.csv or .xlsx file')
  .addOption(headerOption())
  .option('--sheet <name>', 'worksheet to read from an .xlsx file')
  .option('--only <checks...>', 'run only these checks', parseCheckId)
  .option('--skip <checks...>', 'skip these checks', parseCheckId)
  .option('--json', 'print the report as JSON')
  .action(runDiagnose);

program
  .command('clean')
  .description('Drop fully empty rows and columns and write the result')
  .argument('<file>', '.csv or .xlsx file')
  .requiredOption('-o, --out <path>', 'output .csv or .xlsx file')
  .addOption(headerOption())
  .option('--sheet <name>', 'worksheet to read from an .xlsx file')
  .action(runClean);

program.command('config:show').description('Print stored preferences').action(runConfigShow);
program
  .command('config:set-folder')
  .description('Store the default folder')
  .argument('<folder>', 'folder to store')
  .action(runConfigSetFolder);
program
  .command('config:checks')
  .description('Enable or disable diagnostics checks')
  .option('--enable <checks...>', 'checks to enable', parseCheckId)
  .option('--disable <checks...>', 'checks to disable', parseCheckId)
  .option('--all', 'enable every check')
  .option('--none', 'disable every check')
  .action(runConfigChecks);

program.parseAsync(process.argv).catch((error) => {
  log.error('command failed', error);
  process.exitCode = 1;
});
