import path from 'node:path';
import { cleanDatasetWithSummary, type CleanSummary } from '../clean/cleanDataset.js';
import { diagnose } from '../diagnostics/index.js';
import {
  DEFAULT_DIAGNOSTICS_CONFIG,
  type DiagnosticReport,
  type DiagnosticsConfig
} from '../diagnostics/types.js';
import { log } from '../lib/log.js';
import { writeDataset, type SaveResult } from '../sinks/index.js';
import { loadTable, type LoadOptions } from '../table/loadTable.js';
import type { TabularDataset } from '../table/types.js';

export interface SessionDeps {
  loadTable: (filePath: string, options?: LoadOptions) => Promise<TabularDataset>;
  writeDataset: (dataset: TabularDataset, outputPath: string) => Promise<SaveResult>;
}

export interface CleanedSaveResult extends SaveResult {
  summary: CleanSummary;
}

const defaultDeps: SessionDeps = { loadTable, writeDataset };

/**
 * Holds the table picked by the user. Loading a new file replaces the
 * previous table; a failed load leaves the session with no table.
 */
export class DiagnosticsSession {
  private dataset: TabularDataset | null = null;
  private selectedFile: string | null = null;
  private cleaned: { dataset: TabularDataset; summary: CleanSummary } | null = null;
  private config: DiagnosticsConfig;
  private readonly deps: SessionDeps;

  constructor(options: { config?: DiagnosticsConfig; deps?: Partial<SessionDeps> } = {}) {
    this.config = options.config ?? DEFAULT_DIAGNOSTICS_CONFIG;
    this.deps = { ...defaultDeps, ...options.deps };
  }

  get currentDataset(): TabularDataset | null {
    return this.dataset;
  }

  get currentFile(): string | null {
    return this.selectedFile;
  }

  get cleanedDataset(): TabularDataset | null {
    return this.cleaned?.dataset ?? null;
  }

  get diagnosticsConfig(): DiagnosticsConfig {
    return this.config;
  }

  applyConfig(config: DiagnosticsConfig): void {
    this.config = config;
    log.info('updated diagnostics settings', config);
  }

  clear(): void {
    this.dataset = null;
    this.selectedFile = null;
    this.cleaned = null;
  }

  async onFileSelected(filePath: string, options: LoadOptions = {}): Promise<DiagnosticReport> {
    this.clear();
    const dataset = await this.deps.loadTable(filePath, options);
    this.dataset = dataset;
    this.selectedFile = filePath;
    log.info(
      `Loaded: ${path.basename(filePath)} with ${dataset.rowCount} rows and ${dataset.columns.length} columns.`
    );
    return this.runDiagnostics();
  }

  runDiagnostics(): DiagnosticReport {
    if (this.dataset === null) {
      throw new Error('No table loaded. Select a file first.');
    }
    return diagnose(this.dataset, this.config);
  }

  async onSaveRequested(outputPath: string): Promise<CleanedSaveResult> {
    if (this.dataset === null) {
      throw new Error('No table loaded. Select a file first.');
    }
    this.cleaned = cleanDatasetWithSummary(this.dataset);
    return this.retrySave(outputPath);
  }

  /** Writes the already cleaned table again, e.g. to a different path. */
  async retrySave(outputPath: string): Promise<CleanedSaveResult> {
    if (this.cleaned === null) {
      throw new Error('Nothing to save. Request a save first.');
    }
    const result = await this.deps.writeDataset(this.cleaned.dataset, outputPath);
    log.info(`Saved cleaned file to: ${result.outputPath}`, this.cleaned.summary);
    return { ...result, summary: this.cleaned.summary };
  }
}
