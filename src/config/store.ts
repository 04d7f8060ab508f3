import path from 'node:path';
import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { resolveDiagnosticsConfig, type DiagnosticsConfig } from '../diagnostics/types.js';
import { ConfigStoreError } from '../lib/errors.js';
import { ensureDir } from '../lib/fs.js';

const diagnosticsSchema = z
  .object({
    empty_columns: z.boolean().optional(),
    empty_rows: z.boolean().optional(),
    missing_headers: z.boolean().optional(),
    mixed_types: z.boolean().optional()
  })
  .strict();

/** The persisted preferences document. Unknown keys are kept as they are. */
export const storeDocumentSchema = z
  .object({
    default_folder: z.string().optional(),
    diagnostics: diagnosticsSchema.optional()
  })
  .passthrough();

export type StoreDocument = z.infer<typeof storeDocumentSchema>;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadStore(filePath: string): Promise<StoreDocument> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw new ConfigStoreError(filePath, 'file could not be read', { cause: error });
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch (error) {
    throw new ConfigStoreError(filePath, 'not valid JSON', { cause: error });
  }

  const parsed = storeDocumentSchema.safeParse(parsedJson);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigStoreError(filePath, details, { cause: parsed.error });
  }
  return parsed.data;
}

export async function saveStore(filePath: string, document: StoreDocument): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await writeFile(filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
}

export function diagnosticsConfigFromStore(document: StoreDocument): DiagnosticsConfig {
  return resolveDiagnosticsConfig(document.diagnostics ?? {});
}

export function withDefaultFolder(document: StoreDocument, folder: string): StoreDocument {
  return { ...document, default_folder: folder };
}

export function withDiagnostics(document: StoreDocument, config: DiagnosticsConfig): StoreDocument {
  return {
    ...document,
    diagnostics: {
      empty_columns: config.empty_columns,
      empty_rows: config.empty_rows,
      missing_headers: config.missing_headers,
      mixed_types: config.mixed_types
    }
  };
}
