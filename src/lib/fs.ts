import { mkdir, readdir } from 'node:fs/promises';
import path from 'node:path';

export const DEFAULT_TABLE_EXTENSIONS: readonly string[] = ['.csv', '.xlsx'];

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort();
  } catch {
    return [];
  }
}

export async function listSupportedFiles(
  dirPath: string,
  extensions: readonly string[] = DEFAULT_TABLE_EXTENSIONS
): Promise<string[]> {
  const wanted = new Set(extensions.map((extension) => extension.toLowerCase()));
  const files = await listFiles(dirPath);
  return files
    .filter((file) => wanted.has(path.extname(file).toLowerCase()))
    .map((file) => path.join(dirPath, file));
}
