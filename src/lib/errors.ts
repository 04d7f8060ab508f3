function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

export class TableLoadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    const suffix = options?.cause === undefined ? '' : `: ${describeCause(options.cause)}`;
    super(`Could not load ${filePath}: ${reason}${suffix}`, options);
    this.name = 'TableLoadError';
    this.filePath = filePath;
  }
}

export class TableSaveError extends Error {
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    const suffix = options?.cause === undefined ? '' : `: ${describeCause(options.cause)}`;
    super(`Failed to save ${filePath}: ${reason}${suffix}`, options);
    this.name = 'TableSaveError';
    this.filePath = filePath;
  }
}

export class ConfigStoreError extends Error {
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid config document ${filePath}: ${reason}`, options);
    this.name = 'ConfigStoreError';
    this.filePath = filePath;
  }
}
