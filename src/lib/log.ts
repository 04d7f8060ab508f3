export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export const log = {
  debug: (message: string, meta?: unknown): void => {
    if (!enabled('debug')) {
      return;
    }
    if (meta === undefined) {
      console.debug(`[debug] ${message}`);
      return;
    }
    console.debug(`[debug] ${message}`, meta);
  },
  info: (message: string, meta?: unknown): void => {
    if (!enabled('info')) {
      return;
    }
    if (meta === undefined) {
      console.info(`[info] ${message}`);
      return;
    }
    console.info(`[info] ${message}`, meta);
  },
  warn: (message: string, meta?: unknown): void => {
    if (!enabled('warn')) {
      return;
    }
    if (meta === undefined) {
      console.warn(`[warn] ${message}`);
      return;
    }
    console.warn(`[warn] ${message}`, meta);
  },
  error: (message: string, meta?: unknown): void => {
    if (meta === undefined) {
      console.error(`[error] ${message}`);
      return;
    }
    console.error(`[error] ${message}`, meta);
  }
};
