import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const DEFAULT_STORE_FILENAME = '.tabprep_config.json';

const envSchema = z.object({
  TABPREP_CONFIG_PATH: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export type AppConfig = {
  LOG_LEVEL: z.infer<typeof envSchema>['LOG_LEVEL'];
  resolvedStorePath: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration (${details}).`);
  }

  const storePath = parsed.data.TABPREP_CONFIG_PATH ?? DEFAULT_STORE_FILENAME;
  return {
    LOG_LEVEL: parsed.data.LOG_LEVEL,
    resolvedStorePath: path.resolve(storePath)
  };
}
