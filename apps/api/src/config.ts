import os from 'os';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  NODE_ENV: z.string().default('production'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  BODY_LIMIT: z.string().default('5mb'),
  PG_SCHEMA: z.string().min(1).default('public'),
  TMP_DIR: z.string().min(1).optional()
});

export type AppConfig = {
  nodeEnv: string;
  port: number;
  logLevel: (typeof LOG_LEVELS)[number];
  bodyLimit: string;
  pgSchema: string;
  tmpDir: string;
};

/** Reads configuration from the environment; throws on invalid values. */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === 'test' ? 'silent' : 'info'),
    bodyLimit: e.BODY_LIMIT,
    pgSchema: e.PG_SCHEMA,
    tmpDir: e.TMP_DIR ?? os.tmpdir()
  };
};
