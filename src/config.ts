import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  DB_PATH: z.string().min(1).default('channels.db'),
  DB_BUSY_TIMEOUT: z.coerce.number().int().nonnegative().default(5000),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
});

export interface AppConfig {
  databasePath: string;
  busyTimeoutMs: number;
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join(', ')}`);
    this.name = 'ConfigError';
  }
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
    );
  }

  const values = result.data;
  return {
    databasePath: values.DB_PATH,
    busyTimeoutMs: values.DB_BUSY_TIMEOUT,
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL,
  };
};

export default loadConfig;
