import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// Load .env from monorepo root
dotenv.config({ path: fileURLToPath(new URL('../../../../.env', import.meta.url)) });

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  USAGE_REFRESH_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
});

export type Env = z.infer<typeof envSchema>;

/** Validate a raw environment; throws ConfigurationError listing the bad keys. */
export function loadEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    throw new ConfigurationError(
      `Invalid environment variables: ${Object.keys(fieldErrors).join(', ')}`,
      fieldErrors,
    );
  }
  return result.data;
}

let _env: Env | undefined;

export function getEnv(): Env {
  if (!_env) {
    _env = loadEnv(process.env);
  }
  return _env;
}
