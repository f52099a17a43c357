import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  PORT: z.coerce.number().default(3000),
  DATABASE_FILE: z.string().min(1).default('./dev.db'),
  LOG_LEVEL: z
    .enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),
  PMS_API_MAX_ATTEMPTS: z.coerce.number().int().positive().default(10),
  MOCK_API_FAILURE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  DAILY_PULL_ENABLED: booleanFlag,
});

/** Validate an environment. Unset values take their defaults. */
export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.parse(source);
}

export const env = parseEnv(process.env);
