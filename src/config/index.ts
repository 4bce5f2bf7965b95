import 'dotenv/config';
import { z } from 'zod';
import type { EnvConfig } from '../types';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) => value.split(',').map((origin) => origin.trim())),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  // Redis (OPTIONAL - batches run in-process without it)
  REDIS_ENABLED: booleanFlag,
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  // Document conversion service
  TIKA_URL: z.string().url().default('http://localhost:9998'),
  TIKA_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  // Local storage
  OUTPUT_DIR: z.string().min(1).default('process_data'),
  UPLOAD_DIR: z.string().min(1).default('uploads'),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(25),
  INVOICE_FILENAME_PATTERN: z
    .string()
    .optional()
    .refine(
      (value) => {
        if (!value) return true;
        try {
          new RegExp(value, 'i');
          return true;
        } catch {
          return false;
        }
      },
      { message: 'INVOICE_FILENAME_PATTERN must be a valid regular expression' }
    ),
});

/**
 * Parses and validates process.env. Exits early with a readable report when
 * the environment is misconfigured.
 */
const loadEnv = (): EnvConfig => {
  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }

  return parsed.data;
};

export const env: EnvConfig = loadEnv();

export default env;
