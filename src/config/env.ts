/**
 * Environment configuration
 *
 * Parsed once at import. Entrypoints load `dotenv/config` before this module.
 */

import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const DEFAULT_SEARCH_ROOTS = ['.', '/app', '..', './app', 'vectorization-service'];

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const optionalUrl = z
  .string()
  .trim()
  .pipe(z.union([z.literal('').transform(() => undefined), z.string().url()]))
  .optional();

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  CLIENT_ID: z.string().min(1).optional(),
  SMPC_URL: optionalUrl,
  ORCHESTRATOR_URL: optionalUrl,
  DATASET_API_URL: optionalUrl,

  DATASET_SEARCH_ROOTS: z
    .string()
    .optional()
    .transform((raw) =>
      raw ? raw.split(',').map((s) => s.trim()).filter(Boolean) : DEFAULT_SEARCH_ROOTS,
    ),
  OUTPUT_ENABLED: booleanFlag.default('true'),
  OUTPUT_DIR: z.string().default('/app/output'),
  RESULTS_DIR: z.string().default('/app/results'),

  DATASET_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SMPC_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ORCHESTRATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  POLLING_ENABLED: booleanFlag.default('false'),
  POLLING_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  POLLING_TIMEOUT_MS: z.coerce.number().int().positive().default(1_200_000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parse an environment map. `ID` is accepted as an alias of `CLIENT_ID`.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // Blank values (`PORT=`) count as unset so defaults apply
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const result = EnvSchema.safeParse({
    ...present,
    CLIENT_ID: present.CLIENT_ID || present.ID || undefined,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }

  return result.data;
}

export const env: Env = loadEnv();
