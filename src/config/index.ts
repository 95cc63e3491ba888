/**
 * Environment configuration
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional(),
  ALLOWED_ORIGINS: z.string().default('http://localhost:8080'),

  // Move ordering
  SCORING_SELECTION: z.enum(['best', 'sum']).default('best'),
  SCORING_AGGREGATION: z.enum(['weighted', 'sum', 'max']).default('weighted'),
  GEOMETRY_CACHE: booleanFlag.default('true'),
  ASSERT_CONTRACTS: booleanFlag.optional(),
  MAX_MOVES_PER_REQUEST: z.coerce.number().int().min(1).max(1024).default(256),
});

type Env = z.infer<typeof envSchema>;

function readEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (result.success) {
    return result.data;
  }

  // Fall back per key so one bad variable does not discard the rest
  const fallback: Record<string, string | undefined> = { ...process.env };
  for (const issue of result.error.issues) {
    const key = issue.path[0];
    if (typeof key === 'string') {
      console.warn(`Warning: ignoring invalid ${key} (${issue.message})`);
      delete fallback[key];
    }
  }
  return envSchema.parse(fallback);
}

const env = readEnv();
const isProduction = env.NODE_ENV === 'production';

export const config = {
  // Server
  nodeEnv: env.NODE_ENV,
  port: env.PORT,
  isProduction,
  isTest: env.NODE_ENV === 'test',
  logLevel: env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),

  // CORS
  allowedOrigins: env.ALLOWED_ORIGINS.split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0),

  // Engine
  scoringSelection: env.SCORING_SELECTION,
  scoringAggregation: env.SCORING_AGGREGATION,
  geometryCache: env.GEOMETRY_CACHE,
  assertContracts: env.ASSERT_CONTRACTS ?? !isProduction,
  maxMovesPerRequest: env.MAX_MOVES_PER_REQUEST,
} as const;

export type Config = typeof config;

export function validateConfig(): void {
  if (config.allowedOrigins.length === 0) {
    console.warn('Warning: ALLOWED_ORIGINS is empty, browser requests will be rejected');
  }
  if (config.isProduction && config.assertContracts) {
    console.warn('Warning: contract assertions are enabled in production');
  }
}
