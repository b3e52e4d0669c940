import { z } from 'zod';

/**
 * Environment Variable Validation
 * Ensures configuration is well-formed at boot time
 */

// Base server config
export const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CORS_ORIGIN: z.string().optional(),
});

// Persistence config
export const DatabaseEnvSchema = z.object({
  /** PostgreSQL connection string; the in-memory store is used when absent */
  DATABASE_URL: z.string().url().optional(),
  DATABASE_SSL: z
    .enum(['true', 'false'])
    .optional()
    .default('false')
    .transform((v) => v === 'true'),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
});

// Tooth history ledger config
export const LedgerEnvSchema = z.object({
  /** What updating a cell of an uninitialized chart does */
  CHART_MISSING_CELL_POLICY: z.enum(['create-missing', 'strict']).default('create-missing'),
  /** Window used by the history statistics "recent entries" counter */
  HISTORY_RECENT_DAYS: z.coerce.number().int().min(1).max(3650).default(30),
  /** Register the predefined dental statuses on startup */
  SEED_PREDEFINED_STATUSES: z
    .enum(['true', 'false'])
    .optional()
    .default('true')
    .transform((v) => v === 'true'),
});

export const AppEnvSchema = ServerEnvSchema.merge(DatabaseEnvSchema).merge(LedgerEnvSchema);

export type AppEnv = z.infer<typeof AppEnvSchema>;

/**
 * Validate environment variables
 * @throws ZodError listing every invalid variable
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  return AppEnvSchema.parse(source);
}

/**
 * Summarize configuration without revealing secrets
 */
export function describeEnv(env: AppEnv): Record<string, unknown> {
  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    persistence: env.DATABASE_URL ? 'postgres' : 'memory',
    chartMissingCellPolicy: env.CHART_MISSING_CELL_POLICY,
    historyRecentDays: env.HISTORY_RECENT_DAYS,
    seedPredefinedStatuses: env.SEED_PREDEFINED_STATUSES,
  };
}
