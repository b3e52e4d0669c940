/**
 * Application configuration
 *
 * Loads and validates environment variables
 */

import { describeEnv, validateEnv, type AppEnv } from '@dentalcore/core';

export interface ApiConfig {
  env: AppEnv['NODE_ENV'];
  isDev: boolean;
  isProd: boolean;
  isTest: boolean;
  server: {
    port: number;
    host: string;
    corsOrigin: string | undefined;
  };
  logger: {
    level: AppEnv['LOG_LEVEL'];
  };
  database: {
    url: string | undefined;
    ssl: boolean;
    maxConnections: number;
  };
  ledger: {
    missingCellPolicy: AppEnv['CHART_MISSING_CELL_POLICY'];
    recentDays: number;
    seedPredefinedStatuses: boolean;
  };
  /** Loggable view of the configuration, without secrets */
  summary: Record<string, unknown>;
}

/**
 * @throws ZodError when a variable is malformed
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ApiConfig {
  const env = validateEnv(source);

  return {
    env: env.NODE_ENV,
    isDev: env.NODE_ENV === 'development',
    isProd: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
    server: {
      port: env.PORT,
      host: env.HOST,
      corsOrigin: env.CORS_ORIGIN,
    },
    logger: {
      level: env.LOG_LEVEL,
    },
    database: {
      url: env.DATABASE_URL,
      ssl: env.DATABASE_SSL,
      maxConnections: env.DATABASE_POOL_MAX,
    },
    ledger: {
      missingCellPolicy: env.CHART_MISSING_CELL_POLICY,
      recentDays: env.HISTORY_RECENT_DAYS,
      seedPredefinedStatuses: env.SEED_PREDEFINED_STATUSES,
    },
    summary: describeEnv(env),
  };
}
