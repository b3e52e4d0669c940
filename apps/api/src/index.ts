/**
 * Tooth History API Server
 *
 * Composition root: loads configuration, picks PostgreSQL or the in-memory
 * store, seeds the predefined statuses and starts Fastify.
 */

import { createDatabaseClient, logger, type DatabasePool } from '@dentalcore/core';
import {
  PostgresChartRepository,
  PostgresStatusCatalogRepository,
  PostgresToothHistoryRepository,
} from '@dentalcore/infrastructure';

import { buildApp } from './app.js';
import { loadConfig, type ApiConfig } from './config.js';
import {
  createInMemoryRepositories,
  createServices,
  type ToothHistoryRepositories,
} from './services.js';

function createRepositories(pool: DatabasePool | null): ToothHistoryRepositories {
  if (!pool) {
    logger.warn('DATABASE_URL not configured - using the in-memory store (data is lost on exit)');
    return createInMemoryRepositories();
  }
  return {
    statuses: new PostgresStatusCatalogRepository({ pool }),
    history: new PostgresToothHistoryRepository({ pool }),
    charts: new PostgresChartRepository({ pool }),
  };
}

function createPool(config: ApiConfig): DatabasePool | null {
  if (!config.database.url) {
    return null;
  }
  return createDatabaseClient({
    connectionString: config.database.url,
    ssl: config.database.ssl,
    maxConnections: config.database.maxConnections,
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.info(config.summary, 'Configuration loaded');

  const pool = createPool(config);
  const services = createServices({
    repositories: createRepositories(pool),
    missingCellPolicy: config.ledger.missingCellPolicy,
    recentDays: config.ledger.recentDays,
  });

  if (config.ledger.seedPredefinedStatuses) {
    const created = await services.catalog.seedPredefined();
    logger.info({ created }, 'Predefined statuses seeded');
  }

  const app = await buildApp({
    services,
    logLevel: config.logger.level,
    corsOrigin: config.server.corsOrigin,
    isProduction: config.isProd,
    pingDatabase: pool
      ? async () => {
          await pool.query('SELECT 1');
        }
      : undefined,
  });

  // Use a flag so a second signal does not start a second shutdown
  let isShuttingDown = false;
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  for (const signal of signals) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.info({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
        return;
      }
      isShuttingDown = true;
      logger.info({ signal }, 'Received shutdown signal');
      app
        .close()
        .then(() => pool?.end())
        .then(() => {
          logger.info('Server closed gracefully');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });

  const address = await app.listen({
    port: config.server.port,
    host: config.server.host,
  });

  logger.info({ address, env: config.env }, 'Tooth history API server started');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error during startup');
  process.exit(1);
});
