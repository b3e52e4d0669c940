export {
  createLogger,
  generateCorrelationId,
  redactObject,
  shouldRedactKey,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  NotFoundError,
  DatabaseConfigError,
  RepositoryError,
  isOperationalError,
  toError,
  type SafeErrorDetails,
} from './errors.js';

export {
  ServerEnvSchema,
  DatabaseEnvSchema,
  LedgerEnvSchema,
  AppEnvSchema,
  validateEnv,
  describeEnv,
  type AppEnv,
} from './env.js';

export {
  createDatabaseClient,
  // Transaction management
  withTransaction,
  stringToLockKey,
  IsolationLevel,
  SerializationError,
  DeadlockError,
  // Types
  type DatabaseClient,
  type DatabaseConfig,
  type DatabasePool,
  type PoolClient,
  type QueryResult,
  type TransactionClient,
  type TransactionOptions,
} from './database.js';
