/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters connecting the tooth history domain to PostgreSQL.
 *
 * ```
 *    DOMAIN LAYER                         INFRASTRUCTURE LAYER
 *   ┌─────────────────────┐              ┌──────────────────────────────┐
 *   │ StatusCatalog       │──implements─▶│ PostgresStatusCatalogRepo    │
 *   │ ToothHistory        │──implements─▶│ PostgresToothHistoryRepo     │
 *   │ Chart               │──implements─▶│ PostgresChartRepo            │
 *   └─────────────────────┘              └──────────────────────────────┘
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * import { createDatabaseClient } from '@dentalcore/core';
 * import { PostgresToothHistoryRepository } from '@dentalcore/infrastructure';
 *
 * const pool = createDatabaseClient();
 * const repository = new PostgresToothHistoryRepository({ pool });
 * ```
 *
 * @module @dentalcore/infrastructure
 */

export * from './repositories/index.js';
