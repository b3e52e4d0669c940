/**
 * Tooth History Module (Domain Layer)
 *
 * Status catalog, per-tooth history ledger, current-status resolution,
 * timeline merging and per-examination chart snapshots.
 *
 * ## Hexagonal Architecture
 *
 * Services depend on repository ports; in-memory adapters live beside the
 * ports and PostgreSQL adapters in @dentalcore/infrastructure.
 *
 * @example
 * ```typescript
 * const catalog = new StatusCatalogService({ repository: statusRepository });
 * const ledger = new ToothHistoryLedger({ repository: historyRepository, catalog });
 * await ledger.append({ patientId, toothNumber: 21, source: 'doctor_diagnosed', status: 'deep_caries' });
 * ```
 *
 * @module domain/tooth-history
 */

export * from './errors.js';
export * from './clock.js';
export * from './tooth-number.js';
export * from './predefined-statuses.js';
export * from './status-catalog-repository.js';
export * from './status-catalog-service.js';
export * from './tooth-history-repository.js';
export * from './tooth-history-ledger.js';
export * from './status-resolver.js';
export * from './timeline-merger.js';
export * from './chart-repository.js';
export * from './chart-snapshot-service.js';
