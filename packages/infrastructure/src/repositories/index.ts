/**
 * @fileoverview Repository Adapters (Infrastructure Layer)
 *
 * PostgreSQL adapters implementing the tooth history ports from
 * `@dentalcore/domain`:
 * - PostgresStatusCatalogRepository implements StatusCatalogRepository
 * - PostgresToothHistoryRepository implements ToothHistoryRepository
 * - PostgresChartRepository implements ChartRepository
 *
 * @module @dentalcore/infrastructure/repositories
 */

export {
  PostgresStatusCatalogRepository,
  escapeLikePattern,
  type PostgresStatusCatalogRepositoryOptions,
} from './PostgresStatusCatalogRepository.js';

export {
  PostgresToothHistoryRepository,
  type PostgresToothHistoryRepositoryOptions,
} from './PostgresToothHistoryRepository.js';

export {
  PostgresChartRepository,
  type PostgresChartRepositoryOptions,
} from './PostgresChartRepository.js';
