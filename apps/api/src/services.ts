/**
 * Service container
 *
 * Wires the tooth history services over one set of repositories. The
 * composition root picks PostgreSQL or in-memory repositories; tests pass
 * in-memory ones with a fixed clock.
 */

import {
  ChartSnapshotService,
  InMemoryChartRepository,
  InMemoryStatusCatalogRepository,
  InMemoryToothHistoryRepository,
  StatusCatalogService,
  StatusResolver,
  TimelineMerger,
  ToothHistoryLedger,
  type ChartRepository,
  type Clock,
  type StatusCatalogRepository,
  type ToothHistoryRepository,
} from '@dentalcore/domain';
import type { MissingCellPolicy } from '@dentalcore/types';

export interface ToothHistoryRepositories {
  statuses: StatusCatalogRepository;
  history: ToothHistoryRepository;
  charts: ChartRepository;
}

export interface ToothHistoryServices {
  catalog: StatusCatalogService;
  ledger: ToothHistoryLedger;
  resolver: StatusResolver;
  timeline: TimelineMerger;
  charts: ChartSnapshotService;
}

export interface CreateServicesOptions {
  repositories: ToothHistoryRepositories;
  clock?: Clock;
  missingCellPolicy?: MissingCellPolicy;
  recentDays?: number;
}

export function createServices(options: CreateServicesOptions): ToothHistoryServices {
  const { repositories, clock } = options;

  const catalog = new StatusCatalogService({
    repository: repositories.statuses,
    referenceCounters: [repositories.history, repositories.charts],
    clock,
  });
  const ledger = new ToothHistoryLedger({
    repository: repositories.history,
    catalog,
    clock,
    recentDays: options.recentDays,
  });

  return {
    catalog,
    ledger,
    resolver: new StatusResolver({ ledger, catalog }),
    timeline: new TimelineMerger({ ledger }),
    charts: new ChartSnapshotService({
      repository: repositories.charts,
      catalog,
      clock,
      missingCellPolicy: options.missingCellPolicy,
    }),
  };
}

export function createInMemoryRepositories(): ToothHistoryRepositories {
  return {
    statuses: new InMemoryStatusCatalogRepository(),
    history: new InMemoryToothHistoryRepository(),
    charts: new InMemoryChartRepository(),
  };
}
