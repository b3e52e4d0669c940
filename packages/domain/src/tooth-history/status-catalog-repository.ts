/**
 * Status Catalog Repository Interface (Port)
 *
 * Persistence contract for the status catalog. Implementations:
 * - PostgresStatusCatalogRepository (@dentalcore/infrastructure)
 * - InMemoryStatusCatalogRepository (below, for development and tests)
 *
 * @module domain/tooth-history/status-catalog-repository
 */

import type { Status, StatusFilter, UpdateStatusInput } from '@dentalcore/types';

export interface StatusCatalogRepository {
  /**
   * Insert a status unless its id is taken. Returns false on collision.
   */
  insert(status: Status): Promise<boolean>;

  findById(id: string): Promise<Status | null>;

  findAll(filter: StatusFilter): Promise<Status[]>;

  /**
   * Case-insensitive substring match over id, display name and description
   */
  search(term: string): Promise<Status[]>;

  update(id: string, patch: UpdateStatusInput, updatedAt: Date): Promise<Status | null>;

  setActive(id: string, active: boolean, updatedAt: Date): Promise<Status | null>;

  delete(id: string): Promise<boolean>;
}

/**
 * Anything that stores status ids and must keep them resolvable
 */
export interface StatusReferenceCounter {
  countStatusReferences(statusId: string): Promise<number>;
}

/**
 * In-memory status catalog for development and tests
 */
export class InMemoryStatusCatalogRepository implements StatusCatalogRepository {
  private readonly statuses = new Map<string, Status>();

  insert(status: Status): Promise<boolean> {
    if (this.statuses.has(status.id)) {
      return Promise.resolve(false);
    }
    this.statuses.set(status.id, { ...status });
    return Promise.resolve(true);
  }

  findById(id: string): Promise<Status | null> {
    const status = this.statuses.get(id);
    return Promise.resolve(status ? { ...status } : null);
  }

  findAll(filter: StatusFilter): Promise<Status[]> {
    const matches = [...this.statuses.values()].filter(
      (status) =>
        (filter.category === undefined || status.category === filter.category) &&
        (filter.active === undefined || status.active === filter.active)
    );
    return Promise.resolve(matches.map((status) => ({ ...status })));
  }

  search(term: string): Promise<Status[]> {
    const needle = term.toLowerCase();
    const matches = [...this.statuses.values()].filter(
      (status) =>
        status.id.toLowerCase().includes(needle) ||
        status.displayName.toLowerCase().includes(needle) ||
        status.description.toLowerCase().includes(needle)
    );
    return Promise.resolve(matches.map((status) => ({ ...status })));
  }

  update(id: string, patch: UpdateStatusInput, updatedAt: Date): Promise<Status | null> {
    const existing = this.statuses.get(id);
    if (!existing) {
      return Promise.resolve(null);
    }
    const updated: Status = {
      ...existing,
      code: patch.code ?? existing.code,
      displayName: patch.displayName ?? existing.displayName,
      description: patch.description ?? existing.description,
      category: patch.category ?? existing.category,
      color: patch.color ?? existing.color,
      sortOrder: patch.sortOrder ?? existing.sortOrder,
      updatedAt,
    };
    this.statuses.set(id, updated);
    return Promise.resolve({ ...updated });
  }

  setActive(id: string, active: boolean, updatedAt: Date): Promise<Status | null> {
    const existing = this.statuses.get(id);
    if (!existing) {
      return Promise.resolve(null);
    }
    const updated: Status = { ...existing, active, updatedAt };
    this.statuses.set(id, updated);
    return Promise.resolve({ ...updated });
  }

  delete(id: string): Promise<boolean> {
    return Promise.resolve(this.statuses.delete(id));
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.statuses.clear();
  }
}
