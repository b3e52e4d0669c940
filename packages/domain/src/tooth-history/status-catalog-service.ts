/**
 * Status Catalog Service
 *
 * Registry of the status identifiers that history streams and chart cells
 * may reference. Statuses are deactivated rather than deleted once they are
 * in use; the ledger stores raw ids and stays readable when catalog entries
 * change later.
 */

import { createLogger, ValidationError, type Logger } from '@dentalcore/core';
import {
  DEFAULT_STATUS_ID,
  FALLBACK_STATUS_COLOR,
  RegisterStatusInputSchema,
  STATUS_CODE_MAX_LENGTH,
  StatusFilterSchema,
  StatusSchema,
  UpdateStatusInputSchema,
  type RegisterStatusInput,
  type Status,
  type StatusCategory,
  type StatusDisplay,
  type StatusFilter,
  type UpdateStatusInput,
} from '@dentalcore/types';
import { systemClock, type Clock } from './clock.js';
import {
  DuplicateStatusError,
  InactiveStatusError,
  StatusInUseError,
  UnknownStatusError,
  withPersistence,
} from './errors.js';
import { loadPredefinedStatuses } from './predefined-statuses.js';
import type {
  StatusCatalogRepository,
  StatusReferenceCounter,
} from './status-catalog-repository.js';

export type StatusesByCategory = Partial<Record<StatusCategory, Status[]>>;

/**
 * Resolves presentation metadata for any status id, known or not
 */
export type StatusDisplayLookup = (statusId: string) => StatusDisplay;

export interface StatusCatalogServiceOptions {
  repository: StatusCatalogRepository;
  /** Stores consulted before a hard delete */
  referenceCounters?: StatusReferenceCounter[];
  clock?: Clock;
}

/**
 * Catalog order: sort order, then display name
 */
export function compareStatuses(a: Status, b: Status): number {
  if (a.sortOrder !== b.sortOrder) {
    return a.sortOrder - b.sortOrder;
  }
  if (a.displayName === b.displayName) {
    return 0;
  }
  return a.displayName < b.displayName ? -1 : 1;
}

/**
 * Chart label for a status registered without one: the id upper-cased and
 * cut to the code column width
 */
export function deriveStatusCode(statusId: string): string {
  return statusId.toUpperCase().slice(0, STATUS_CODE_MAX_LENGTH);
}

export function toStatusDisplay(statusId: string, status: Status | null | undefined): StatusDisplay {
  if (!status) {
    return {
      id: statusId,
      displayName: statusId,
      code: statusId,
      category: 'other',
      color: FALLBACK_STATUS_COLOR,
      active: false,
      resolved: false,
    };
  }
  return {
    id: status.id,
    displayName: status.displayName,
    code: status.code,
    category: status.category,
    color: status.color,
    active: status.active,
    resolved: true,
  };
}

export class StatusCatalogService {
  private readonly repository: StatusCatalogRepository;
  private readonly referenceCounters: StatusReferenceCounter[];
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: StatusCatalogServiceOptions) {
    this.repository = options.repository;
    this.referenceCounters = options.referenceCounters ?? [];
    this.clock = options.clock ?? systemClock;
    this.logger = createLogger({ name: 'status-catalog' });
  }

  /**
   * Register a user-defined status
   *
   * @throws DuplicateStatusError if the id is already registered
   */
  async register(input: RegisterStatusInput): Promise<Status> {
    const result = RegisterStatusInputSchema.safeParse(input);
    if (!result.success) {
      throw new ValidationError('Invalid status definition', result.error.issues);
    }
    const parsed = result.data;
    const now = this.clock.now();

    const built = StatusSchema.safeParse({
      id: parsed.id,
      code: parsed.code ?? deriveStatusCode(parsed.id),
      displayName: parsed.displayName ?? parsed.id,
      description: parsed.description,
      category: parsed.category,
      color: parsed.color,
      active: true,
      sortOrder: parsed.sortOrder,
      createdBy: parsed.createdBy,
      createdAt: now,
      updatedAt: now,
    });
    if (!built.success) {
      throw new ValidationError('Invalid status definition', built.error.issues);
    }
    const status = built.data;

    const inserted = await withPersistence(this.logger, 'status.register', () =>
      this.repository.insert(status)
    );
    if (!inserted) {
      throw new DuplicateStatusError(status.id);
    }

    this.logger.info({ statusId: status.id, category: status.category }, 'Status registered');
    return status;
  }

  /**
   * Register the predefined statuses that are not present yet
   *
   * @returns number of statuses created by this call
   */
  async seedPredefined(): Promise<number> {
    let created = 0;

    for (const predefined of loadPredefinedStatuses()) {
      const now = this.clock.now();
      const inserted = await withPersistence(this.logger, 'status.seed', () =>
        this.repository.insert({
          ...predefined,
          description: '',
          active: true,
          sortOrder: 0,
          createdBy: null,
          createdAt: now,
          updatedAt: now,
        })
      );
      if (inserted) {
        created++;
      }
    }

    if (created > 0) {
      this.logger.info({ created }, 'Predefined statuses seeded');
    } else {
      this.logger.debug('Predefined statuses already present');
    }
    return created;
  }

  /**
   * @throws UnknownStatusError if the id is not registered
   */
  async resolve(statusId: string): Promise<Status> {
    const status = await withPersistence(this.logger, 'status.resolve', () =>
      this.repository.findById(statusId)
    );
    if (!status) {
      throw new UnknownStatusError(statusId);
    }
    return status;
  }

  /**
   * Resolve a status that new observations may reference
   *
   * @throws UnknownStatusError if the id is not registered
   * @throws InactiveStatusError if the status has been deactivated
   */
  async requireActive(statusId: string): Promise<Status> {
    const status = await this.resolve(statusId);
    if (!status.active) {
      throw new InactiveStatusError(statusId);
    }
    return status;
  }

  /**
   * Presentation metadata, tolerant of ids missing from the catalog
   */
  async display(statusId: string): Promise<StatusDisplay> {
    const status = await withPersistence(this.logger, 'status.display', () =>
      this.repository.findById(statusId)
    );
    return toStatusDisplay(statusId, status);
  }

  /**
   * Snapshot of the whole catalog for resolving many ids at once
   */
  async displayLookup(): Promise<StatusDisplayLookup> {
    const statuses = await withPersistence(this.logger, 'status.list', () =>
      this.repository.findAll({})
    );
    const byId = new Map(statuses.map((status) => [status.id, status]));
    return (statusId) => toStatusDisplay(statusId, byId.get(statusId));
  }

  async list(filter: StatusFilter = {}): Promise<Status[]> {
    const result = StatusFilterSchema.safeParse(filter);
    if (!result.success) {
      throw new ValidationError('Invalid status filter', result.error.issues);
    }
    const parsed = result.data;
    const statuses = await withPersistence(this.logger, 'status.list', () =>
      this.repository.findAll(parsed)
    );
    return statuses.sort(compareStatuses);
  }

  /**
   * Active statuses grouped by category, for pickers
   */
  async listByCategory(): Promise<StatusesByCategory> {
    const statuses = await this.list({ active: true });
    const groups: StatusesByCategory = {};

    for (const status of statuses) {
      const group = groups[status.category];
      if (group) {
        group.push(status);
      } else {
        groups[status.category] = [status];
      }
    }
    return groups;
  }

  async search(term: string): Promise<Status[]> {
    const needle = term.trim();
    if (needle.length === 0) {
      throw new ValidationError('Search term must not be empty');
    }
    const matches = await withPersistence(this.logger, 'status.search', () =>
      this.repository.search(needle)
    );
    return matches.sort((a, b) =>
      a.displayName === b.displayName ? 0 : a.displayName < b.displayName ? -1 : 1
    );
  }

  /**
   * Update presentation fields. The identifier never changes.
   */
  async update(statusId: string, patch: UpdateStatusInput): Promise<Status> {
    const result = UpdateStatusInputSchema.safeParse(patch);
    if (!result.success) {
      throw new ValidationError('Invalid status update', result.error.issues);
    }
    const parsed = result.data;
    const updated = await withPersistence(this.logger, 'status.update', () =>
      this.repository.update(statusId, parsed, this.clock.now())
    );
    if (!updated) {
      throw new UnknownStatusError(statusId);
    }

    this.logger.info({ statusId, fields: Object.keys(parsed) }, 'Status updated');
    return updated;
  }

  async deactivate(statusId: string): Promise<Status> {
    return this.setActive(statusId, false);
  }

  async reactivate(statusId: string): Promise<Status> {
    return this.setActive(statusId, true);
  }

  /**
   * Hard-delete a status nothing references
   *
   * @throws StatusInUseError when history or chart records still use the id
   */
  async remove(statusId: string): Promise<void> {
    await this.resolve(statusId);

    if (statusId === DEFAULT_STATUS_ID) {
      throw new ValidationError(`Status '${statusId}' is the chart default and cannot be removed`);
    }

    let references = 0;
    for (const counter of this.referenceCounters) {
      references += await withPersistence(this.logger, 'status.references', () =>
        counter.countStatusReferences(statusId)
      );
    }
    if (references > 0) {
      throw new StatusInUseError(statusId, references);
    }

    await withPersistence(this.logger, 'status.remove', () => this.repository.delete(statusId));
    this.logger.info({ statusId }, 'Status removed');
  }

  private async setActive(statusId: string, active: boolean): Promise<Status> {
    const status = await withPersistence(this.logger, 'status.setActive', () =>
      this.repository.setActive(statusId, active, this.clock.now())
    );
    if (!status) {
      throw new UnknownStatusError(statusId);
    }

    this.logger.info({ statusId, active }, active ? 'Status reactivated' : 'Status deactivated');
    return status;
  }
}

export function createStatusCatalogService(
  options: StatusCatalogServiceOptions
): StatusCatalogService {
  return new StatusCatalogService(options);
}
