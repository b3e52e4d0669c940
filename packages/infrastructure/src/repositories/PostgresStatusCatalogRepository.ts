/**
 * @fileoverview PostgreSQL Status Catalog Repository (Infrastructure Layer)
 *
 * Adapter implementing the StatusCatalogRepository port.
 *
 * Schema (see db/migrations/001_tooth_history.sql):
 *
 * ```sql
 * CREATE TABLE IF NOT EXISTS dental_statuses (
 *   id VARCHAR(64) PRIMARY KEY,
 *   code VARCHAR(16) NOT NULL,
 *   display_name VARCHAR(100) NOT NULL,
 *   description TEXT NOT NULL DEFAULT '',
 *   category VARCHAR(20) NOT NULL,
 *   color CHAR(7) NOT NULL,
 *   active BOOLEAN NOT NULL DEFAULT TRUE,
 *   sort_order INTEGER NOT NULL DEFAULT 0,
 *   created_by VARCHAR(128),
 *   created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
 *   updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
 * );
 * ```
 *
 * @module @dentalcore/infrastructure/repositories/postgres-status-catalog-repository
 */

import { z } from 'zod';
import { RepositoryError, type DatabaseClient } from '@dentalcore/core';
import type { StatusCatalogRepository } from '@dentalcore/domain';
import {
  StatusCategorySchema,
  type Status,
  type StatusFilter,
  type UpdateStatusInput,
} from '@dentalcore/types';

const StatusRowSchema = z.object({
  id: z.string(),
  code: z.string(),
  display_name: z.string(),
  description: z.string(),
  category: StatusCategorySchema,
  color: z.string(),
  active: z.boolean(),
  sort_order: z.number(),
  created_by: z.string().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

function rowToStatus(row: unknown): Status {
  const parsed = StatusRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new RepositoryError('status-catalog', 'map', 'Malformed dental_statuses row');
  }
  const r = parsed.data;
  return {
    id: r.id,
    code: r.code,
    displayName: r.display_name,
    description: r.description,
    category: r.category,
    color: r.color,
    active: r.active,
    sortOrder: r.sort_order,
    createdBy: r.created_by,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

/**
 * Escape LIKE wildcards so the search term matches literally
 */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export interface PostgresStatusCatalogRepositoryOptions {
  pool: DatabaseClient;
}

export class PostgresStatusCatalogRepository implements StatusCatalogRepository {
  private readonly db: DatabaseClient;

  constructor(options: PostgresStatusCatalogRepositoryOptions) {
    this.db = options.pool;
  }

  async insert(status: Status): Promise<boolean> {
    const sql = `
      INSERT INTO dental_statuses (
        id, code, display_name, description, category, color,
        active, sort_order, created_by, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      ON CONFLICT (id) DO NOTHING
      RETURNING id
    `;

    const result = await this.db.query(sql, [
      status.id,
      status.code,
      status.displayName,
      status.description,
      status.category,
      status.color,
      status.active,
      status.sortOrder,
      status.createdBy,
      status.createdAt,
      status.updatedAt,
    ]);
    return result.rows.length > 0;
  }

  async findById(id: string): Promise<Status | null> {
    const result = await this.db.query('SELECT * FROM dental_statuses WHERE id = $1', [id]);
    const row = result.rows[0];
    return row ? rowToStatus(row) : null;
  }

  async findAll(filter: StatusFilter): Promise<Status[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.category !== undefined) {
      params.push(filter.category);
      conditions.push(`category = $${params.length}`);
    }
    if (filter.active !== undefined) {
      params.push(filter.active);
      conditions.push(`active = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const sql = `SELECT * FROM dental_statuses ${where} ORDER BY sort_order ASC, display_name ASC`;

    const result = await this.db.query(sql, params);
    return result.rows.map(rowToStatus);
  }

  async search(term: string): Promise<Status[]> {
    const sql = `
      SELECT * FROM dental_statuses
      WHERE id ILIKE $1 OR display_name ILIKE $1 OR description ILIKE $1
      ORDER BY display_name ASC
    `;

    const result = await this.db.query(sql, [`%${escapeLikePattern(term)}%`]);
    return result.rows.map(rowToStatus);
  }

  async update(id: string, patch: UpdateStatusInput, updatedAt: Date): Promise<Status | null> {
    const sql = `
      UPDATE dental_statuses SET
        code = COALESCE($2, code),
        display_name = COALESCE($3, display_name),
        description = COALESCE($4, description),
        category = COALESCE($5, category),
        color = COALESCE($6, color),
        sort_order = COALESCE($7, sort_order),
        updated_at = $8
      WHERE id = $1
      RETURNING *
    `;

    const result = await this.db.query(sql, [
      id,
      patch.code ?? null,
      patch.displayName ?? null,
      patch.description ?? null,
      patch.category ?? null,
      patch.color ?? null,
      patch.sortOrder ?? null,
      updatedAt,
    ]);
    const row = result.rows[0];
    return row ? rowToStatus(row) : null;
  }

  async setActive(id: string, active: boolean, updatedAt: Date): Promise<Status | null> {
    const result = await this.db.query(
      'UPDATE dental_statuses SET active = $2, updated_at = $3 WHERE id = $1 RETURNING *',
      [id, active, updatedAt]
    );
    const row = result.rows[0];
    return row ? rowToStatus(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM dental_statuses WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
