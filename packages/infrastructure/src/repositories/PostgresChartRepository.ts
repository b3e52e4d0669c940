/**
 * @fileoverview PostgreSQL Chart Repository (Infrastructure Layer)
 *
 * Adapter implementing the ChartRepository port. Chart creation runs in one
 * transaction holding an advisory lock keyed by (patient, examination), so
 * concurrent initializations of the same examination serialize and exactly
 * one of them inserts the 32 cells.
 *
 * Schema (see db/migrations/001_tooth_history.sql):
 *
 * ```sql
 * CREATE TABLE IF NOT EXISTS dental_chart_cells (
 *   patient_id VARCHAR(128) NOT NULL,
 *   examination_id VARCHAR(128) NOT NULL,
 *   quadrant SMALLINT NOT NULL CHECK (quadrant BETWEEN 1 AND 4),
 *   position SMALLINT NOT NULL CHECK (position BETWEEN 1 AND 8),
 *   diagnosis TEXT NOT NULL DEFAULT '',
 *   treatment_performed TEXT NOT NULL DEFAULT '',
 *   status VARCHAR(64) NOT NULL DEFAULT 'normal',
 *   created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
 *   updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
 *   PRIMARY KEY (patient_id, examination_id, quadrant, position)
 * );
 * ```
 *
 * @module @dentalcore/infrastructure/repositories/postgres-chart-repository
 */

import { z } from 'zod';
import {
  createLogger,
  RepositoryError,
  stringToLockKey,
  withTransaction,
  type DatabasePool,
  type TransactionOptions,
} from '@dentalcore/core';
import {
  toothNumberOf,
  type ChartCellKey,
  type ChartRepository,
  type UpsertCellResult,
} from '@dentalcore/domain';
import {
  isQuadrant,
  isToothPosition,
  type ChartCell,
  type ChartCellPatch,
} from '@dentalcore/types';

const logger = createLogger({ name: 'PostgresChartRepository' });

const CELL_COLUMNS = [
  'patient_id',
  'examination_id',
  'quadrant',
  'position',
  'diagnosis',
  'treatment_performed',
  'status',
  'created_at',
  'updated_at',
] as const;

const ChartCellRowSchema = z.object({
  patient_id: z.string(),
  examination_id: z.string(),
  quadrant: z.number(),
  position: z.number(),
  diagnosis: z.string(),
  treatment_performed: z.string(),
  status: z.string(),
  created_at: z.date(),
  updated_at: z.date(),
});

const UpsertRowSchema = ChartCellRowSchema.extend({ was_created: z.boolean() });

const CountRowSchema = z.object({ count: z.number().int() });

function malformed(operation: string): RepositoryError {
  return new RepositoryError('chart', operation, 'Malformed dental_chart_cells row');
}

function toCell(r: z.infer<typeof ChartCellRowSchema>, operation: string): ChartCell {
  const { quadrant, position } = r;
  if (!isQuadrant(quadrant) || !isToothPosition(position)) {
    throw malformed(operation);
  }
  return {
    patientId: r.patient_id,
    examinationId: r.examination_id,
    quadrant,
    position,
    toothNumber: toothNumberOf(quadrant, position),
    diagnosis: r.diagnosis,
    treatmentPerformed: r.treatment_performed,
    status: r.status,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

function rowToCell(row: unknown): ChartCell {
  const parsed = ChartCellRowSchema.safeParse(row);
  if (!parsed.success) {
    throw malformed('map');
  }
  return toCell(parsed.data, 'map');
}

function cellParams(cell: ChartCell): unknown[] {
  return [
    cell.patientId,
    cell.examinationId,
    cell.quadrant,
    cell.position,
    cell.diagnosis,
    cell.treatmentPerformed,
    cell.status,
    cell.createdAt,
    cell.updatedAt,
  ];
}

/**
 * Multi-row VALUES list: ($1, ..., $9), ($10, ..., $18), ...
 */
function valuesPlaceholders(rowCount: number, columnCount: number): string {
  return Array.from({ length: rowCount }, (_, row) => {
    const placeholders = Array.from(
      { length: columnCount },
      (_, column) => `$${row * columnCount + column + 1}`
    );
    return `(${placeholders.join(', ')})`;
  }).join(', ');
}

export interface PostgresChartRepositoryOptions {
  pool: DatabasePool;
  /** Options for the chart creation transaction */
  transaction?: TransactionOptions;
}

export class PostgresChartRepository implements ChartRepository {
  private readonly pool: DatabasePool;
  private readonly transactionOptions: TransactionOptions;

  constructor(options: PostgresChartRepositoryOptions) {
    this.pool = options.pool;
    this.transactionOptions = options.transaction ?? {};
  }

  async createChart(patientId: string, examinationId: string, cells: ChartCell[]): Promise<boolean> {
    return withTransaction(
      this.pool,
      async (tx) => {
        await tx.advisoryLock(stringToLockKey(`chart:${patientId}:${examinationId}`));

        const existing = await tx.query(
          'SELECT 1 FROM dental_chart_cells WHERE patient_id = $1 AND examination_id = $2 LIMIT 1',
          [patientId, examinationId]
        );
        if (existing.rows.length > 0) {
          return false;
        }

        const sql = `
          INSERT INTO dental_chart_cells (${CELL_COLUMNS.join(', ')})
          VALUES ${valuesPlaceholders(cells.length, CELL_COLUMNS.length)}
          ON CONFLICT (patient_id, examination_id, quadrant, position) DO NOTHING
        `;
        await tx.query(sql, cells.flatMap(cellParams));

        logger.debug({ patientId, examinationId, cells: cells.length }, 'Chart cells inserted');
        return true;
      },
      this.transactionOptions
    );
  }

  async findCells(patientId: string, examinationId: string): Promise<ChartCell[]> {
    const result = await this.pool.query(
      `SELECT * FROM dental_chart_cells
       WHERE patient_id = $1 AND examination_id = $2
       ORDER BY quadrant ASC, position ASC`,
      [patientId, examinationId]
    );
    return result.rows.map(rowToCell);
  }

  async findCell(key: ChartCellKey): Promise<ChartCell | null> {
    const result = await this.pool.query(
      `SELECT * FROM dental_chart_cells
       WHERE patient_id = $1 AND examination_id = $2 AND quadrant = $3 AND position = $4`,
      [key.patientId, key.examinationId, key.quadrant, key.position]
    );
    const row = result.rows[0];
    return row ? rowToCell(row) : null;
  }

  async updateCell(key: ChartCellKey, patch: ChartCellPatch, now: Date): Promise<ChartCell | null> {
    const sql = `
      UPDATE dental_chart_cells SET
        diagnosis = COALESCE($5, diagnosis),
        treatment_performed = COALESCE($6, treatment_performed),
        status = COALESCE($7, status),
        updated_at = $8
      WHERE patient_id = $1 AND examination_id = $2 AND quadrant = $3 AND position = $4
      RETURNING *
    `;

    const result = await this.pool.query(sql, [
      key.patientId,
      key.examinationId,
      key.quadrant,
      key.position,
      patch.diagnosis ?? null,
      patch.treatmentPerformed ?? null,
      patch.status ?? null,
      now,
    ]);
    const row = result.rows[0];
    return row ? rowToCell(row) : null;
  }

  async upsertCell(defaults: ChartCell, patch: ChartCellPatch, now: Date): Promise<UpsertCellResult> {
    // xmax = 0 only for rows written by the INSERT branch
    const sql = `
      INSERT INTO dental_chart_cells (${CELL_COLUMNS.join(', ')})
      VALUES ($1, $2, $3, $4, COALESCE($10, $5), COALESCE($11, $6), COALESCE($12, $7), $8, $9)
      ON CONFLICT (patient_id, examination_id, quadrant, position) DO UPDATE SET
        diagnosis = COALESCE($10, dental_chart_cells.diagnosis),
        treatment_performed = COALESCE($11, dental_chart_cells.treatment_performed),
        status = COALESCE($12, dental_chart_cells.status),
        updated_at = $9
      RETURNING *, (xmax = 0) AS was_created
    `;

    const result = await this.pool.query(sql, [
      ...cellParams({ ...defaults, updatedAt: now }),
      patch.diagnosis ?? null,
      patch.treatmentPerformed ?? null,
      patch.status ?? null,
    ]);

    const parsed = UpsertRowSchema.safeParse(result.rows[0]);
    if (!parsed.success) {
      throw malformed('upsertCell');
    }
    return { cell: toCell(parsed.data, 'upsertCell'), created: parsed.data.was_created };
  }

  async countStatusReferences(statusId: string): Promise<number> {
    const result = await this.pool.query(
      'SELECT COUNT(*)::int AS count FROM dental_chart_cells WHERE status = $1',
      [statusId]
    );
    const parsed = CountRowSchema.safeParse(result.rows[0]);
    if (!parsed.success) {
      throw malformed('countStatusReferences');
    }
    return parsed.data.count;
  }
}
