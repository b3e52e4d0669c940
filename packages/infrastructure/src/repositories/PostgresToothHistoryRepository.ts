/**
 * @fileoverview PostgreSQL Tooth History Repository (Infrastructure Layer)
 *
 * Adapter implementing the ToothHistoryRepository port. The three parallel
 * sequences are JSONB arrays on one row per (patient, tooth, source), so
 * every change to them is a single-row statement:
 *
 * - append: one INSERT ... ON CONFLICT DO UPDATE concatenating all three
 *   arrays under the row lock
 * - rollback: SELECT ... FOR UPDATE, then pop all three or delete the row
 *
 * Schema (see db/migrations/001_tooth_history.sql):
 *
 * ```sql
 * CREATE TABLE IF NOT EXISTS tooth_history_streams (
 *   id VARCHAR(50) PRIMARY KEY,
 *   patient_id VARCHAR(128) NOT NULL,
 *   tooth_number SMALLINT NOT NULL,
 *   source VARCHAR(20) NOT NULL CHECK (source IN ('patient_reported', 'doctor_diagnosed')),
 *   statuses JSONB NOT NULL,
 *   descriptions JSONB NOT NULL,
 *   dates JSONB NOT NULL,
 *   created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
 *   updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
 *   UNIQUE (patient_id, tooth_number, source),
 *   CHECK (jsonb_array_length(statuses) > 0),
 *   CHECK (jsonb_array_length(statuses) = jsonb_array_length(descriptions)),
 *   CHECK (jsonb_array_length(statuses) = jsonb_array_length(dates))
 * );
 * ```
 *
 * @module @dentalcore/infrastructure/repositories/postgres-tooth-history-repository
 */

import { z } from 'zod';
import {
  createLogger,
  RepositoryError,
  withTransaction,
  type DatabasePool,
  type TransactionOptions,
} from '@dentalcore/core';
import {
  parseToothNumber,
  type EntryStatisticsQuery,
  type HistoryEntry,
  type HistoryStreamRecord,
  type RemoveLastEntryResult,
  type StreamKey,
  type ToothHistoryRepository,
} from '@dentalcore/domain';
import { HistorySourceSchema, type HistoryStatistics, type ToothNumber } from '@dentalcore/types';

const logger = createLogger({ name: 'PostgresToothHistoryRepository' });

const HistoryStreamRowSchema = z.object({
  id: z.string(),
  patient_id: z.string(),
  tooth_number: z.number(),
  source: HistorySourceSchema,
  statuses: z.array(z.string()),
  descriptions: z.array(z.string()),
  dates: z.array(z.string()),
  created_at: z.date(),
  updated_at: z.date(),
});

const LockedStreamRowSchema = z.object({
  id: z.string(),
  entry_count: z.number().int(),
});

const StatisticsRowSchema = z.object({
  patient_reported: z.number().int(),
  doctor_diagnosed: z.number().int(),
  recent_entries: z.number().int(),
});

const CountRowSchema = z.object({ count: z.number().int() });

function parseRow<T>(schema: z.ZodType<T>, row: unknown, operation: string): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new RepositoryError('tooth-history', operation, 'Malformed tooth_history_streams row');
  }
  return parsed.data;
}

function rowToRecord(row: unknown): HistoryStreamRecord {
  const r = parseRow(HistoryStreamRowSchema, row, 'map');
  if (r.statuses.length !== r.descriptions.length || r.statuses.length !== r.dates.length) {
    throw new RepositoryError('tooth-history', 'map', `Stream ${r.id} has misaligned sequences`);
  }
  return {
    id: r.id,
    patientId: r.patient_id,
    toothNumber: parseToothNumber(r.tooth_number),
    source: r.source,
    statuses: r.statuses,
    descriptions: r.descriptions,
    dates: r.dates,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export interface PostgresToothHistoryRepositoryOptions {
  pool: DatabasePool;
  /** Options for the rollback transaction */
  transaction?: TransactionOptions;
}

export class PostgresToothHistoryRepository implements ToothHistoryRepository {
  private readonly pool: DatabasePool;
  private readonly transactionOptions: TransactionOptions;

  constructor(options: PostgresToothHistoryRepositoryOptions) {
    this.pool = options.pool;
    this.transactionOptions = options.transaction ?? {};
  }

  async appendEntry(
    key: StreamKey,
    entry: HistoryEntry,
    streamId: string,
    now: Date
  ): Promise<HistoryStreamRecord> {
    const sql = `
      INSERT INTO tooth_history_streams (
        id, patient_id, tooth_number, source,
        statuses, descriptions, dates, created_at, updated_at
      ) VALUES (
        $1, $2, $3, $4,
        jsonb_build_array($5::text), jsonb_build_array($6::text), jsonb_build_array($7::text),
        $8, $8
      )
      ON CONFLICT (patient_id, tooth_number, source) DO UPDATE SET
        statuses = tooth_history_streams.statuses || EXCLUDED.statuses,
        descriptions = tooth_history_streams.descriptions || EXCLUDED.descriptions,
        dates = tooth_history_streams.dates || EXCLUDED.dates,
        updated_at = EXCLUDED.updated_at
      RETURNING *
    `;

    const result = await this.pool.query(sql, [
      streamId,
      key.patientId,
      key.toothNumber,
      key.source,
      entry.status,
      entry.description,
      entry.date,
      now,
    ]);

    const row = result.rows[0];
    if (!row) {
      throw new RepositoryError('tooth-history', 'appendEntry', 'Upsert returned no row');
    }
    return rowToRecord(row);
  }

  async removeLastEntry(key: StreamKey, now: Date): Promise<RemoveLastEntryResult> {
    return withTransaction(
      this.pool,
      async (tx) => {
        const locked = await tx.selectForUpdate(
          `SELECT id, jsonb_array_length(statuses) AS entry_count
           FROM tooth_history_streams
           WHERE patient_id = $1 AND tooth_number = $2 AND source = $3`,
          [key.patientId, key.toothNumber, key.source]
        );

        const row = locked.rows[0];
        if (!row) {
          return 'absent';
        }
        const stream = parseRow(LockedStreamRowSchema, row, 'removeLastEntry');

        if (stream.entry_count <= 1) {
          await tx.query('DELETE FROM tooth_history_streams WHERE id = $1', [stream.id]);
          logger.debug({ streamId: stream.id }, 'History stream emptied and deleted');
          return 'deleted';
        }

        await tx.query(
          `UPDATE tooth_history_streams SET
             statuses = statuses - (-1),
             descriptions = descriptions - (-1),
             dates = dates - (-1),
             updated_at = $2
           WHERE id = $1`,
          [stream.id, now]
        );
        return 'popped';
      },
      this.transactionOptions
    );
  }

  async findStream(key: StreamKey): Promise<HistoryStreamRecord | null> {
    const result = await this.pool.query(
      `SELECT * FROM tooth_history_streams
       WHERE patient_id = $1 AND tooth_number = $2 AND source = $3`,
      [key.patientId, key.toothNumber, key.source]
    );
    const row = result.rows[0];
    return row ? rowToRecord(row) : null;
  }

  async findStreams(patientId: string, toothNumber?: ToothNumber): Promise<HistoryStreamRecord[]> {
    const result =
      toothNumber === undefined
        ? await this.pool.query(
            `SELECT * FROM tooth_history_streams
             WHERE patient_id = $1
             ORDER BY tooth_number ASC, source DESC`,
            [patientId]
          )
        : await this.pool.query(
            `SELECT * FROM tooth_history_streams
             WHERE patient_id = $1 AND tooth_number = $2
             ORDER BY source DESC`,
            [patientId, toothNumber]
          );
    return result.rows.map(rowToRecord);
  }

  async entryStatistics(query: EntryStatisticsQuery): Promise<HistoryStatistics> {
    const sql = `
      SELECT
        COALESCE(SUM(jsonb_array_length(s.statuses)) FILTER (WHERE s.source = 'patient_reported'), 0)::int AS patient_reported,
        COALESCE(SUM(jsonb_array_length(s.statuses)) FILTER (WHERE s.source = 'doctor_diagnosed'), 0)::int AS doctor_diagnosed,
        COALESCE(SUM(r.recent), 0)::int AS recent_entries
      FROM tooth_history_streams s
      LEFT JOIN LATERAL (
        SELECT COUNT(*)::int AS recent
        FROM jsonb_array_elements_text(s.dates) AS d(value)
        WHERE d.value >= $1
      ) r ON TRUE
      WHERE ($2::text IS NULL OR s.patient_id = $2)
    `;

    const result = await this.pool.query(sql, [query.since, query.patientId ?? null]);
    const stats = parseRow(StatisticsRowSchema, result.rows[0], 'entryStatistics');

    return {
      totalEntries: stats.patient_reported + stats.doctor_diagnosed,
      patientReported: stats.patient_reported,
      doctorDiagnosed: stats.doctor_diagnosed,
      recentEntries: stats.recent_entries,
    };
  }

  async countStatusReferences(statusId: string): Promise<number> {
    const result = await this.pool.query(
      'SELECT COUNT(*)::int AS count FROM tooth_history_streams WHERE statuses ? $1',
      [statusId]
    );
    return parseRow(CountRowSchema, result.rows[0], 'countStatusReferences').count;
  }
}
