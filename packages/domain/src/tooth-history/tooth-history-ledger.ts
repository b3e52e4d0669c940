/**
 * Tooth History Ledger
 *
 * Append-only record of observations per (patient, tooth, source). Each
 * stream keeps three index-aligned sequences (status, description, date);
 * the "current" values are read from the tail and never stored.
 *
 * Stream lifecycle: absent -> active on first append; active -> absent when
 * the last remaining entry is rolled back.
 */

import crypto from 'crypto';
import { createLogger, ValidationError, type Logger } from '@dentalcore/core';
import {
  AppendHistoryInputSchema,
  EntityIdSchema,
  HistorySourceSchema,
  HistoryStatisticsQuerySchema,
  type AppendHistoryInput,
  type FullToothHistory,
  type HistorySource,
  type HistoryStatistics,
  type HistoryStatisticsQuery,
  type HistoryStreamView,
} from '@dentalcore/types';
import { addDays, systemClock, type Clock } from './clock.js';
import { withPersistence } from './errors.js';
import type { StatusCatalogService } from './status-catalog-service.js';
import type {
  HistoryStreamRecord,
  StreamKey,
  ToothHistoryRepository,
} from './tooth-history-repository.js';
import { parseToothNumber } from './tooth-number.js';

export const DEFAULT_RECENT_DAYS = 30;

export interface ToothHistoryLedgerOptions {
  repository: ToothHistoryRepository;
  catalog: StatusCatalogService;
  clock?: Clock;
  /** Window used by `statistics` when the caller gives none */
  recentDays?: number;
}

/**
 * Read model of a stored stream, with the tail exposed as current values
 */
export function toStreamView(record: HistoryStreamRecord): HistoryStreamView {
  const last = record.statuses.length - 1;
  return {
    streamId: record.id,
    patientId: record.patientId,
    toothNumber: record.toothNumber,
    source: record.source,
    statuses: [...record.statuses],
    descriptions: [...record.descriptions],
    dates: [...record.dates],
    entryCount: record.statuses.length,
    currentStatus: record.statuses[last] ?? '',
    currentDescription: record.descriptions[last] ?? '',
    currentDate: record.dates[last] ?? '',
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

/**
 * Pair up the streams of one tooth by source
 */
export function toFullHistory(streams: readonly HistoryStreamView[]): FullToothHistory {
  return {
    patient_reported: streams.find((stream) => stream.source === 'patient_reported') ?? null,
    doctor_diagnosed: streams.find((stream) => stream.source === 'doctor_diagnosed') ?? null,
  };
}

function requirePatientId(value: string): string {
  const result = EntityIdSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError('Invalid patient id', result.error.issues);
  }
  return result.data;
}

function requireSource(value: string): HistorySource {
  const result = HistorySourceSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError('Invalid history source', result.error.issues);
  }
  return result.data;
}

export class ToothHistoryLedger {
  private readonly repository: ToothHistoryRepository;
  private readonly catalog: StatusCatalogService;
  private readonly clock: Clock;
  private readonly recentDays: number;
  private readonly logger: Logger;

  constructor(options: ToothHistoryLedgerOptions) {
    this.repository = options.repository;
    this.catalog = options.catalog;
    this.clock = options.clock ?? systemClock;
    this.recentDays = options.recentDays ?? DEFAULT_RECENT_DAYS;
    this.logger = createLogger({ name: 'tooth-history-ledger' });
  }

  /**
   * Record one observation. Not idempotent: identical calls add identical
   * entries.
   *
   * @returns id of the stream the entry was appended to
   * @throws InvalidToothNumberError, UnknownStatusError, InactiveStatusError,
   *   ValidationError before anything is written
   */
  async append(input: AppendHistoryInput): Promise<string> {
    const toothNumber = parseToothNumber(input.toothNumber);

    const result = AppendHistoryInputSchema.safeParse(input);
    if (!result.success) {
      throw new ValidationError('Invalid history entry', result.error.issues);
    }
    const parsed = result.data;

    await this.catalog.requireActive(parsed.status);

    const key: StreamKey = { patientId: parsed.patientId, toothNumber, source: parsed.source };
    const entry = {
      status: parsed.status,
      description: parsed.description,
      date: parsed.date ?? this.clock.today(),
    };

    const record = await withPersistence(this.logger, 'history.append', () =>
      this.repository.appendEntry(key, entry, this.generateStreamId(), this.clock.now())
    );

    this.logger.info(
      {
        patientId: key.patientId,
        toothNumber,
        source: key.source,
        status: entry.status,
        entryCount: record.statuses.length,
      },
      'History entry appended'
    );
    return record.id;
  }

  /**
   * Remove the most recent entry of a stream, deleting the stream when it
   * held only that entry
   *
   * @returns false when the stream does not exist
   */
  async rollbackLast(patientId: string, toothNumber: unknown, source: string): Promise<boolean> {
    const key: StreamKey = {
      patientId: requirePatientId(patientId),
      toothNumber: parseToothNumber(toothNumber),
      source: requireSource(source),
    };

    const outcome = await withPersistence(this.logger, 'history.rollback', () =>
      this.repository.removeLastEntry(key, this.clock.now())
    );

    if (outcome === 'absent') {
      this.logger.debug(
        { patientId: key.patientId, toothNumber: key.toothNumber, source: key.source },
        'Rollback skipped, no stream'
      );
      return false;
    }

    this.logger.info(
      { patientId: key.patientId, toothNumber: key.toothNumber, source: key.source, outcome },
      'History entry rolled back'
    );
    return true;
  }

  /**
   * Streams of one tooth: the requested source, or every present stream
   * (patient_reported first) when no source is given
   */
  async read(patientId: string, toothNumber: unknown, source?: string): Promise<HistoryStreamView[]> {
    const id = requirePatientId(patientId);
    const tooth = parseToothNumber(toothNumber);

    if (source !== undefined) {
      const key: StreamKey = { patientId: id, toothNumber: tooth, source: requireSource(source) };
      const record = await withPersistence(this.logger, 'history.read', () =>
        this.repository.findStream(key)
      );
      return record ? [toStreamView(record)] : [];
    }

    const full = await this.fullHistory(id, tooth);
    return [full.patient_reported, full.doctor_diagnosed].filter(
      (stream): stream is HistoryStreamView => stream !== null
    );
  }

  async fullHistory(patientId: string, toothNumber: unknown): Promise<FullToothHistory> {
    const id = requirePatientId(patientId);
    const tooth = parseToothNumber(toothNumber);

    const records = await withPersistence(this.logger, 'history.read', () =>
      this.repository.findStreams(id, tooth)
    );
    return toFullHistory(records.map(toStreamView));
  }

  /**
   * Every stream of a patient, across all teeth
   */
  async streamsForPatient(patientId: string): Promise<HistoryStreamView[]> {
    const id = requirePatientId(patientId);
    const records = await withPersistence(this.logger, 'history.read', () =>
      this.repository.findStreams(id)
    );
    return records.map(toStreamView);
  }

  /**
   * Entry counts per source, plus entries dated within the recent window
   */
  async statistics(query: HistoryStatisticsQuery = {}): Promise<HistoryStatistics> {
    const result = HistoryStatisticsQuerySchema.safeParse(query);
    if (!result.success) {
      throw new ValidationError('Invalid statistics query', result.error.issues);
    }
    const { patientId, recentDays = this.recentDays } = result.data;
    const since = addDays(this.clock.today(), -recentDays);

    return withPersistence(this.logger, 'history.statistics', () =>
      this.repository.entryStatistics(patientId === undefined ? { since } : { patientId, since })
    );
  }

  private generateStreamId(): string {
    return `ths_${Date.now()}_${crypto.randomUUID().slice(0, 8)}`;
  }
}

export function createToothHistoryLedger(options: ToothHistoryLedgerOptions): ToothHistoryLedger {
  return new ToothHistoryLedger(options);
}
