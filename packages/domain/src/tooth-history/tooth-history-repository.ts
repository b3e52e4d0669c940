/**
 * Tooth History Repository Interface (Port)
 *
 * A history stream is one row per (patient, tooth, source) holding three
 * parallel sequences. Adapters must change all three together in a single
 * atomic step and must never persist an empty stream.
 *
 * Implementations:
 * - PostgresToothHistoryRepository (@dentalcore/infrastructure)
 * - InMemoryToothHistoryRepository (below, for development and tests)
 *
 * @module domain/tooth-history/tooth-history-repository
 */

import type { HistorySource, HistoryStatistics, ToothNumber } from '@dentalcore/types';
import type { StatusReferenceCounter } from './status-catalog-repository.js';

export interface StreamKey {
  patientId: string;
  toothNumber: ToothNumber;
  source: HistorySource;
}

export interface HistoryEntry {
  status: string;
  description: string;
  date: string;
}

export interface HistoryStreamRecord {
  id: string;
  patientId: string;
  toothNumber: ToothNumber;
  source: HistorySource;
  statuses: string[];
  descriptions: string[];
  dates: string[];
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Outcome of removing the tail entry: the stream shrank, the stream held a
 * single entry and was deleted, or there was no stream
 */
export type RemoveLastEntryResult = 'popped' | 'deleted' | 'absent';

export interface EntryStatisticsQuery {
  patientId?: string;
  /** Entries dated on or after this YYYY-MM-DD date count as recent */
  since: string;
}

export interface ToothHistoryRepository extends StatusReferenceCounter {
  /**
   * Append one entry, creating the stream under `streamId` when absent
   */
  appendEntry(
    key: StreamKey,
    entry: HistoryEntry,
    streamId: string,
    now: Date
  ): Promise<HistoryStreamRecord>;

  removeLastEntry(key: StreamKey, now: Date): Promise<RemoveLastEntryResult>;

  findStream(key: StreamKey): Promise<HistoryStreamRecord | null>;

  /**
   * All streams of a patient, optionally for one tooth
   */
  findStreams(patientId: string, toothNumber?: ToothNumber): Promise<HistoryStreamRecord[]>;

  entryStatistics(query: EntryStatisticsQuery): Promise<HistoryStatistics>;
}

function streamKeyOf(key: StreamKey): string {
  return `${key.patientId}|${key.toothNumber}|${key.source}`;
}

function copyRecord(record: HistoryStreamRecord): HistoryStreamRecord {
  return {
    ...record,
    statuses: [...record.statuses],
    descriptions: [...record.descriptions],
    dates: [...record.dates],
  };
}

/**
 * In-memory tooth history store for development and tests
 *
 * Every mutation completes synchronously inside the call, so calls for the
 * same stream cannot interleave.
 */
export class InMemoryToothHistoryRepository implements ToothHistoryRepository {
  private readonly streams = new Map<string, HistoryStreamRecord>();

  appendEntry(
    key: StreamKey,
    entry: HistoryEntry,
    streamId: string,
    now: Date
  ): Promise<HistoryStreamRecord> {
    const existing = this.streams.get(streamKeyOf(key));

    const record: HistoryStreamRecord = existing ?? {
      id: streamId,
      patientId: key.patientId,
      toothNumber: key.toothNumber,
      source: key.source,
      statuses: [],
      descriptions: [],
      dates: [],
      createdAt: now,
      updatedAt: now,
    };

    record.statuses.push(entry.status);
    record.descriptions.push(entry.description);
    record.dates.push(entry.date);
    record.updatedAt = now;
    this.streams.set(streamKeyOf(key), record);

    return Promise.resolve(copyRecord(record));
  }

  removeLastEntry(key: StreamKey, now: Date): Promise<RemoveLastEntryResult> {
    const existing = this.streams.get(streamKeyOf(key));
    if (!existing) {
      return Promise.resolve('absent');
    }
    if (existing.statuses.length <= 1) {
      this.streams.delete(streamKeyOf(key));
      return Promise.resolve('deleted');
    }

    existing.statuses.pop();
    existing.descriptions.pop();
    existing.dates.pop();
    existing.updatedAt = now;
    return Promise.resolve('popped');
  }

  findStream(key: StreamKey): Promise<HistoryStreamRecord | null> {
    const record = this.streams.get(streamKeyOf(key));
    return Promise.resolve(record ? copyRecord(record) : null);
  }

  findStreams(patientId: string, toothNumber?: ToothNumber): Promise<HistoryStreamRecord[]> {
    const matches = [...this.streams.values()].filter(
      (record) =>
        record.patientId === patientId &&
        (toothNumber === undefined || record.toothNumber === toothNumber)
    );
    return Promise.resolve(matches.map(copyRecord));
  }

  entryStatistics(query: EntryStatisticsQuery): Promise<HistoryStatistics> {
    const stats: HistoryStatistics = {
      totalEntries: 0,
      patientReported: 0,
      doctorDiagnosed: 0,
      recentEntries: 0,
    };

    for (const record of this.streams.values()) {
      if (query.patientId !== undefined && record.patientId !== query.patientId) {
        continue;
      }
      const count = record.statuses.length;
      stats.totalEntries += count;
      if (record.source === 'patient_reported') {
        stats.patientReported += count;
      } else {
        stats.doctorDiagnosed += count;
      }
      stats.recentEntries += record.dates.filter((date) => date >= query.since).length;
    }

    return Promise.resolve(stats);
  }

  countStatusReferences(statusId: string): Promise<number> {
    const count = [...this.streams.values()].filter((record) =>
      record.statuses.includes(statusId)
    ).length;
    return Promise.resolve(count);
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.streams.clear();
  }
}
