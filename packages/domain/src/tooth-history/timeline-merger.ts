/**
 * Timeline Merger
 *
 * Flattens both streams of a tooth into one newest-first sequence. The
 * sort is stable over patient_reported entries followed by doctor_diagnosed
 * entries, so on equal dates the patient's report comes first and entries
 * of one stream keep their recorded order. Recomputed on every call.
 */

import type { FullToothHistory, HistoryStreamView, TimelineEntry } from '@dentalcore/types';
import type { ToothHistoryLedger } from './tooth-history-ledger.js';

function flatten(stream: HistoryStreamView | null): TimelineEntry[] {
  if (!stream) {
    return [];
  }
  return stream.statuses.map((status, index) => ({
    date: stream.dates[index] ?? '',
    source: stream.source,
    status,
    description: stream.descriptions[index] ?? '',
    streamId: stream.streamId,
    index,
  }));
}

export function mergeTimeline(history: FullToothHistory): TimelineEntry[] {
  const entries = [...flatten(history.patient_reported), ...flatten(history.doctor_diagnosed)];

  // Array.prototype.sort is stable: same-day entries of one stream stay in
  // index order (oldest first) even though dates run newest first
  return entries.sort((a, b) => (a.date === b.date ? 0 : a.date < b.date ? 1 : -1));
}

export interface TimelineMergerOptions {
  ledger: ToothHistoryLedger;
}

export class TimelineMerger {
  private readonly ledger: ToothHistoryLedger;

  constructor(options: TimelineMergerOptions) {
    this.ledger = options.ledger;
  }

  async timeline(patientId: string, toothNumber: unknown): Promise<TimelineEntry[]> {
    return mergeTimeline(await this.ledger.fullHistory(patientId, toothNumber));
  }
}
