/**
 * Status Resolver
 *
 * Derives the clinically authoritative status of a tooth. The doctor's most
 * recent diagnosis always outranks the patient's most recent report,
 * whichever is dated later; a tooth with no history is `normal`.
 */

import {
  DEFAULT_STATUS_ID,
  type FullToothHistory,
  type HistorySource,
  type HistoryStreamView,
  type StatusDisplay,
  type ToothNumber,
} from '@dentalcore/types';
import type { StatusCatalogService, StatusDisplayLookup } from './status-catalog-service.js';
import { toFullHistory, type ToothHistoryLedger } from './tooth-history-ledger.js';
import { ALL_TOOTH_NUMBERS, parseToothNumber } from './tooth-number.js';

export type CurrentStatusSource = HistorySource | 'default';

export interface StreamSummary {
  streamId: string;
  entryCount: number;
  currentStatus: string;
  currentDescription: string;
  currentDate: string;
}

export interface CurrentToothStatus {
  toothNumber: ToothNumber;
  status: string;
  source: CurrentStatusSource;
  display: StatusDisplay;
  patientStream: StreamSummary | null;
  doctorStream: StreamSummary | null;
}

export interface StatusResolverOptions {
  ledger: ToothHistoryLedger;
  catalog: StatusCatalogService;
}

function summarize(stream: HistoryStreamView | null): StreamSummary | null {
  if (!stream) {
    return null;
  }
  return {
    streamId: stream.streamId,
    entryCount: stream.entryCount,
    currentStatus: stream.currentStatus,
    currentDescription: stream.currentDescription,
    currentDate: stream.currentDate,
  };
}

/**
 * Apply the precedence rule: doctor_diagnosed, then patient_reported, then
 * the default status
 */
export function selectCurrentStatus(history: FullToothHistory): {
  status: string;
  source: CurrentStatusSource;
} {
  if (history.doctor_diagnosed) {
    return { status: history.doctor_diagnosed.currentStatus, source: 'doctor_diagnosed' };
  }
  if (history.patient_reported) {
    return { status: history.patient_reported.currentStatus, source: 'patient_reported' };
  }
  return { status: DEFAULT_STATUS_ID, source: 'default' };
}

export function resolveCurrentStatus(
  toothNumber: ToothNumber,
  history: FullToothHistory,
  lookup: StatusDisplayLookup
): CurrentToothStatus {
  const { status, source } = selectCurrentStatus(history);
  return {
    toothNumber,
    status,
    source,
    display: lookup(status),
    patientStream: summarize(history.patient_reported),
    doctorStream: summarize(history.doctor_diagnosed),
  };
}

export class StatusResolver {
  private readonly ledger: ToothHistoryLedger;
  private readonly catalog: StatusCatalogService;

  constructor(options: StatusResolverOptions) {
    this.ledger = options.ledger;
    this.catalog = options.catalog;
  }

  async currentStatus(patientId: string, toothNumber: unknown): Promise<CurrentToothStatus> {
    const tooth = parseToothNumber(toothNumber);
    const history = await this.ledger.fullHistory(patientId, tooth);
    const { status } = selectCurrentStatus(history);
    const display = await this.catalog.display(status);

    return resolveCurrentStatus(tooth, history, () => display);
  }

  /**
   * Current status of all 32 teeth in FDI order, history or not
   */
  async mouthSummary(patientId: string): Promise<CurrentToothStatus[]> {
    const streams = await this.ledger.streamsForPatient(patientId);
    const lookup = await this.catalog.displayLookup();

    return ALL_TOOTH_NUMBERS.map((toothNumber) =>
      resolveCurrentStatus(
        toothNumber,
        toFullHistory(streams.filter((stream) => stream.toothNumber === toothNumber)),
        lookup
      )
    );
  }
}

export function createStatusResolver(options: StatusResolverOptions): StatusResolver {
  return new StatusResolver(options);
}
