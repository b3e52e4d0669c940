/**
 * Chart Repository Interface (Port)
 *
 * Per-examination chart cells, keyed by (patient, examination, quadrant,
 * position). `createChart` must write all cells or none.
 *
 * Implementations:
 * - PostgresChartRepository (@dentalcore/infrastructure)
 * - InMemoryChartRepository (below, for development and tests)
 *
 * @module domain/tooth-history/chart-repository
 */

import type { ChartCell, ChartCellPatch, Quadrant, ToothPosition } from '@dentalcore/types';
import type { StatusReferenceCounter } from './status-catalog-repository.js';

export interface ChartCellKey {
  patientId: string;
  examinationId: string;
  quadrant: Quadrant;
  position: ToothPosition;
}

export interface UpsertCellResult {
  cell: ChartCell;
  created: boolean;
}

export interface ChartRepository extends StatusReferenceCounter {
  /**
   * Atomically create the cells of one examination. Returns false without
   * writing when any cell of that examination already exists.
   */
  createChart(patientId: string, examinationId: string, cells: ChartCell[]): Promise<boolean>;

  findCells(patientId: string, examinationId: string): Promise<ChartCell[]>;

  findCell(key: ChartCellKey): Promise<ChartCell | null>;

  /**
   * Apply a patch to an existing cell; null when the cell does not exist
   */
  updateCell(key: ChartCellKey, patch: ChartCellPatch, now: Date): Promise<ChartCell | null>;

  /**
   * Apply a patch, inserting `defaults` first when the cell is missing
   */
  upsertCell(defaults: ChartCell, patch: ChartCellPatch, now: Date): Promise<UpsertCellResult>;
}

export function applyCellPatch(cell: ChartCell, patch: ChartCellPatch, now: Date): ChartCell {
  return {
    ...cell,
    diagnosis: patch.diagnosis ?? cell.diagnosis,
    treatmentPerformed: patch.treatmentPerformed ?? cell.treatmentPerformed,
    status: patch.status ?? cell.status,
    updatedAt: now,
  };
}

function cellKeyOf(key: ChartCellKey): string {
  return `${key.patientId}|${key.examinationId}|${key.quadrant}|${key.position}`;
}

/**
 * In-memory chart store for development and tests
 */
export class InMemoryChartRepository implements ChartRepository {
  private readonly cells = new Map<string, ChartCell>();

  createChart(patientId: string, examinationId: string, cells: ChartCell[]): Promise<boolean> {
    const exists = [...this.cells.values()].some(
      (cell) => cell.patientId === patientId && cell.examinationId === examinationId
    );
    if (exists) {
      return Promise.resolve(false);
    }

    for (const cell of cells) {
      this.cells.set(cellKeyOf(cell), { ...cell });
    }
    return Promise.resolve(true);
  }

  findCells(patientId: string, examinationId: string): Promise<ChartCell[]> {
    const matches = [...this.cells.values()].filter(
      (cell) => cell.patientId === patientId && cell.examinationId === examinationId
    );
    return Promise.resolve(matches.map((cell) => ({ ...cell })));
  }

  findCell(key: ChartCellKey): Promise<ChartCell | null> {
    const cell = this.cells.get(cellKeyOf(key));
    return Promise.resolve(cell ? { ...cell } : null);
  }

  updateCell(key: ChartCellKey, patch: ChartCellPatch, now: Date): Promise<ChartCell | null> {
    const existing = this.cells.get(cellKeyOf(key));
    if (!existing) {
      return Promise.resolve(null);
    }
    const updated = applyCellPatch(existing, patch, now);
    this.cells.set(cellKeyOf(key), updated);
    return Promise.resolve({ ...updated });
  }

  upsertCell(defaults: ChartCell, patch: ChartCellPatch, now: Date): Promise<UpsertCellResult> {
    const existing = this.cells.get(cellKeyOf(defaults));
    const updated = applyCellPatch(existing ?? defaults, patch, now);
    this.cells.set(cellKeyOf(defaults), updated);
    return Promise.resolve({ cell: { ...updated }, created: existing === undefined });
  }

  countStatusReferences(statusId: string): Promise<number> {
    const count = [...this.cells.values()].filter((cell) => cell.status === statusId).length;
    return Promise.resolve(count);
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.cells.clear();
  }
}
