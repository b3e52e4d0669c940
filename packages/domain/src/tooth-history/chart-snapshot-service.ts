/**
 * Chart Snapshot Service
 *
 * Creates and edits the per-examination chart: 4 quadrants x 8 positions,
 * a working copy for one visit that is separate from the cross-visit
 * history streams.
 */

import { createLogger, ValidationError, type Logger } from '@dentalcore/core';
import {
  ChartCellPatchSchema,
  DEFAULT_STATUS_ID,
  EntityIdSchema,
  QUADRANTS,
  QUADRANT_NAMES,
  TOOTH_POSITIONS,
  isQuadrant,
  isToothPosition,
  type ChartByQuadrant,
  type ChartCell,
  type ChartCellPatch,
  type MissingCellPolicy,
} from '@dentalcore/types';
import { systemClock, type Clock } from './clock.js';
import type { ChartCellKey, ChartRepository } from './chart-repository.js';
import { ChartNotInitializedError, InvalidToothNumberError, withPersistence } from './errors.js';
import type { StatusCatalogService } from './status-catalog-service.js';
import { toothNumberOf } from './tooth-number.js';

export interface ChartSnapshotServiceOptions {
  repository: ChartRepository;
  catalog: StatusCatalogService;
  clock?: Clock;
  /** What `updateCell` does when the target cell is missing */
  missingCellPolicy?: MissingCellPolicy;
}

export interface InitializeChartResult {
  created: boolean;
}

export interface UpdateCellResult {
  updated: true;
  /** True when the cell was missing and created by this update */
  createdCell: boolean;
  cell: ChartCell;
}

function requireId(value: string, label: string): string {
  const result = EntityIdSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}`, result.error.issues);
  }
  return result.data;
}

function defaultCell(key: ChartCellKey, now: Date): ChartCell {
  return {
    ...key,
    toothNumber: toothNumberOf(key.quadrant, key.position),
    diagnosis: '',
    treatmentPerformed: '',
    status: DEFAULT_STATUS_ID,
    createdAt: now,
    updatedAt: now,
  };
}

function defaultChart(patientId: string, examinationId: string, now: Date): ChartCell[] {
  return QUADRANTS.flatMap((quadrant) =>
    TOOTH_POSITIONS.map((position) =>
      defaultCell({ patientId, examinationId, quadrant, position }, now)
    )
  );
}

/**
 * Group cells by quadrant name, each quadrant ordered by position
 */
export function groupByQuadrant(cells: readonly ChartCell[]): ChartByQuadrant {
  const chart: ChartByQuadrant = {
    upper_right: [],
    upper_left: [],
    lower_left: [],
    lower_right: [],
  };
  for (const cell of cells) {
    chart[QUADRANT_NAMES[cell.quadrant]].push(cell);
  }
  for (const quadrant of Object.values(chart)) {
    quadrant.sort((a, b) => a.position - b.position);
  }
  return chart;
}

export class ChartSnapshotService {
  private readonly repository: ChartRepository;
  private readonly catalog: StatusCatalogService;
  private readonly clock: Clock;
  private readonly missingCellPolicy: MissingCellPolicy;
  private readonly logger: Logger;

  constructor(options: ChartSnapshotServiceOptions) {
    this.repository = options.repository;
    this.catalog = options.catalog;
    this.clock = options.clock ?? systemClock;
    this.missingCellPolicy = options.missingCellPolicy ?? 'create-missing';
    this.logger = createLogger({ name: 'chart-snapshot' });
  }

  /**
   * Create all 32 cells of an examination's chart. A repeated call for the
   * same examination writes nothing and reports `created: false`.
   */
  async initialize(patientId: string, examinationId: string): Promise<InitializeChartResult> {
    const patient = requireId(patientId, 'patient id');
    const examination = requireId(examinationId, 'examination id');
    const now = this.clock.now();

    const cells = defaultChart(patient, examination, now);

    const created = await withPersistence(this.logger, 'chart.initialize', () =>
      this.repository.createChart(patient, examination, cells)
    );

    if (created) {
      this.logger.info(
        { patientId: patient, examinationId: examination, cells: cells.length },
        'Chart initialized'
      );
    } else {
      this.logger.debug(
        { patientId: patient, examinationId: examination },
        'Chart already initialized'
      );
    }
    return { created };
  }

  /**
   * Update one cell. Under the `create-missing` policy an examination without
   * a chart gets all 32 default cells before the patch is applied, so a chart
   * is never left partial; under `strict` a missing cell is an error.
   *
   * @throws ChartNotInitializedError under `strict` when the cell is missing
   */
  async updateCell(
    patientId: string,
    examinationId: string,
    quadrant: number,
    position: number,
    fields: ChartCellPatch
  ): Promise<UpdateCellResult> {
    const key = this.cellKey(patientId, examinationId, quadrant, position);

    const result = ChartCellPatchSchema.safeParse(fields);
    if (!result.success) {
      throw new ValidationError('Invalid chart cell update', result.error.issues);
    }
    const patch = result.data;

    if (patch.status !== undefined) {
      await this.catalog.requireActive(patch.status);
    }

    const now = this.clock.now();

    if (this.missingCellPolicy === 'strict') {
      const cell = await withPersistence(this.logger, 'chart.updateCell', () =>
        this.repository.updateCell(key, patch, now)
      );
      if (!cell) {
        throw new ChartNotInitializedError(key.patientId, key.examinationId);
      }
      this.logCellUpdate(key, patch, false);
      return { updated: true, createdCell: false, cell };
    }

    const defaults = defaultChart(key.patientId, key.examinationId, now);
    const chartCreated = await withPersistence(this.logger, 'chart.initialize', () =>
      this.repository.createChart(key.patientId, key.examinationId, defaults)
    );

    const { cell, created } = await withPersistence(this.logger, 'chart.updateCell', () =>
      this.repository.upsertCell(defaultCell(key, now), patch, now)
    );
    const createdCell = chartCreated || created;
    this.logCellUpdate(key, patch, createdCell);
    return { updated: true, createdCell, cell };
  }

  async getChart(patientId: string, examinationId: string): Promise<ChartByQuadrant> {
    const patient = requireId(patientId, 'patient id');
    const examination = requireId(examinationId, 'examination id');

    const cells = await withPersistence(this.logger, 'chart.read', () =>
      this.repository.findCells(patient, examination)
    );
    return groupByQuadrant(cells);
  }

  async getCell(
    patientId: string,
    examinationId: string,
    quadrant: number,
    position: number
  ): Promise<ChartCell | null> {
    const key = this.cellKey(patientId, examinationId, quadrant, position);
    return withPersistence(this.logger, 'chart.read', () => this.repository.findCell(key));
  }

  private cellKey(
    patientId: string,
    examinationId: string,
    quadrant: number,
    position: number
  ): ChartCellKey {
    if (!isQuadrant(quadrant) || !isToothPosition(position)) {
      throw new InvalidToothNumberError(`${quadrant}${position}`);
    }
    return {
      patientId: requireId(patientId, 'patient id'),
      examinationId: requireId(examinationId, 'examination id'),
      quadrant,
      position,
    };
  }

  private logCellUpdate(key: ChartCellKey, patch: ChartCellPatch, createdCell: boolean): void {
    const context = {
      patientId: key.patientId,
      examinationId: key.examinationId,
      quadrant: key.quadrant,
      position: key.position,
    };
    if (createdCell) {
      this.logger.warn(context, 'Chart cell was missing and has been created');
    }
    this.logger.info({ ...context, fields: Object.keys(patch) }, 'Chart cell updated');
  }
}

export function createChartSnapshotService(
  options: ChartSnapshotServiceOptions
): ChartSnapshotService {
  return new ChartSnapshotService(options);
}
