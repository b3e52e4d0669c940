/**
 * @fileoverview Tests for per-examination chart snapshots
 *
 * @module domain/__tests__/chart-snapshot
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '@dentalcore/core';
import type { ChartCell } from '@dentalcore/types';
import {
  ChartNotInitializedError,
  ChartSnapshotService,
  InMemoryChartRepository,
  InMemoryStatusCatalogRepository,
  InvalidToothNumberError,
  PersistenceFailureError,
  StatusCatalogService,
  UnknownStatusError,
  createFixedClock,
} from '../tooth-history/index.js';
import {
  TEST_NOW,
  createToothHistoryFixture,
  registerStatuses,
  type ToothHistoryFixture,
} from './tooth-history-fixtures.js';

const PATIENT = 'patient-1';
const EXAM = 'exam-1';

describe('ChartSnapshotService', () => {
  let fixture: ToothHistoryFixture;

  beforeEach(async () => {
    fixture = createToothHistoryFixture();
    await fixture.catalog.seedPredefined();
    await registerStatuses(fixture.catalog, ['caries']);
  });

  describe('initialize', () => {
    it('should create 32 default cells', async () => {
      await expect(fixture.charts.initialize(PATIENT, EXAM)).resolves.toEqual({ created: true });

      const cells = await fixture.chartRepository.findCells(PATIENT, EXAM);
      expect(cells).toHaveLength(32);
      expect(cells.every((cell) => cell.status === 'normal')).toBe(true);
      expect(cells.every((cell) => cell.diagnosis === '' && cell.treatmentPerformed === '')).toBe(
        true
      );
    });

    it('should be a no-op for an examination that already has a chart', async () => {
      await fixture.charts.initialize(PATIENT, EXAM);

      await expect(fixture.charts.initialize(PATIENT, EXAM)).resolves.toEqual({ created: false });
      await expect(fixture.chartRepository.findCells(PATIENT, EXAM)).resolves.toHaveLength(32);
    });

    it('should create a separate chart per examination', async () => {
      await fixture.charts.initialize(PATIENT, EXAM);

      await expect(fixture.charts.initialize(PATIENT, 'exam-2')).resolves.toEqual({
        created: true,
      });
    });

    it('should reject blank identifiers', async () => {
      await expect(fixture.charts.initialize(' ', EXAM)).rejects.toBeInstanceOf(ValidationError);
    });

    it('should write nothing when storage fails', async () => {
      class FailingChartRepository extends InMemoryChartRepository {
        override createChart(): Promise<boolean> {
          return Promise.reject(new Error('disk full'));
        }
      }
      const repository = new FailingChartRepository();
      const clock = createFixedClock(TEST_NOW);
      const charts = new ChartSnapshotService({
        repository,
        catalog: new StatusCatalogService({
          repository: new InMemoryStatusCatalogRepository(),
          clock,
        }),
        clock,
      });

      await expect(charts.initialize(PATIENT, EXAM)).rejects.toBeInstanceOf(
        PersistenceFailureError
      );
      await expect(repository.findCells(PATIENT, EXAM)).resolves.toEqual([]);
    });
  });

  describe('getChart', () => {
    it('should group cells by quadrant name ordered by position', async () => {
      await fixture.charts.initialize(PATIENT, EXAM);

      const chart = await fixture.charts.getChart(PATIENT, EXAM);

      const toothNumbers = (cells: ChartCell[]) => cells.map((cell) => cell.toothNumber);
      expect(toothNumbers(chart.upper_right)).toEqual([11, 12, 13, 14, 15, 16, 17, 18]);
      expect(toothNumbers(chart.upper_left)).toEqual([21, 22, 23, 24, 25, 26, 27, 28]);
      expect(toothNumbers(chart.lower_left)).toEqual([31, 32, 33, 34, 35, 36, 37, 38]);
      expect(toothNumbers(chart.lower_right)).toEqual([41, 42, 43, 44, 45, 46, 47, 48]);
    });

    it('should return empty quadrants for an unknown examination', async () => {
      await expect(fixture.charts.getChart(PATIENT, 'exam-404')).resolves.toEqual({
        upper_right: [],
        upper_left: [],
        lower_left: [],
        lower_right: [],
      });
    });
  });

  describe('updateCell', () => {
    it('should update an existing cell', async () => {
      await fixture.charts.initialize(PATIENT, EXAM);

      const result = await fixture.charts.updateCell(PATIENT, EXAM, 3, 6, {
        diagnosis: 'occlusal lesion',
        status: 'caries',
      });

      expect(result.updated).toBe(true);
      expect(result.createdCell).toBe(false);
      expect(result.cell).toMatchObject({
        quadrant: 3,
        position: 6,
        toothNumber: 36,
        diagnosis: 'occlusal lesion',
        treatmentPerformed: '',
        status: 'caries',
      });

      await expect(fixture.charts.getCell(PATIENT, EXAM, 3, 6)).resolves.toMatchObject({
        status: 'caries',
      });
    });

    it('should create a missing cell with defaults under create-missing', async () => {
      const result = await fixture.charts.updateCell(PATIENT, EXAM, 2, 6, {
        treatmentPerformed: 'splint',
      });

      expect(result.createdCell).toBe(true);
      expect(result.cell).toMatchObject({
        patientId: PATIENT,
        examinationId: EXAM,
        toothNumber: 26,
        diagnosis: '',
        treatmentPerformed: 'splint',
        status: 'normal',
      });
    });

    it('should lay out the whole chart when a cell update comes first', async () => {
      await fixture.charts.updateCell(PATIENT, EXAM, 1, 6, { diagnosis: 'fissure' });

      await expect(fixture.charts.initialize(PATIENT, EXAM)).resolves.toEqual({ created: false });
      const chart = await fixture.charts.getChart(PATIENT, EXAM);
      expect(Object.values(chart).flat()).toHaveLength(32);
      expect(chart.upper_right[5]).toMatchObject({ toothNumber: 16, diagnosis: 'fissure' });
      expect(chart.lower_left[0]).toMatchObject({ toothNumber: 31, diagnosis: '', status: 'normal' });
    });

    it('should fail on a missing cell under strict', async () => {
      const strict = createToothHistoryFixture({ missingCellPolicy: 'strict' });

      await expect(
        strict.charts.updateCell(PATIENT, EXAM, 1, 1, { diagnosis: 'x' })
      ).rejects.toBeInstanceOf(ChartNotInitializedError);
      await expect(strict.charts.getCell(PATIENT, EXAM, 1, 1)).resolves.toBeNull();
    });

    it('should update existing cells under strict', async () => {
      const strict = createToothHistoryFixture({ missingCellPolicy: 'strict' });
      await strict.charts.initialize(PATIENT, EXAM);

      const result = await strict.charts.updateCell(PATIENT, EXAM, 1, 1, { diagnosis: 'x' });

      expect(result).toMatchObject({ updated: true, createdCell: false });
    });

    it('should validate the status against the catalog before writing', async () => {
      await expect(
        fixture.charts.updateCell(PATIENT, EXAM, 1, 1, { status: 'not_a_status' })
      ).rejects.toBeInstanceOf(UnknownStatusError);
      await expect(fixture.charts.getCell(PATIENT, EXAM, 1, 1)).resolves.toBeNull();
    });

    it.each([
      [0, 1],
      [5, 1],
      [1, 0],
      [1, 9],
    ])('should reject quadrant %i position %i', async (quadrant, position) => {
      await expect(
        fixture.charts.updateCell(PATIENT, EXAM, quadrant, position, { diagnosis: 'x' })
      ).rejects.toBeInstanceOf(InvalidToothNumberError);
    });

    it('should reject empty patches', async () => {
      await expect(fixture.charts.updateCell(PATIENT, EXAM, 1, 1, {})).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });
});
