/**
 * PostgresChartRepository Tests
 */

import { describe, it, expect } from 'vitest';
import { RepositoryError, stringToLockKey } from '@dentalcore/core';
import { ALL_TOOTH_NUMBERS, positionOf, quadrantOf } from '@dentalcore/domain';
import type { ChartCell } from '@dentalcore/types';
import { PostgresChartRepository } from '../repositories/PostgresChartRepository.js';
import { createFakePool } from './fake-pool.js';

const NOW = new Date('2024-06-15T09:30:00.000Z');

function blankCells(): ChartCell[] {
  return ALL_TOOTH_NUMBERS.map((toothNumber) => ({
    patientId: 'patient-1',
    examinationId: 'exam-1',
    quadrant: quadrantOf(toothNumber),
    position: positionOf(toothNumber),
    toothNumber,
    diagnosis: '',
    treatmentPerformed: '',
    status: 'normal',
    createdAt: NOW,
    updatedAt: NOW,
  }));
}

function cellRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    patient_id: 'patient-1',
    examination_id: 'exam-1',
    quadrant: 2,
    position: 1,
    diagnosis: 'fracture',
    treatment_performed: '',
    status: 'normal',
    created_at: NOW,
    updated_at: NOW,
    ...overrides,
  };
}

describe('PostgresChartRepository', () => {
  describe('createChart', () => {
    it('should insert every cell under the examination advisory lock', async () => {
      const fake = createFakePool();
      const repository = new PostgresChartRepository({ pool: fake.pool });

      await expect(repository.createChart('patient-1', 'exam-1', blankCells())).resolves.toBe(true);

      const lock = fake.queries[2];
      expect(lock?.sql).toBe('SELECT pg_advisory_xact_lock($1)');
      expect(lock?.params).toEqual([stringToLockKey('chart:patient-1:exam-1')]);

      const insert = fake.queries[4];
      expect(insert?.sql).toContain('INSERT INTO dental_chart_cells');
      expect(insert?.sql).toContain('($280, $281, $282, $283, $284, $285, $286, $287, $288)');
      expect(insert?.params).toHaveLength(32 * 9);
      expect(insert?.params.slice(0, 4)).toEqual(['patient-1', 'exam-1', 1, 1]);
      expect(fake.statements().at(-1)).toBe('COMMIT');
    });

    it('should not insert when the examination already has cells', async () => {
      const fake = createFakePool();
      fake.when('SELECT 1 FROM dental_chart_cells', [{ '?column?': 1 }]);
      const repository = new PostgresChartRepository({ pool: fake.pool });

      await expect(repository.createChart('patient-1', 'exam-1', blankCells())).resolves.toBe(false);
      expect(fake.statements().some((sql) => sql.startsWith('INSERT'))).toBe(false);
    });
  });

  describe('findCell', () => {
    it('should map a row and derive the tooth number', async () => {
      const fake = createFakePool();
      fake.when('FROM dental_chart_cells', [cellRow()]);
      const repository = new PostgresChartRepository({ pool: fake.pool });

      const cell = await repository.findCell({
        patientId: 'patient-1',
        examinationId: 'exam-1',
        quadrant: 2,
        position: 1,
      });

      expect(cell?.toothNumber).toBe(21);
      expect(cell?.diagnosis).toBe('fracture');
      expect(cell?.treatmentPerformed).toBe('');
    });

    it('should reject a stored quadrant outside 1 to 4', async () => {
      const fake = createFakePool();
      fake.when('FROM dental_chart_cells', [cellRow({ quadrant: 5 })]);
      const repository = new PostgresChartRepository({ pool: fake.pool });

      await expect(
        repository.findCell({ patientId: 'patient-1', examinationId: 'exam-1', quadrant: 2, position: 1 })
      ).rejects.toBeInstanceOf(RepositoryError);
    });
  });

  describe('upsertCell', () => {
    it('should report whether the insert branch ran', async () => {
      const fake = createFakePool();
      fake.when('RETURNING *, (xmax = 0) AS was_created', [cellRow({ was_created: true })]);
      const repository = new PostgresChartRepository({ pool: fake.pool });
      const [defaults] = blankCells().filter((cell) => cell.toothNumber === 21);
      if (!defaults) throw new Error('missing tooth 21');

      const result = await repository.upsertCell(defaults, { diagnosis: 'fracture' }, NOW);

      expect(result.created).toBe(true);
      expect(result.cell.toothNumber).toBe(21);
      expect(fake.queries[0]?.params.slice(-3)).toEqual(['fracture', null, null]);
    });
  });

  describe('updateCell', () => {
    it('should return null when the cell does not exist', async () => {
      const fake = createFakePool();
      const repository = new PostgresChartRepository({ pool: fake.pool });

      await expect(
        repository.updateCell(
          { patientId: 'patient-1', examinationId: 'exam-1', quadrant: 1, position: 1 },
          { status: 'filling' },
          NOW
        )
      ).resolves.toBeNull();
    });
  });
});
