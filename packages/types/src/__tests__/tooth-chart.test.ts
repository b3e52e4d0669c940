import { describe, it, expect } from 'vitest';
import {
  AppendHistoryInputSchema,
  CHART_CELLS_PER_EXAMINATION,
  ChartCellPatchSchema,
  FDI_TOOTH_NUMBERS,
  IsoDateSchema,
  QUADRANT_NAMES,
  RegisterStatusInputSchema,
  ToothNumberSchema,
  UpdateStatusInputSchema,
  isToothNumber,
  isToothPosition,
} from '../index.js';

describe('FDI tooth numbering', () => {
  it('should enumerate 32 permanent teeth', () => {
    expect(FDI_TOOTH_NUMBERS).toHaveLength(32);
    expect(CHART_CELLS_PER_EXAMINATION).toBe(32);
  });

  it.each([11, 18, 21, 28, 31, 38, 41, 48])('should accept %i', (tooth) => {
    expect(isToothNumber(tooth)).toBe(true);
    expect(ToothNumberSchema.safeParse(tooth).success).toBe(true);
  });

  it.each([0, 10, 19, 20, 29, 39, 49, 51, 11.5])('should reject %d', (tooth) => {
    expect(isToothNumber(tooth)).toBe(false);
    expect(ToothNumberSchema.safeParse(tooth).success).toBe(false);
  });

  it('should reject non-numeric values', () => {
    expect(isToothNumber('21')).toBe(false);
  });

  it('should validate positions within a quadrant', () => {
    expect(isToothPosition(1)).toBe(true);
    expect(isToothPosition(8)).toBe(true);
    expect(isToothPosition(9)).toBe(false);
    expect(isToothPosition(0)).toBe(false);
  });

  it('should name quadrants clockwise from the upper right', () => {
    expect(QUADRANT_NAMES).toEqual({
      1: 'upper_right',
      2: 'upper_left',
      3: 'lower_left',
      4: 'lower_right',
    });
  });
});

describe('IsoDateSchema', () => {
  it('should accept calendar dates', () => {
    expect(IsoDateSchema.safeParse('2024-02-29').success).toBe(true);
  });

  it('should reject impossible dates', () => {
    expect(IsoDateSchema.safeParse('2023-02-29').success).toBe(false);
    expect(IsoDateSchema.safeParse('2024-13-01').success).toBe(false);
  });

  it('should reject timestamps and other formats', () => {
    expect(IsoDateSchema.safeParse('2024-03-01T10:00:00Z').success).toBe(false);
    expect(IsoDateSchema.safeParse('01/03/2024').success).toBe(false);
  });
});

describe('RegisterStatusInputSchema', () => {
  it('should apply catalog defaults', () => {
    const parsed = RegisterStatusInputSchema.parse({ id: 'chipped_edge' });

    expect(parsed).toEqual({
      id: 'chipped_edge',
      description: '',
      category: 'custom',
      color: '#808080',
      sortOrder: 0,
      createdBy: null,
    });
  });

  it('should reject malformed colors', () => {
    expect(RegisterStatusInputSchema.safeParse({ id: 'x', color: 'red' }).success).toBe(false);
  });

  it('should reject unknown categories', () => {
    expect(RegisterStatusInputSchema.safeParse({ id: 'x', category: 'cosmetic' }).success).toBe(
      false
    );
  });
});

describe('UpdateStatusInputSchema', () => {
  it('should require at least one field', () => {
    expect(UpdateStatusInputSchema.safeParse({}).success).toBe(false);
  });

  it('should not allow the identifier to change', () => {
    expect(UpdateStatusInputSchema.safeParse({ id: 'renamed' }).success).toBe(false);
  });

  it('should accept partial patches', () => {
    expect(UpdateStatusInputSchema.parse({ color: '#123456' })).toEqual({ color: '#123456' });
  });
});

describe('AppendHistoryInputSchema', () => {
  it('should default the description and leave the date unset', () => {
    const parsed = AppendHistoryInputSchema.parse({
      patientId: 'patient-1',
      toothNumber: 21,
      source: 'doctor_diagnosed',
      status: 'caries',
    });

    expect(parsed.description).toBe('');
    expect(parsed.date).toBeUndefined();
  });

  it('should reject unknown sources', () => {
    const result = AppendHistoryInputSchema.safeParse({
      patientId: 'patient-1',
      toothNumber: 21,
      source: 'hygienist_noted',
      status: 'caries',
    });

    expect(result.success).toBe(false);
  });
});

describe('ChartCellPatchSchema', () => {
  it('should reject empty patches', () => {
    expect(ChartCellPatchSchema.safeParse({}).success).toBe(false);
  });

  it('should reject fields outside the cell', () => {
    expect(ChartCellPatchSchema.safeParse({ quadrant: 2 }).success).toBe(false);
  });
});
