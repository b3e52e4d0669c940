/**
 * @fileoverview Tooth Chart & History Schemas
 *
 * FDI tooth numbering, history stream views, timeline entries and the
 * per-examination chart cells.
 *
 * @module types/schemas/tooth-chart
 */

import { z } from 'zod';
import { EntityIdSchema, IsoDateSchema } from './common.js';
import { StatusIdSchema } from './dental-status.js';

// =============================================================================
// FDI TOOTH NUMBERING
// =============================================================================

/**
 * FDI two-digit notation (quadrant * 10 + position), permanent dentition
 */
export const FDI_TOOTH_NUMBERS = [
  // Upper right (Q1)
  11, 12, 13, 14, 15, 16, 17, 18,
  // Upper left (Q2)
  21, 22, 23, 24, 25, 26, 27, 28,
  // Lower left (Q3)
  31, 32, 33, 34, 35, 36, 37, 38,
  // Lower right (Q4)
  41, 42, 43, 44, 45, 46, 47, 48,
] as const;

export type ToothNumber = (typeof FDI_TOOTH_NUMBERS)[number];

export const QUADRANTS = [1, 2, 3, 4] as const;
export type Quadrant = (typeof QUADRANTS)[number];

export const TOOTH_POSITIONS = [1, 2, 3, 4, 5, 6, 7, 8] as const;
export type ToothPosition = (typeof TOOTH_POSITIONS)[number];

export const QUADRANT_NAMES = {
  1: 'upper_right',
  2: 'upper_left',
  3: 'lower_left',
  4: 'lower_right',
} as const satisfies Record<Quadrant, string>;

export type QuadrantName = (typeof QUADRANT_NAMES)[Quadrant];

const TOOTH_NUMBER_SET: ReadonlySet<number> = new Set<number>(FDI_TOOTH_NUMBERS);

export function isToothNumber(value: unknown): value is ToothNumber {
  return typeof value === 'number' && TOOTH_NUMBER_SET.has(value);
}

export function isQuadrant(value: unknown): value is Quadrant {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

export function isToothPosition(value: unknown): value is ToothPosition {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 8;
}

export const ToothNumberSchema = z
  .number()
  .int()
  .refine(isToothNumber, 'Tooth number must be a valid FDI code (11-18, 21-28, 31-38, 41-48)');

export const QuadrantSchema = z.number().int().refine(isQuadrant, 'Quadrant must be 1-4');

export const ToothPositionSchema = z
  .number()
  .int()
  .refine(isToothPosition, 'Tooth position must be 1-8');

// =============================================================================
// HISTORY STREAMS
// =============================================================================

export const HISTORY_SOURCES = ['patient_reported', 'doctor_diagnosed'] as const;
export const HistorySourceSchema = z.enum(HISTORY_SOURCES);
export type HistorySource = z.infer<typeof HistorySourceSchema>;

/**
 * One observation to record. Status ids are validated against the catalog
 * by the ledger, not here.
 */
export const AppendHistoryInputSchema = z.object({
  patientId: EntityIdSchema,
  /** Checked against the FDI codes by the ledger */
  toothNumber: z.union([z.number(), z.string()]),
  source: HistorySourceSchema,
  status: StatusIdSchema,
  description: z.string().max(2000).default(''),
  date: IsoDateSchema.optional(),
});

export type AppendHistoryInput = z.input<typeof AppendHistoryInputSchema>;

/**
 * Read model of a history stream. `current*` fields mirror the tail of the
 * sequences and are computed on read.
 */
export interface HistoryStreamView {
  streamId: string;
  patientId: string;
  toothNumber: ToothNumber;
  source: HistorySource;
  statuses: string[];
  descriptions: string[];
  dates: string[];
  entryCount: number;
  currentStatus: string;
  currentDescription: string;
  currentDate: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface FullToothHistory {
  patient_reported: HistoryStreamView | null;
  doctor_diagnosed: HistoryStreamView | null;
}

export interface TimelineEntry {
  date: string;
  source: HistorySource;
  status: string;
  description: string;
  streamId: string;
  /** Position of the entry within its stream */
  index: number;
}

export const HistoryStatisticsQuerySchema = z.object({
  patientId: EntityIdSchema.optional(),
  recentDays: z.number().int().min(1).max(3650).optional(),
});

export type HistoryStatisticsQuery = z.infer<typeof HistoryStatisticsQuerySchema>;

export interface HistoryStatistics {
  totalEntries: number;
  patientReported: number;
  doctorDiagnosed: number;
  /** Entries dated on or after today minus `recentDays` days */
  recentEntries: number;
}

// =============================================================================
// CHART CELLS
// =============================================================================

export const CHART_CELLS_PER_EXAMINATION = QUADRANTS.length * TOOTH_POSITIONS.length;

export interface ChartCell {
  patientId: string;
  examinationId: string;
  quadrant: Quadrant;
  position: ToothPosition;
  toothNumber: ToothNumber;
  diagnosis: string;
  treatmentPerformed: string;
  status: string;
  createdAt: Date;
  updatedAt: Date;
}

export const ChartCellPatchSchema = z
  .object({
    diagnosis: z.string().max(2000),
    treatmentPerformed: z.string().max(2000),
    status: StatusIdSchema,
  })
  .partial()
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, 'At least one field must be updated');

export type ChartCellPatch = z.infer<typeof ChartCellPatchSchema>;

export const MISSING_CELL_POLICIES = ['create-missing', 'strict'] as const;
export const MissingCellPolicySchema = z.enum(MISSING_CELL_POLICIES);
export type MissingCellPolicy = z.infer<typeof MissingCellPolicySchema>;

export type ChartByQuadrant = Record<QuadrantName, ChartCell[]>;
