/**
 * @fileoverview Dental Status Catalog Schemas
 *
 * A status is the vocabulary shared by history streams and chart cells:
 * a stable identifier plus presentation metadata (label, category, color).
 *
 * @module types/schemas/dental-status
 */

import { z } from 'zod';
import { EntityIdSchema, HexColorSchema, TimestampSchema } from './common.js';

// =============================================================================
// ENUMS & CONSTANTS
// =============================================================================

export const STATUS_CATEGORIES = [
  'healthy',
  'decay',
  'restoration',
  'prosthetic',
  'endodontic',
  'periodontal',
  'missing',
  'orthodontic',
  'trauma',
  'anomaly',
  'planned',
  'other',
  'custom',
] as const;

export const StatusCategorySchema = z.enum(STATUS_CATEGORIES);
export type StatusCategory = z.infer<typeof StatusCategorySchema>;

/** Status assumed for a tooth with no recorded history */
export const DEFAULT_STATUS_ID = 'normal';

/** Longest chart label a status code may carry */
export const STATUS_CODE_MAX_LENGTH = 16;

/** Color used when a status cannot be resolved in the catalog */
export const FALLBACK_STATUS_COLOR = '#808080';

// =============================================================================
// STATUS
// =============================================================================

/**
 * Status identifier. Case-sensitive and immutable once registered.
 */
export const StatusIdSchema = z
  .string()
  .trim()
  .min(1, 'Status identifier must not be empty')
  .max(64, 'Status identifier too long');

export const StatusSchema = z.object({
  id: StatusIdSchema,
  code: z.string().min(1).max(STATUS_CODE_MAX_LENGTH),
  displayName: z.string().min(1).max(100),
  description: z.string().max(500),
  category: StatusCategorySchema,
  color: HexColorSchema,
  active: z.boolean(),
  sortOrder: z.number().int(),
  createdBy: EntityIdSchema.nullable(),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
});

export type Status = z.infer<typeof StatusSchema>;

/**
 * Registration input. Label and code fall back to the identifier.
 */
export const RegisterStatusInputSchema = z.object({
  id: StatusIdSchema,
  code: z.string().trim().min(1).max(STATUS_CODE_MAX_LENGTH).optional(),
  displayName: z.string().trim().min(1).max(100).optional(),
  description: z.string().max(500).default(''),
  category: StatusCategorySchema.default('custom'),
  color: HexColorSchema.default(FALLBACK_STATUS_COLOR),
  sortOrder: z.number().int().default(0),
  createdBy: EntityIdSchema.nullable().default(null),
});

export type RegisterStatusInput = z.input<typeof RegisterStatusInputSchema>;

export const UpdateStatusInputSchema = z
  .object({
    code: z.string().trim().min(1).max(STATUS_CODE_MAX_LENGTH),
    displayName: z.string().trim().min(1).max(100),
    description: z.string().max(500),
    category: StatusCategorySchema,
    color: HexColorSchema,
    sortOrder: z.number().int(),
  })
  .partial()
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, 'At least one field must be updated');

export type UpdateStatusInput = z.infer<typeof UpdateStatusInputSchema>;

export const StatusFilterSchema = z.object({
  category: StatusCategorySchema.optional(),
  active: z.boolean().optional(),
});

export type StatusFilter = z.infer<typeof StatusFilterSchema>;

/**
 * Entry of the predefined seed file
 */
export const PredefinedStatusSchema = z.object({
  id: StatusIdSchema,
  code: z.string().min(1).max(STATUS_CODE_MAX_LENGTH),
  displayName: z.string().min(1).max(100),
  category: StatusCategorySchema,
  color: HexColorSchema,
});

export type PredefinedStatus = z.infer<typeof PredefinedStatusSchema>;

/**
 * Presentation metadata for a status id. `resolved: false` marks ids that
 * are no longer (or never were) in the catalog.
 */
export interface StatusDisplay {
  id: string;
  displayName: string;
  code: string;
  category: StatusCategory;
  color: string;
  active: boolean;
  resolved: boolean;
}
