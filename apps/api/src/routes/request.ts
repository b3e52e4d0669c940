/**
 * Request parsing helpers shared by the tooth history routes
 */

import { z } from 'zod';
import { ValidationError } from '@dentalcore/core';
import { EntityIdSchema } from '@dentalcore/types';

/**
 * Parse params, query or body; failures surface as 400 through the error handler
 */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, result.error.flatten());
  }
  return result.data;
}

export const PatientParamsSchema = z.object({
  patientId: EntityIdSchema,
});

/** Tooth number stays a string here; the ledger rejects non-FDI codes */
export const ToothParamsSchema = PatientParamsSchema.extend({
  toothNumber: z.string().min(1).max(8),
});

export const ExaminationParamsSchema = PatientParamsSchema.extend({
  examinationId: EntityIdSchema,
});

export const BooleanQuerySchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');
