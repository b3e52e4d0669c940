/**
 * Common schemas shared across the ledger
 */
import { z } from "zod";

/**
 * Opaque identifier of a patient, examination or user owned by the
 * surrounding clinic application
 */
export const EntityIdSchema = z
  .string()
  .trim()
  .min(1, "Identifier must not be empty")
  .max(128, "Identifier too long")
  .describe("Opaque entity identifier");

/**
 * Calendar date with day granularity (YYYY-MM-DD)
 */
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be formatted as YYYY-MM-DD")
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00.000Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
  }, "Date is not a valid calendar date")
  .describe("ISO 8601 calendar date");

/**
 * Hex color (#RRGGBB)
 */
export const HexColorSchema = z
  .string()
  .regex(/^#[0-9A-Fa-f]{6}$/, "Color must be formatted as #RRGGBB")
  .describe("Hex color");

/**
 * ISO 8601 timestamp
 */
export const TimestampSchema = z.coerce.date().describe("ISO 8601 timestamp");

/**
 * Correlation ID for request tracing
 */
export const CorrelationIdSchema = z.string().min(1).max(128).describe("Request correlation ID");

export type EntityId = z.infer<typeof EntityIdSchema>;
export type IsoDate = z.infer<typeof IsoDateSchema>;
export type HexColor = z.infer<typeof HexColorSchema>;
export type Timestamp = z.infer<typeof TimestampSchema>;
export type CorrelationId = z.infer<typeof CorrelationIdSchema>;
