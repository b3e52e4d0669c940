/**
 * FDI tooth number value helpers
 *
 * Quadrant and position are always derived from the two-digit code so the
 * three can never drift apart.
 */

import {
  FDI_TOOTH_NUMBERS,
  isQuadrant,
  isToothNumber,
  isToothPosition,
  type Quadrant,
  type ToothNumber,
  type ToothPosition,
} from '@dentalcore/types';
import { InvalidToothNumberError } from './errors.js';

export const ALL_TOOTH_NUMBERS: readonly ToothNumber[] = FDI_TOOTH_NUMBERS;

/**
 * Parse a tooth number from a number or numeric string
 *
 * @throws InvalidToothNumberError when outside the 32 permanent-dentition codes
 */
export function parseToothNumber(value: unknown): ToothNumber {
  const candidate =
    typeof value === 'string' && /^\d{2}$/.test(value.trim()) ? Number(value.trim()) : value;

  if (!isToothNumber(candidate)) {
    throw new InvalidToothNumberError(value);
  }
  return candidate;
}

export function quadrantOf(toothNumber: ToothNumber): Quadrant {
  const quadrant = Math.floor(toothNumber / 10);
  if (!isQuadrant(quadrant)) {
    throw new InvalidToothNumberError(toothNumber);
  }
  return quadrant;
}

export function positionOf(toothNumber: ToothNumber): ToothPosition {
  const position = toothNumber % 10;
  if (!isToothPosition(position)) {
    throw new InvalidToothNumberError(toothNumber);
  }
  return position;
}

export function toothNumberOf(quadrant: Quadrant, position: ToothPosition): ToothNumber {
  return parseToothNumber(quadrant * 10 + position);
}
