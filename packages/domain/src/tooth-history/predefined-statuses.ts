/**
 * Predefined status seed set, loaded from predefined-statuses.json
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { PredefinedStatusSchema, type PredefinedStatus } from '@dentalcore/types';

const PREDEFINED_STATUSES_FILE = new URL('./predefined-statuses.json', import.meta.url);

let cached: readonly PredefinedStatus[] | null = null;

export function loadPredefinedStatuses(): readonly PredefinedStatus[] {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(PREDEFINED_STATUSES_FILE, 'utf8'));
    cached = z.array(PredefinedStatusSchema).parse(raw);
  }
  return cached;
}
