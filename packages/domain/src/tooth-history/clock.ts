/**
 * Clock port
 *
 * Source of "today" for default observation dates and of timestamps for
 * record bookkeeping. Dates use UTC day boundaries.
 */

export interface Clock {
  /** Current calendar date, YYYY-MM-DD */
  today(): string;
  now(): Date;
}

export const systemClock: Clock = {
  today: () => new Date().toISOString().slice(0, 10),
  now: () => new Date(),
};

/**
 * Clock pinned to a fixed instant
 */
export function createFixedClock(instant: Date | string): Clock {
  const fixed = typeof instant === 'string' ? new Date(instant) : instant;
  return {
    today: () => fixed.toISOString().slice(0, 10),
    now: () => new Date(fixed.getTime()),
  };
}

/**
 * Shift a YYYY-MM-DD date by a number of days
 */
export function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}
