/**
 * Timestamp helpers shared by the episodic store.
 */

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

/** Largest magnitude a Date can hold */
const MAX_TIMESTAMP_MS = 8.64e15;

export type TimestampInput = string | number | Date;

function inDateRange(ms: number): boolean {
  return Number.isFinite(ms) && Math.abs(ms) <= MAX_TIMESTAMP_MS;
}

/**
 * Parse an ISO-8601 string, epoch milliseconds or Date.
 * Returns `undefined` when the value cannot be read as a point in time.
 */
export function parseTimestamp(value: TimestampInput | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;

  if (value instanceof Date) {
    const ms = value.getTime();
    return inDateRange(ms) ? ms : undefined;
  }

  if (typeof value === 'number') {
    return inDateRange(value) ? value : undefined;
  }

  if (value.trim() === '') return undefined;

  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}

/**
 * ISO string for an epoch value, or `undefined` outside the Date range.
 */
export function toIsoString(ms: number): string | undefined {
  return inDateRange(ms) ? new Date(ms).toISOString() : undefined;
}

/**
 * Normalize a timestamp input to the stored string form.
 * Strings are kept verbatim, so a malformed caller value survives unchanged;
 * other unreadable values become the current time.
 */
export function toStoredTimestamp(value: TimestampInput): string {
  if (typeof value === 'string') return value;
  const ms = parseTimestamp(value) ?? Date.now();
  return new Date(ms).toISOString();
}
