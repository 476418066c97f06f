import type { PaperRecord } from './types.js';

/** YYYY-MM-DD prefix of an Atom timestamp. */
export function datePart(iso: string): string {
  return iso.slice(0, 10);
}

/**
 * Most recent update day across all records, in whatever order they came.
 * Null when no record carries an `updated` value.
 */
export function latestUpdatedDate(records: readonly PaperRecord[]): string | null {
  let latest: string | null = null;
  for (const r of records) {
    if (!r.updated) continue;
    const d = datePart(r.updated);
    if (latest === null || d > latest) latest = d;
  }
  return latest;
}

// Prefix match so both 2024-01-02T09:00:00Z and 2024-01-02 count.
export function filterByDate(records: readonly PaperRecord[], date: string): PaperRecord[] {
  return records.filter((r) => r.updated !== null && r.updated.startsWith(date));
}
