/**
 * @daybook/ledger: Entry ordering.
 *
 * Defines the total order over a bank's entries: business date, then time
 * of day, then insertion instant, then id. The date/time pair is the source
 * of truth; the stored `entryAt` field is only a cache of it.
 *
 * Timestamps are wall-clock values encoded as UTC epoch milliseconds, so
 * ordering never depends on the host timezone.
 */

import type { Entry, TimeOfDay } from "@daybook/types";

/** Earliest instant a JS Date can hold. Unparseable entries sort here. */
export const MIN_TIMESTAMP = -8_640_000_000_000_000;

const WITH_SECONDS = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;
const WITHOUT_SECONDS = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2})$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toTimestamp(parts: readonly number[]): number | undefined {
  const [year = 0, month = 0, day = 0, hour = 0, minute = 0, second = 0] = parts;
  if (year < 1 || month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  // Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not.
  const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second));
  date.setUTCFullYear(year);
  return date.getTime();
}

function parseWith(pattern: RegExp, text: string): number | undefined {
  const match = pattern.exec(text);
  if (match === null) return undefined;
  return toTimestamp(match.slice(1).map(Number));
}

/**
 * Canonical timestamp of an entry's date and time.
 *
 * Tries `YYYY-MM-DD HH:MM:SS`, then `YYYY-MM-DD HH:MM`. A missing date
 * defaults to 1970-01-01 and a missing time to 00:00:00; anything else
 * that fails both formats returns MIN_TIMESTAMP. Pure.
 */
export function entryTimestamp(date: unknown, time: unknown): number {
  const d = date === undefined ? "1970-01-01" : date;
  const t = time === undefined ? "00:00:00" : time;
  if (typeof d !== "string" || typeof t !== "string") {
    return MIN_TIMESTAMP;
  }

  const text = `${d} ${t}`;
  return (
    parseWith(WITH_SECONDS, text) ??
    parseWith(WITHOUT_SECONDS, text) ??
    MIN_TIMESTAMP
  );
}

/**
 * `HH:MM:SS` of a canonical timestamp.
 */
export function normalizeTime(timestamp: number): TimeOfDay {
  if (timestamp === MIN_TIMESTAMP) {
    return "00:00:00";
  }
  const d = new Date(timestamp);
  const hh = String(d.getUTCHours()).padStart(2, "0");
  const mm = String(d.getUTCMinutes()).padStart(2, "0");
  const ss = String(d.getUTCSeconds()).padStart(2, "0");
  return `${hh}:${mm}:${ss}`;
}

type Orderable = Pick<Entry, "id" | "date" | "time" | "createdAt">;

function compareKeys(
  aTimestamp: number,
  a: Orderable,
  bTimestamp: number,
  b: Orderable,
): number {
  if (aTimestamp !== bTimestamp) return aTimestamp < bTimestamp ? -1 : 1;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}

/**
 * Comparator for ascending entry order.
 */
export function compareEntries(a: Orderable, b: Orderable): number {
  return compareKeys(
    entryTimestamp(a.date, a.time),
    a,
    entryTimestamp(b.date, b.time),
    b,
  );
}

/**
 * Entries in ascending order, each paired with its canonical timestamp.
 * Parses every entry once.
 */
export function sortEntries<T extends Orderable>(
  entries: readonly T[],
): { readonly entry: T; readonly timestamp: number }[] {
  return entries
    .map((entry) => ({ entry, timestamp: entryTimestamp(entry.date, entry.time) }))
    .sort((x, y) => compareKeys(x.timestamp, x.entry, y.timestamp, y.entry));
}
