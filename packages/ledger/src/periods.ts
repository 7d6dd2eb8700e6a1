/**
 * @daybook/ledger: Calendar helpers for report periods.
 *
 * All arithmetic is on `YYYY-MM-DD` strings through UTC dates, so the
 * host timezone only matters when reading the wall clock (`localDate`,
 * `localTime`).
 */

import { isIsoDate, isIsoMonth, isIsoYear } from "@daybook/types";
import type { IsoDate, TimeOfDay } from "@daybook/types";
import type { DateRange } from "./types.js";
import { LedgerError } from "./types.js";

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

function fromUtc(date: Date): IsoDate {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

function toUtc(date: IsoDate): Date {
  const [y = 0, m = 1, d = 1] = date.split("-").map(Number);
  return new Date(Date.UTC(y, m - 1, d));
}

/** Business date of a wall-clock instant. */
export function localDate(now: Date): IsoDate {
  return `${pad(now.getFullYear(), 4)}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/** Time of day of a wall-clock instant. */
export function localTime(now: Date): TimeOfDay {
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const d = toUtc(date);
  d.setUTCDate(d.getUTCDate() + days);
  return fromUtc(d);
}

// ─── Ranges ──────────────────────────────────────────────────────────────

function assertDate(value: string, label: string): void {
  if (!isIsoDate(value)) {
    throw new LedgerError("INVALID_RANGE", `${label} must be a YYYY-MM-DD date, got "${value}"`);
  }
}

export function dayRange(date: IsoDate): DateRange {
  assertDate(date, "date");
  return { start: date, end: date };
}

/**
 * Monday of the week containing `today`, through `today`.
 */
export function weekToDate(today: IsoDate): DateRange {
  assertDate(today, "today");
  const weekday = toUtc(today).getUTCDay(); // 0 = Sunday
  const sinceMonday = (weekday + 6) % 7;
  return { start: addDays(today, -sinceMonday), end: today };
}

export function monthRange(month: string): DateRange {
  if (!isIsoMonth(month)) {
    throw new LedgerError("INVALID_RANGE", `month must be YYYY-MM, got "${month}"`);
  }
  const [y = 0, m = 1] = month.split("-").map(Number);
  const lastDay = new Date(Date.UTC(y, m, 0)).getUTCDate();
  return { start: `${month}-01`, end: `${month}-${pad(lastDay)}` };
}

export function yearRange(year: string): DateRange {
  if (!isIsoYear(year)) {
    throw new LedgerError("INVALID_RANGE", `year must be YYYY, got "${year}"`);
  }
  return { start: `${year}-01-01`, end: `${year}-12-31` };
}

export function customRange(start: IsoDate, end: IsoDate): DateRange {
  assertDate(start, "start");
  assertDate(end, "end");
  if (start > end) {
    throw new LedgerError("INVALID_RANGE", `start ${start} is after end ${end}`);
  }
  return { start, end };
}
