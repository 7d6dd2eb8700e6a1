/**
 * Runtime Type Guards
 *
 * Narrowing functions for Daybook records and formats.
 * Used at system boundaries (API inputs, documents read back from storage).
 */

import type { Bank, Entry, EntryDirection, IsoDate, Shop, TimeOfDay } from "./bookkeeping.js";

// =============================================================================
// Format guards
// =============================================================================

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d):([0-5]\d)$/;
const ISO_MONTH = /^\d{4}-(0[1-9]|1[0-2])$/;
const ISO_YEAR = /^\d{4}$/;

/**
 * True for a real calendar date in `YYYY-MM-DD` form (rejects 2024-02-30).
 */
export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== "string") return false;
  const match = ISO_DATE.exec(value);
  if (match === null) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return false;
  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isTimeOfDay(value: unknown): value is TimeOfDay {
  return typeof value === "string" && TIME_OF_DAY.test(value);
}

export function isIsoMonth(value: unknown): value is string {
  return typeof value === "string" && ISO_MONTH.test(value);
}

export function isIsoYear(value: unknown): value is string {
  return typeof value === "string" && ISO_YEAR.test(value);
}

// =============================================================================
// Record guards
// =============================================================================

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

export function isShop(value: unknown): value is Shop {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.identifier === "string" &&
    v.identifier.length > 0 &&
    typeof v.name === "string" &&
    typeof v.passwordHash === "string" &&
    typeof v.createdAt === "string"
  );
}

export function isBank(value: unknown): value is Bank {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.shopId === "string" &&
    typeof v.name === "string" &&
    isNonNegativeNumber(v.openingBalance) &&
    typeof v.createdAt === "string"
  );
}

/**
 * Structural check only. Amount and date formats are deliberately not
 * verified here: the ledger engine repairs those on recalculation.
 */
export function isEntry(value: unknown): value is Entry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.shopId === "string" &&
    typeof v.bankId === "string" &&
    typeof v.bankName === "string" &&
    typeof v.date === "string" &&
    typeof v.time === "string" &&
    v.entryAt instanceof Date &&
    typeof v.credited === "number" &&
    typeof v.debited === "number" &&
    typeof v.openingBalance === "number" &&
    typeof v.remainingBalance === "number" &&
    typeof v.createdAt === "string"
  );
}

/**
 * Direction of an entry, or undefined when neither amount is positive.
 */
export function entryDirection(
  entry: Pick<Entry, "credited" | "debited">,
): EntryDirection | undefined {
  if (entry.credited > 0) return "credit";
  if (entry.debited > 0) return "debit";
  return undefined;
}
