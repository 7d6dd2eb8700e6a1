/**
 * @daybook/ledger: Balance arithmetic.
 *
 * Amounts are decimal numbers with two fractional digits. Every sum and
 * difference is computed in integer minor units and converted back, so a
 * long chain of entries never accumulates floating-point error.
 *
 * Rules:
 * - Stored amounts are coerced, never rejected (malformed → 0)
 * - Balances are floored at zero
 */

/** Minor units per major unit (cents, paise). */
export const MINOR_UNITS = 100;

/**
 * Largest amount accepted on input. Sums of many such amounts stay
 * exact in minor units.
 */
export const MAX_AMOUNT = 100_000_000_000;

/**
 * Convert a major-unit amount to integer minor units.
 *
 * 12.34 → 1234
 * 0.1 + 0.2 → 30
 */
export function toMinor(amount: number): number {
  return Math.round(amount * MINOR_UNITS);
}

/**
 * Convert integer minor units back to a major-unit amount.
 */
export function fromMinor(minor: number): number {
  // `|| 0` folds -0 into 0
  return minor / MINOR_UNITS || 0;
}

/**
 * Coerce a stored amount to a non-negative number with two decimals.
 *
 * Numbers and numeric strings are accepted. Anything else (NaN, Infinity,
 * negative values, objects, garbage strings) becomes 0.
 */
export function coerceAmount(value: unknown): number {
  let n: number;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    n = Number(value);
  } else {
    return 0;
  }
  if (!Number.isFinite(n) || n <= 0) {
    return 0;
  }
  return fromMinor(toMinor(n));
}

/**
 * Floor a balance at zero.
 */
export function clampBalance(balance: number): number {
  return balance > 0 ? balance : 0;
}

/**
 * Remaining balance after applying one entry:
 * max(0, opening + credited - debited), computed in minor units.
 */
export function applyAmounts(
  opening: number,
  credited: number,
  debited: number,
): number {
  const minor = toMinor(opening) + toMinor(credited) - toMinor(debited);
  return fromMinor(Math.max(0, minor));
}

/**
 * Exact sum of amounts.
 */
export function sumAmounts(amounts: Iterable<number>): number {
  let minor = 0;
  for (const amount of amounts) {
    minor += toMinor(amount);
  }
  return fromMinor(minor);
}

/**
 * True when `amount` has at most two fractional digits.
 */
export function hasMinorPrecision(amount: number): boolean {
  return Number.isFinite(amount) && Math.abs(amount * MINOR_UNITS - toMinor(amount)) < 1e-6;
}
