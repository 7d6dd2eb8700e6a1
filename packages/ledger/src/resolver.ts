/**
 * @daybook/ledger: Insertion-time balance resolution.
 *
 * A new entry's opening balance is the remaining balance of the latest
 * existing entry dated on or before the new entry's date, or the bank's
 * opening balance when there is none.
 *
 * A backdated entry is correct as inserted, but every later entry is now
 * stale; callers recalculate from the new entry's date right after insert.
 */

import type { Bank, IsoDate } from "@daybook/types";
import type { LedgerStore } from "@daybook/store";
import { applyAmounts, clampBalance, coerceAmount, toMinor } from "./money-math.js";

/**
 * Opening balance for a new entry on `targetDate`. Never negative.
 *
 * @throws StoreError if the lookup fails
 */
export async function resolveOpeningBalance(
  store: LedgerStore,
  bank: Pick<Bank, "id" | "shopId" | "openingBalance">,
  targetDate: IsoDate,
): Promise<number> {
  const previous = await store.findLatestEntry({
    shopId: bank.shopId,
    bankId: bank.id,
    onOrBeforeDate: targetDate,
  });
  const balance = previous !== undefined ? previous.remainingBalance : bank.openingBalance;
  return clampBalance(coerceAmount(balance));
}

/**
 * Remaining balance of a new entry.
 */
export function projectRemaining(
  opening: number,
  credited: number,
  debited: number,
): number {
  return applyAmounts(opening, credited, debited);
}

/**
 * Whether a debit fits within the available balance.
 */
export function coversDebit(available: number, debited: number): boolean {
  return toMinor(debited) <= toMinor(available);
}
