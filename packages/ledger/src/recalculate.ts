/**
 * @daybook/ledger: Balance chain recalculation.
 *
 * Replays a bank's entries from a date forward and rewrites each entry's
 * opening and remaining balance so that, in ascending order:
 *
 *   opening[i]   = remaining[i-1]   (or the base balance for the first)
 *   remaining[i] = max(0, opening[i] + credited[i] - debited[i])
 *
 * Entries strictly before the start date are never touched; their
 * balances cannot depend on anything later.
 */

import type { Bank, BankRef, Entry, IsoDate } from "@daybook/types";
import type { BalanceUpdate, LedgerStore } from "@daybook/store";
import { StoreError } from "@daybook/store";
import { applyAmounts, clampBalance, coerceAmount } from "./money-math.js";
import { normalizeTime, sortEntries } from "./ordering.js";
import type { RecalculationResult } from "./types.js";

/**
 * Outcome of replaying a chain in memory.
 */
export interface ChainReplay {
  readonly updates: readonly BalanceUpdate[];
  readonly closingBalance: number;
}

/**
 * Replay entries from a base balance. Pure: computes the updates but
 * writes nothing.
 *
 * Sorting happens here rather than in storage because stored date/time
 * strings may have drifted; the ordering function is authoritative.
 * Each update also carries the re-derived timestamp, a normalized time
 * string and the bank's current name.
 */
export function replayChain(
  bank: Pick<Bank, "name">,
  baseBalance: number,
  entries: readonly Entry[],
): ChainReplay {
  let running = clampBalance(coerceAmount(baseBalance));
  const updates: BalanceUpdate[] = [];

  for (const { entry, timestamp } of sortEntries(entries)) {
    const credited = coerceAmount(entry.credited);
    const debited = coerceAmount(entry.debited);
    const opening = clampBalance(running);
    running = applyAmounts(opening, credited, debited);

    updates.push({
      id: entry.id,
      openingBalance: opening,
      remainingBalance: running,
      credited,
      debited,
      entryAt: new Date(timestamp),
      time: normalizeTime(timestamp),
      bankName: bank.name,
    });
  }

  return { updates, closingBalance: running };
}

/**
 * Recalculate one bank's chain for every entry dated on or after
 * `fromDate` (the whole chain when `fromDate` is omitted).
 *
 * - A bank that no longer exists is a no-op, not an error.
 * - The base balance is the remaining balance of the latest entry strictly
 *   before `fromDate`, or the bank's opening balance.
 * - All rewrites go out in one batched write; an empty batch writes nothing.
 * - Storage failures are returned as `{ ok: false }`. Nothing is rolled
 *   back; a later recalculation repairs the chain.
 */
export async function recalculateBalances(
  store: LedgerStore,
  ref: BankRef,
  fromDate?: IsoDate,
): Promise<RecalculationResult> {
  try {
    const bank = await store.getBank(ref.shopId, ref.bankId);
    if (bank === undefined) {
      return {
        ok: true,
        summary: {
          bankId: ref.bankId,
          fromDate,
          bankFound: false,
          baseBalance: 0,
          closingBalance: 0,
          updated: 0,
        },
      };
    }

    let baseBalance = bank.openingBalance;
    if (fromDate !== undefined) {
      // Full ordering, not storage order: entryAt may be stale.
      const earlier = await store.listEntries({
        shopId: ref.shopId,
        bankId: ref.bankId,
        beforeDate: fromDate,
      });
      const previous = sortEntries(earlier).at(-1);
      if (previous !== undefined) {
        baseBalance = previous.entry.remainingBalance;
      }
    }
    baseBalance = clampBalance(coerceAmount(baseBalance));

    const entries = await store.listEntries({
      shopId: ref.shopId,
      bankId: ref.bankId,
      fromDate,
    });

    const { updates, closingBalance } = replayChain(bank, baseBalance, entries);
    const updated =
      updates.length > 0 ? await store.bulkUpdateBalances(ref.shopId, updates) : 0;

    return {
      ok: true,
      summary: {
        bankId: ref.bankId,
        fromDate,
        bankFound: true,
        baseBalance,
        closingBalance,
        updated,
      },
    };
  } catch (err: unknown) {
    if (err instanceof StoreError) {
      return { ok: false, bankId: ref.bankId, error: err };
    }
    throw err;
  }
}
