/**
 * @daybook/ledger: BalanceEngine.
 *
 * Binds the recalculation procedure and the balance resolver to one
 * storage handle, and serializes recalculations per bank.
 *
 * API surface:
 * - resolveOpeningBalance(): opening balance for a new entry
 * - recalculate(): replay one bank's chain from a date
 * - recalculateAll(): replay several banks from the same date
 */

import type { Bank, BankRef, IsoDate, RecordId } from "@daybook/types";
import type { LedgerStore } from "@daybook/store";
import { BankLocks } from "./bank-locks.js";
import { recalculateBalances } from "./recalculate.js";
import { resolveOpeningBalance } from "./resolver.js";
import type { RecalculationResult } from "./types.js";

export class BalanceEngine {
  private readonly _store: LedgerStore;
  private readonly _locks: BankLocks;

  constructor(store: LedgerStore, locks: BankLocks = new BankLocks()) {
    this._store = store;
    this._locks = locks;
  }

  get locks(): BankLocks {
    return this._locks;
  }

  /**
   * @throws StoreError if the lookup fails
   */
  resolveOpeningBalance(
    bank: Pick<Bank, "id" | "shopId" | "openingBalance">,
    targetDate: IsoDate,
  ): Promise<number> {
    return resolveOpeningBalance(this._store, bank, targetDate);
  }

  /**
   * Recalculate one bank. Runs after any recalculation of the same bank
   * already in flight.
   */
  recalculate(ref: BankRef, fromDate?: IsoDate): Promise<RecalculationResult> {
    return this._locks.run(ref, () => recalculateBalances(this._store, ref, fromDate));
  }

  /**
   * Recalculate several banks of one shop from the same date.
   * Banks run concurrently; results come back in input order.
   */
  recalculateAll(
    shopId: string,
    bankIds: Iterable<RecordId>,
    fromDate?: IsoDate,
  ): Promise<RecalculationResult[]> {
    const unique = [...new Set(bankIds)];
    return Promise.all(unique.map((bankId) => this.recalculate({ shopId, bankId }, fromDate)));
  }
}
