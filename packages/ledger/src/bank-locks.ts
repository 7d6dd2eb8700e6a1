/**
 * @daybook/ledger: Per-bank serialization.
 *
 * Recalculation is a read-then-write sequence with no transaction around
 * it. Two overlapping runs for the same bank could each read a snapshot
 * and the later write would win. BankLocks queues work per bank so those
 * runs happen one after another; different banks still run concurrently.
 *
 * Process-local only. Several service instances sharing one database are
 * not serialized against each other.
 */

import type { BankRef } from "@daybook/types";

/**
 * Key for a bank within its shop.
 */
export function bankKey(ref: BankRef): string {
  return `${ref.shopId}::${ref.bankId}`;
}

export class BankLocks {
  /** Tail of each bank's queue; settles when the last queued task does */
  private readonly _tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for the same bank has settled.
   * A failing task does not block the tasks queued behind it.
   */
  async run<T>(ref: BankRef, task: () => Promise<T>): Promise<T> {
    const key = bankKey(ref);
    const previous = this._tails.get(key) ?? Promise.resolve();

    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this._tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  /**
   * Whether any task is queued or running for the bank.
   */
  isBusy(ref: BankRef): boolean {
    return this._tails.has(bankKey(ref));
  }

  /** Number of banks with queued work. */
  get size(): number {
    return this._tails.size;
  }
}
