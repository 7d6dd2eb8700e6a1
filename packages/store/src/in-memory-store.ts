/**
 * @daybook/store: In-memory LedgerStore implementation.
 *
 * Stores records in plain maps. Suitable for:
 * - Unit and integration tests
 * - Local development without a database
 *
 * Not suitable for production (all state lost on process exit).
 */

import type { Bank, Entry, RecordId, Shop } from "@daybook/types";
import type {
  BalanceUpdate,
  BankPatch,
  EntryAmounts,
  EntryFilter,
  LatestEntryFilter,
  LedgerStore,
} from "./types.js";
import { StoreError } from "./types.js";

function copyEntry(entry: Entry): Entry {
  return { ...entry, entryAt: new Date(entry.entryAt.getTime()) };
}

function matchesFilter(entry: Entry, filter: EntryFilter): boolean {
  if (entry.shopId !== filter.shopId) return false;
  if (filter.bankId !== undefined && entry.bankId !== filter.bankId) return false;
  if (filter.fromDate !== undefined && entry.date < filter.fromDate) return false;
  if (filter.toDate !== undefined && entry.date > filter.toDate) return false;
  if (filter.beforeDate !== undefined && entry.date >= filter.beforeDate) return false;
  return true;
}

/**
 * Storage sort: cached canonical timestamp, then insertion order.
 * Mirrors what an indexed database query returns.
 */
function storageOrder(a: Entry, b: Entry): number {
  const byTimestamp = a.entryAt.getTime() - b.entryAt.getTime();
  if (byTimestamp !== 0) return byTimestamp;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class InMemoryLedgerStore implements LedgerStore {
  private readonly _shops = new Map<string, Shop>();
  private readonly _banks = new Map<RecordId, Bank>();
  private readonly _entries = new Map<RecordId, Entry>();

  /** Number of bulkUpdateBalances calls that carried at least one update */
  private _bulkWrites = 0;

  // ─── Shops ─────────────────────────────────────────────────────────

  async findShop(identifier: string): Promise<Shop | undefined> {
    const shop = this._shops.get(identifier);
    return shop !== undefined ? { ...shop } : undefined;
  }

  async insertShop(shop: Shop): Promise<void> {
    if (this._shops.has(shop.identifier)) {
      throw new StoreError(
        "DUPLICATE_KEY",
        `Shop "${shop.identifier}" already exists`,
      );
    }
    this._shops.set(shop.identifier, { ...shop });
  }

  // ─── Banks ─────────────────────────────────────────────────────────

  async listBanks(shopId: string): Promise<readonly Bank[]> {
    return [...this._banks.values()]
      .filter((b) => b.shopId === shopId)
      .map((b) => ({ ...b }));
  }

  async getBank(shopId: string, bankId: RecordId): Promise<Bank | undefined> {
    const bank = this._banks.get(bankId);
    if (bank === undefined || bank.shopId !== shopId) return undefined;
    return { ...bank };
  }

  async findBankByName(
    shopId: string,
    name: string,
    excludeId?: RecordId,
  ): Promise<Bank | undefined> {
    const wanted = name.toLowerCase();
    for (const bank of this._banks.values()) {
      if (
        bank.shopId === shopId &&
        bank.id !== excludeId &&
        bank.name.toLowerCase() === wanted
      ) {
        return { ...bank };
      }
    }
    return undefined;
  }

  async insertBank(bank: Bank): Promise<void> {
    if (this._banks.has(bank.id)) {
      throw new StoreError("DUPLICATE_KEY", `Bank "${bank.id}" already exists`);
    }
    this._banks.set(bank.id, { ...bank });
  }

  async updateBank(
    shopId: string,
    bankId: RecordId,
    patch: BankPatch,
  ): Promise<Bank | undefined> {
    const existing = this._banks.get(bankId);
    if (existing === undefined || existing.shopId !== shopId) return undefined;

    const updated: Bank = {
      ...existing,
      name: patch.name ?? existing.name,
      openingBalance: patch.openingBalance ?? existing.openingBalance,
    };
    this._banks.set(bankId, updated);
    return { ...updated };
  }

  async deleteBank(shopId: string, bankId: RecordId): Promise<boolean> {
    const existing = this._banks.get(bankId);
    if (existing === undefined || existing.shopId !== shopId) return false;
    return this._banks.delete(bankId);
  }

  // ─── Entries ───────────────────────────────────────────────────────

  async insertEntry(entry: Entry): Promise<void> {
    if (this._entries.has(entry.id)) {
      throw new StoreError("DUPLICATE_KEY", `Entry "${entry.id}" already exists`);
    }
    this._entries.set(entry.id, copyEntry(entry));
  }

  async getEntry(shopId: string, entryId: RecordId): Promise<Entry | undefined> {
    const entry = this._entries.get(entryId);
    if (entry === undefined || entry.shopId !== shopId) return undefined;
    return copyEntry(entry);
  }

  async updateEntryAmounts(
    shopId: string,
    entryId: RecordId,
    amounts: EntryAmounts,
  ): Promise<Entry | undefined> {
    const existing = this._entries.get(entryId);
    if (existing === undefined || existing.shopId !== shopId) return undefined;

    const updated: Entry = {
      ...existing,
      credited: amounts.credited,
      debited: amounts.debited,
    };
    this._entries.set(entryId, updated);
    return copyEntry(updated);
  }

  async deleteEntry(shopId: string, entryId: RecordId): Promise<boolean> {
    const existing = this._entries.get(entryId);
    if (existing === undefined || existing.shopId !== shopId) return false;
    return this._entries.delete(entryId);
  }

  async listEntries(filter: EntryFilter): Promise<readonly Entry[]> {
    const result: Entry[] = [];
    for (const entry of this._entries.values()) {
      if (matchesFilter(entry, filter)) {
        result.push(copyEntry(entry));
      }
    }
    return result;
  }

  async findLatestEntry(filter: LatestEntryFilter): Promise<Entry | undefined> {
    let latest: Entry | undefined;
    for (const entry of this._entries.values()) {
      if (entry.shopId !== filter.shopId || entry.bankId !== filter.bankId) continue;
      if (filter.beforeDate !== undefined && entry.date >= filter.beforeDate) continue;
      if (filter.onOrBeforeDate !== undefined && entry.date > filter.onOrBeforeDate) continue;
      if (latest === undefined || storageOrder(entry, latest) > 0) {
        latest = entry;
      }
    }
    return latest !== undefined ? copyEntry(latest) : undefined;
  }

  async bulkUpdateBalances(
    shopId: string,
    updates: readonly BalanceUpdate[],
  ): Promise<number> {
    if (updates.length === 0) return 0;
    this._bulkWrites++;

    let matched = 0;
    for (const update of updates) {
      const existing = this._entries.get(update.id);
      if (existing === undefined || existing.shopId !== shopId) continue;

      this._entries.set(update.id, {
        ...existing,
        openingBalance: update.openingBalance,
        remainingBalance: update.remainingBalance,
        credited: update.credited,
        debited: update.debited,
        entryAt: new Date(update.entryAt.getTime()),
        time: update.time,
        bankName: update.bankName,
      });
      matched++;
    }
    return matched;
  }

  async deleteEntries(filter: EntryFilter): Promise<number> {
    let removed = 0;
    for (const [id, entry] of this._entries) {
      if (matchesFilter(entry, filter)) {
        this._entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  async ping(): Promise<void> {
    // always reachable
  }

  async close(): Promise<void> {
    this._shops.clear();
    this._banks.clear();
    this._entries.clear();
  }

  // ─── Test Introspection ────────────────────────────────────────────

  /**
   * Write a raw entry without copying or validation. Lets tests seed
   * legacy or malformed records the service would never produce.
   */
  seedEntry(entry: Entry): void {
    this._entries.set(entry.id, entry);
  }

  get bulkWriteCount(): number {
    return this._bulkWrites;
  }

  get entryCount(): number {
    return this._entries.size;
  }
}
