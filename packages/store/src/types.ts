/**
 * @daybook/store: Core types.
 *
 * Defines the storage contract the ledger engine and the HTTP service
 * depend on. Every query is scoped by the owning shop's identifier.
 *
 * Design principles:
 * - Records go in and come out as copies; callers never share references
 * - Ordering returned by the store is advisory; the engine re-sorts
 * - Batched balance writes are unordered and keyed by entry id
 * - Failures surface as StoreError, never as driver-specific errors
 */

import type { Bank, Entry, IsoDate, RecordId, Shop, TimeOfDay } from "@daybook/types";

// =============================================================================
// Queries
// =============================================================================

/**
 * Filter for entry queries. Date bounds compare `YYYY-MM-DD` strings.
 */
export interface EntryFilter {
  readonly shopId: string;
  readonly bankId?: RecordId | undefined;

  /** Inclusive lower bound */
  readonly fromDate?: IsoDate | undefined;

  /** Inclusive upper bound */
  readonly toDate?: IsoDate | undefined;

  /** Exclusive upper bound */
  readonly beforeDate?: IsoDate | undefined;
}

/**
 * Filter for the "latest entry" lookup used by the balance resolver.
 * Results follow storage order (cached `entryAt`), not the full ordering.
 */
export interface LatestEntryFilter {
  readonly shopId: string;
  readonly bankId: RecordId;

  /** Only entries dated strictly before this date */
  readonly beforeDate?: IsoDate | undefined;

  /** Only entries dated on or before this date */
  readonly onOrBeforeDate?: IsoDate | undefined;
}

// =============================================================================
// Writes
// =============================================================================

/**
 * Fields rewritten on an entry by recalculation.
 */
export interface BalanceUpdate {
  readonly id: RecordId;
  readonly openingBalance: number;
  readonly remainingBalance: number;
  readonly credited: number;
  readonly debited: number;
  readonly entryAt: Date;
  readonly time: TimeOfDay;
  readonly bankName: string;
}

export interface BankPatch {
  readonly name?: string | undefined;
  readonly openingBalance?: number | undefined;
}

export interface EntryAmounts {
  readonly credited: number;
  readonly debited: number;
}

// =============================================================================
// Ledger Store Interface
// =============================================================================

/**
 * Persistence for shops, banks and entries.
 *
 * Invariants:
 * - Every bank and entry read or written is confined to the given shopId
 * - `findLatestEntry` orders by canonical timestamp, then insertion order
 * - `bulkUpdateBalances` with an empty batch performs no write
 */
export interface LedgerStore {
  // ─── Shops ─────────────────────────────────────────────────────────
  findShop(identifier: string): Promise<Shop | undefined>;

  /**
   * @throws StoreError DUPLICATE_KEY if the identifier is taken
   */
  insertShop(shop: Shop): Promise<void>;

  // ─── Banks ─────────────────────────────────────────────────────────
  listBanks(shopId: string): Promise<readonly Bank[]>;
  getBank(shopId: string, bankId: RecordId): Promise<Bank | undefined>;

  /**
   * Case-insensitive exact name match, optionally ignoring one bank
   * (the bank being renamed).
   */
  findBankByName(
    shopId: string,
    name: string,
    excludeId?: RecordId,
  ): Promise<Bank | undefined>;

  insertBank(bank: Bank): Promise<void>;

  /** @returns the updated bank, or undefined if it does not exist */
  updateBank(
    shopId: string,
    bankId: RecordId,
    patch: BankPatch,
  ): Promise<Bank | undefined>;

  /** @returns true if a bank was removed */
  deleteBank(shopId: string, bankId: RecordId): Promise<boolean>;

  // ─── Entries ───────────────────────────────────────────────────────
  insertEntry(entry: Entry): Promise<void>;
  getEntry(shopId: string, entryId: RecordId): Promise<Entry | undefined>;

  /** @returns the updated entry, or undefined if it does not exist */
  updateEntryAmounts(
    shopId: string,
    entryId: RecordId,
    amounts: EntryAmounts,
  ): Promise<Entry | undefined>;

  /** @returns true if an entry was removed */
  deleteEntry(shopId: string, entryId: RecordId): Promise<boolean>;

  /** Entries matching the filter, in no guaranteed order. */
  listEntries(filter: EntryFilter): Promise<readonly Entry[]>;

  findLatestEntry(filter: LatestEntryFilter): Promise<Entry | undefined>;

  /** @returns number of entries matched */
  bulkUpdateBalances(
    shopId: string,
    updates: readonly BalanceUpdate[],
  ): Promise<number>;

  /** @returns number of entries removed */
  deleteEntries(filter: EntryFilter): Promise<number>;

  // ─── Lifecycle ─────────────────────────────────────────────────────
  /** Cheap round trip used by readiness checks. */
  ping(): Promise<void>;

  close(): Promise<void>;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode = "STORE_UNAVAILABLE" | "DUPLICATE_KEY";

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}
