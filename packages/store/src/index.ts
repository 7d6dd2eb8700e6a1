/**
 * @daybook/store: Persistence for shops, banks and daily entries.
 *
 * Provides:
 * - LedgerStore interface (the storage contract)
 * - InMemoryLedgerStore (tests, development)
 * - MongoLedgerStore (MongoDB via the official driver)
 */

export { InMemoryLedgerStore } from "./in-memory-store.js";
export {
  MongoLedgerStore,
  COLLECTIONS,
  entryQuery,
  latestEntryQuery,
  balanceUpdateOps,
  escapeRegex,
  toStoreError,
} from "./mongo-store.js";
export type { ShopDocument, BankDocument, EntryDocument } from "./mongo-store.js";

export type {
  LedgerStore,
  EntryFilter,
  LatestEntryFilter,
  BalanceUpdate,
  BankPatch,
  EntryAmounts,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";
