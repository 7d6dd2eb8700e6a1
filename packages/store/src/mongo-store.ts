/**
 * @daybook/store: MongoDB LedgerStore implementation.
 *
 * Collections:
 * - shops          keyed by the shop identifier
 * - banks          keyed by bank id, scoped by shopId
 * - daily_entries  keyed by entry id, scoped by shopId + bankId
 *
 * Balance recalculation writes go through one unordered bulkWrite.
 * Driver errors are wrapped in StoreError so callers stay driver-agnostic.
 */

import { MongoClient, MongoServerError } from "mongodb";
import type { AnyBulkWriteOperation, Collection, Db, Filter } from "mongodb";
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

// =============================================================================
// Documents
// =============================================================================

export interface ShopDocument {
  readonly _id: string;
  readonly name: string;
  readonly passwordHash: string;
  readonly createdAt: string;
}

export interface BankDocument {
  readonly _id: string;
  readonly shopId: string;
  readonly name: string;
  readonly openingBalance: number;
  readonly createdAt: string;
}

export interface EntryDocument {
  readonly _id: string;
  readonly shopId: string;
  readonly bankId: string;
  readonly bankName: string;
  readonly date: string;
  readonly time: string;
  readonly entryAt: Date;
  readonly credited: number;
  readonly debited: number;
  readonly openingBalance: number;
  readonly remainingBalance: number;
  readonly createdAt: string;
}

export const COLLECTIONS = {
  shops: "shops",
  banks: "banks",
  entries: "daily_entries",
} as const;

const DUPLICATE_KEY_CODE = 11000;

// =============================================================================
// Mapping
// =============================================================================

export function shopToDocument(shop: Shop): ShopDocument {
  return {
    _id: shop.identifier,
    name: shop.name,
    passwordHash: shop.passwordHash,
    createdAt: shop.createdAt,
  };
}

export function shopFromDocument(doc: ShopDocument): Shop {
  return {
    identifier: doc._id,
    name: doc.name,
    passwordHash: doc.passwordHash,
    createdAt: doc.createdAt,
  };
}

export function bankToDocument(bank: Bank): BankDocument {
  const { id, ...rest } = bank;
  return { _id: id, ...rest };
}

export function bankFromDocument(doc: BankDocument): Bank {
  return {
    id: doc._id,
    shopId: doc.shopId,
    name: doc.name,
    openingBalance: doc.openingBalance,
    createdAt: doc.createdAt,
  };
}

export function entryToDocument(entry: Entry): EntryDocument {
  const { id, ...rest } = entry;
  return { _id: id, ...rest };
}

export function entryFromDocument(doc: EntryDocument): Entry {
  return {
    id: doc._id,
    shopId: doc.shopId,
    bankId: doc.bankId,
    bankName: doc.bankName,
    date: doc.date,
    time: doc.time,
    // Legacy documents may lack the cached timestamp; the engine re-derives it.
    entryAt: doc.entryAt instanceof Date ? doc.entryAt : new Date(0),
    credited: doc.credited,
    debited: doc.debited,
    openingBalance: doc.openingBalance,
    remainingBalance: doc.remainingBalance,
    createdAt: doc.createdAt,
  };
}

/** Escape a literal for use inside a regular expression. */
export function escapeRegex(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Translate an EntryFilter into a MongoDB query.
 */
export function entryQuery(filter: EntryFilter): Filter<EntryDocument> {
  const date: { $gte?: string; $lte?: string; $lt?: string } = {};
  if (filter.fromDate !== undefined) date.$gte = filter.fromDate;
  if (filter.toDate !== undefined) date.$lte = filter.toDate;
  if (filter.beforeDate !== undefined) date.$lt = filter.beforeDate;

  return {
    shopId: filter.shopId,
    ...(filter.bankId !== undefined ? { bankId: filter.bankId } : {}),
    ...(Object.keys(date).length > 0 ? { date } : {}),
  };
}

export function latestEntryQuery(filter: LatestEntryFilter): Filter<EntryDocument> {
  const date: { $lt?: string; $lte?: string } = {};
  if (filter.beforeDate !== undefined) date.$lt = filter.beforeDate;
  if (filter.onOrBeforeDate !== undefined) date.$lte = filter.onOrBeforeDate;

  return {
    shopId: filter.shopId,
    bankId: filter.bankId,
    ...(Object.keys(date).length > 0 ? { date } : {}),
  };
}

export function balanceUpdateOps(
  shopId: string,
  updates: readonly BalanceUpdate[],
): AnyBulkWriteOperation<EntryDocument>[] {
  return updates.map((u) => ({
    updateOne: {
      filter: { _id: u.id, shopId },
      update: {
        $set: {
          openingBalance: u.openingBalance,
          remainingBalance: u.remainingBalance,
          credited: u.credited,
          debited: u.debited,
          entryAt: u.entryAt,
          time: u.time,
          bankName: u.bankName,
        },
      },
    },
  }));
}

// =============================================================================
// Store
// =============================================================================

export class MongoLedgerStore implements LedgerStore {
  private readonly _client: MongoClient;
  private readonly _db: Db;
  private readonly _shops: Collection<ShopDocument>;
  private readonly _banks: Collection<BankDocument>;
  private readonly _entries: Collection<EntryDocument>;

  constructor(client: MongoClient, dbName: string) {
    this._client = client;
    this._db = client.db(dbName);
    this._shops = this._db.collection<ShopDocument>(COLLECTIONS.shops);
    this._banks = this._db.collection<BankDocument>(COLLECTIONS.banks);
    this._entries = this._db.collection<EntryDocument>(COLLECTIONS.entries);
  }

  /**
   * Connect to MongoDB and return a ready store.
   */
  static async connect(uri: string, dbName: string): Promise<MongoLedgerStore> {
    const client = new MongoClient(uri);
    try {
      await client.connect();
    } catch (err: unknown) {
      throw new StoreError("STORE_UNAVAILABLE", "Could not connect to MongoDB", {
        cause: err,
      });
    }
    return new MongoLedgerStore(client, dbName);
  }

  /**
   * Create the indexes the queries rely on. Safe to call repeatedly.
   */
  async ensureIndexes(): Promise<void> {
    await this._run("ensureIndexes", async () => {
      await this._banks.createIndex({ shopId: 1, name: 1 });
      await this._entries.createIndex({ shopId: 1, bankId: 1, date: 1 });
      await this._entries.createIndex({ shopId: 1, bankId: 1, entryAt: -1 });
      await this._entries.createIndex({ shopId: 1, date: 1 });
    });
  }

  // ─── Shops ─────────────────────────────────────────────────────────

  findShop(identifier: string): Promise<Shop | undefined> {
    return this._run("findShop", async () => {
      const doc = await this._shops.findOne({ _id: identifier });
      return doc !== null ? shopFromDocument(doc) : undefined;
    });
  }

  insertShop(shop: Shop): Promise<void> {
    return this._run("insertShop", async () => {
      await this._shops.insertOne(shopToDocument(shop));
    });
  }

  // ─── Banks ─────────────────────────────────────────────────────────

  listBanks(shopId: string): Promise<readonly Bank[]> {
    return this._run("listBanks", async () => {
      const docs = await this._banks.find({ shopId }).toArray();
      return docs.map(bankFromDocument);
    });
  }

  getBank(shopId: string, bankId: RecordId): Promise<Bank | undefined> {
    return this._run("getBank", async () => {
      const doc = await this._banks.findOne({ _id: bankId, shopId });
      return doc !== null ? bankFromDocument(doc) : undefined;
    });
  }

  findBankByName(
    shopId: string,
    name: string,
    excludeId?: RecordId,
  ): Promise<Bank | undefined> {
    return this._run("findBankByName", async () => {
      const doc = await this._banks.findOne({
        shopId,
        name: { $regex: `^${escapeRegex(name)}$`, $options: "i" },
        ...(excludeId !== undefined ? { _id: { $ne: excludeId } } : {}),
      });
      return doc !== null ? bankFromDocument(doc) : undefined;
    });
  }

  insertBank(bank: Bank): Promise<void> {
    return this._run("insertBank", async () => {
      await this._banks.insertOne(bankToDocument(bank));
    });
  }

  updateBank(
    shopId: string,
    bankId: RecordId,
    patch: BankPatch,
  ): Promise<Bank | undefined> {
    return this._run("updateBank", async () => {
      const set: { name?: string; openingBalance?: number } = {};
      if (patch.name !== undefined) set.name = patch.name;
      if (patch.openingBalance !== undefined) set.openingBalance = patch.openingBalance;

      const doc = await this._banks.findOneAndUpdate(
        { _id: bankId, shopId },
        { $set: set },
        { returnDocument: "after" },
      );
      return doc !== null ? bankFromDocument(doc) : undefined;
    });
  }

  deleteBank(shopId: string, bankId: RecordId): Promise<boolean> {
    return this._run("deleteBank", async () => {
      const result = await this._banks.deleteOne({ _id: bankId, shopId });
      return result.deletedCount > 0;
    });
  }

  // ─── Entries ───────────────────────────────────────────────────────

  insertEntry(entry: Entry): Promise<void> {
    return this._run("insertEntry", async () => {
      await this._entries.insertOne(entryToDocument(entry));
    });
  }

  getEntry(shopId: string, entryId: RecordId): Promise<Entry | undefined> {
    return this._run("getEntry", async () => {
      const doc = await this._entries.findOne({ _id: entryId, shopId });
      return doc !== null ? entryFromDocument(doc) : undefined;
    });
  }

  updateEntryAmounts(
    shopId: string,
    entryId: RecordId,
    amounts: EntryAmounts,
  ): Promise<Entry | undefined> {
    return this._run("updateEntryAmounts", async () => {
      const doc = await this._entries.findOneAndUpdate(
        { _id: entryId, shopId },
        { $set: { credited: amounts.credited, debited: amounts.debited } },
        { returnDocument: "after" },
      );
      return doc !== null ? entryFromDocument(doc) : undefined;
    });
  }

  deleteEntry(shopId: string, entryId: RecordId): Promise<boolean> {
    return this._run("deleteEntry", async () => {
      const result = await this._entries.deleteOne({ _id: entryId, shopId });
      return result.deletedCount > 0;
    });
  }

  listEntries(filter: EntryFilter): Promise<readonly Entry[]> {
    return this._run("listEntries", async () => {
      const docs = await this._entries.find(entryQuery(filter)).toArray();
      return docs.map(entryFromDocument);
    });
  }

  findLatestEntry(filter: LatestEntryFilter): Promise<Entry | undefined> {
    return this._run("findLatestEntry", async () => {
      const doc = await this._entries.findOne(latestEntryQuery(filter), {
        sort: { entryAt: -1, createdAt: -1, _id: -1 },
      });
      return doc !== null ? entryFromDocument(doc) : undefined;
    });
  }

  bulkUpdateBalances(
    shopId: string,
    updates: readonly BalanceUpdate[],
  ): Promise<number> {
    if (updates.length === 0) {
      return Promise.resolve(0);
    }
    return this._run("bulkUpdateBalances", async () => {
      const result = await this._entries.bulkWrite(
        balanceUpdateOps(shopId, updates),
        { ordered: false },
      );
      return result.matchedCount;
    });
  }

  deleteEntries(filter: EntryFilter): Promise<number> {
    return this._run("deleteEntries", async () => {
      const result = await this._entries.deleteMany(entryQuery(filter));
      return result.deletedCount;
    });
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  ping(): Promise<void> {
    return this._run("ping", async () => {
      await this._db.command({ ping: 1 });
    });
  }

  async close(): Promise<void> {
    await this._client.close();
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private async _run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw toStoreError(operation, err);
    }
  }
}

/**
 * Map a driver error onto the store's error taxonomy.
 */
export function toStoreError(operation: string, err: unknown): StoreError {
  if (err instanceof StoreError) {
    return err;
  }
  if (err instanceof MongoServerError && err.code === DUPLICATE_KEY_CODE) {
    return new StoreError("DUPLICATE_KEY", `${operation}: duplicate key`, {
      cause: err,
    });
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new StoreError("STORE_UNAVAILABLE", `${operation} failed: ${detail}`, {
    cause: err,
  });
}
