/**
 * Bookkeeping Types
 *
 * Records owned by a shop: the shop itself, its banks and the daily
 * entries posted against those banks.
 *
 * Rules:
 * - Every record carries the owning shop's identifier (`shopId`)
 * - Ids are opaque strings, the same type for banks and entries
 * - Balances on entries are derived; the chain is restored by the ledger engine
 */

/** Opaque record identifier (UUID). */
export type RecordId = string;

/** Calendar date, `YYYY-MM-DD`. */
export type IsoDate = string;

/** Wall-clock time of day, `HH:MM:SS`. */
export type TimeOfDay = string;

/**
 * A registered shop. The tenant root.
 */
export interface Shop {
  /** Email or mobile number; unique, and the scope key on every owned record */
  readonly identifier: string;

  /** Display name */
  readonly name: string;

  /** Salted password hash (`scrypt$salt$hash`) */
  readonly passwordHash: string;

  /** ISO 8601 timestamp */
  readonly createdAt: string;
}

/**
 * A bank account within a shop.
 */
export interface Bank {
  readonly id: RecordId;
  readonly shopId: string;

  /** Unique per shop, compared case-insensitively */
  readonly name: string;

  /** Base of the balance chain when no earlier entry exists */
  readonly openingBalance: number;

  readonly createdAt: string;
}

/**
 * Direction of a single entry. Exactly one of credited/debited is nonzero.
 */
export type EntryDirection = "credit" | "debit";

/**
 * A daily credit or debit posted against a bank.
 */
export interface Entry {
  readonly id: RecordId;
  readonly shopId: string;
  readonly bankId: RecordId;

  /** Denormalized bank name, refreshed on recalculation */
  readonly bankName: string;

  /** Business date the entry is posted to */
  readonly date: IsoDate;

  /** Time of day the entry was recorded */
  readonly time: TimeOfDay;

  /** Canonical timestamp derived from date + time (a cache, not the source) */
  readonly entryAt: Date;

  readonly credited: number;
  readonly debited: number;

  /** Balance immediately before this entry applies */
  readonly openingBalance: number;

  /** max(0, openingBalance + credited - debited) */
  readonly remainingBalance: number;

  /** Insertion instant; breaks ordering ties */
  readonly createdAt: string;
}

/**
 * Reference to a bank within its shop scope.
 */
export interface BankRef {
  readonly shopId: string;
  readonly bankId: RecordId;
}
