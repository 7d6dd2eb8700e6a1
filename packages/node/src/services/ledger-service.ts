/**
 * LedgerService: the per-request facade over storage and the balance engine.
 *
 * Holds the rules that sit around the engine:
 * - Shops sign up and log in with a hashed password
 * - Bank names are unique per shop (case-insensitive)
 * - New entries resolve their opening balance, refuse overdrawing debits,
 *   then recalculate the bank from their date
 * - Entries can be edited or deleted only on their own business day
 * - Bank edits and period deletes recalculate every affected bank
 *
 * Recalculation failures are logged and surfaced as RECALCULATION_FAILED.
 * The write that preceded them is kept; a later recalculation repairs the
 * chain.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { Bank, BankRef, Entry, IsoDate, RecordId, Shop } from "@daybook/types";
import type { LedgerStore } from "@daybook/store";
import { StoreError } from "@daybook/store";
import {
  BalanceEngine,
  buildReport,
  coversDebit,
  entryTimestamp,
  groupEntriesByDate,
  LedgerError,
  localDate,
  localTime,
  monthRange,
  projectRemaining,
  sortEntries,
  yearRange,
} from "@daybook/ledger";
import type {
  DateRange,
  EntryGroup,
  LedgerReport,
  RecalculationResult,
  RecalculationSummary,
  ReportPeriod,
} from "@daybook/ledger";
import type {
  CreateBankDto,
  CreateEntryDto,
  DeletePeriodQuery,
  LoginDto,
  SignupDto,
  UpdateBankDto,
  UpdateEntryDto,
} from "../types/dto.js";
import { ServiceError } from "./errors.js";
import { hashPassword, verifyPassword } from "./passwords.js";

// =============================================================================
// Types
// =============================================================================

export interface LedgerServiceOptions {
  readonly store: LedgerStore;
  /** Shared engine; one is created over `store` when omitted */
  readonly engine?: BalanceEngine | undefined;
  readonly logger?: Logger | undefined;
  /** Wall clock; decides "today" for the same-day rule and entry times */
  readonly clock?: (() => Date) | undefined;
  readonly generateId?: (() => RecordId) | undefined;
}

/** A shop as returned to clients. */
export interface ShopProfile {
  readonly identifier: string;
  readonly name: string;
  readonly createdAt: string;
}

export interface EntryListFilter {
  readonly bankId?: RecordId | undefined;
  readonly from?: IsoDate | undefined;
  readonly to?: IsoDate | undefined;
}

export interface BankDeletion {
  readonly bankId: RecordId;
  readonly entriesRemoved: number;
}

export interface PeriodDeletion {
  readonly range: DateRange;
  readonly entriesRemoved: number;
  readonly banksRecalculated: readonly RecordId[];
}

function toProfile(shop: Shop): ShopProfile {
  return { identifier: shop.identifier, name: shop.name, createdAt: shop.createdAt };
}

function byName(a: Bank, b: Bank): number {
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  private readonly _store: LedgerStore;
  private readonly _engine: BalanceEngine;
  private readonly _logger: Logger;
  private readonly _clock: () => Date;
  private readonly _generateId: () => RecordId;

  constructor(options: LedgerServiceOptions) {
    this._store = options.store;
    this._engine = options.engine ?? new BalanceEngine(options.store);
    this._logger = options.logger ?? pino({ level: "silent" });
    this._clock = options.clock ?? (() => new Date());
    this._generateId = options.generateId ?? randomUUID;
  }

  get engine(): BalanceEngine {
    return this._engine;
  }

  /** Current business date. */
  today(): IsoDate {
    return localDate(this._clock());
  }

  // ─── Shops ─────────────────────────────────────────────────────────

  async signup(input: SignupDto): Promise<ShopProfile> {
    const existing = await this._store.findShop(input.identifier);
    if (existing !== undefined) {
      throw new ServiceError("SHOP_EXISTS", "Email or mobile already registered");
    }

    const shop: Shop = {
      identifier: input.identifier,
      name: input.name,
      passwordHash: await hashPassword(input.password),
      createdAt: this._clock().toISOString(),
    };

    try {
      await this._store.insertShop(shop);
    } catch (err: unknown) {
      if (err instanceof StoreError && err.code === "DUPLICATE_KEY") {
        throw new ServiceError("SHOP_EXISTS", "Email or mobile already registered");
      }
      throw err;
    }

    this._logger.info({ shopId: shop.identifier }, "Shop registered");
    return toProfile(shop);
  }

  async login(input: LoginDto): Promise<ShopProfile> {
    const shop = await this._store.findShop(input.identifier);
    if (shop === undefined || !(await verifyPassword(input.password, shop.passwordHash))) {
      throw new ServiceError("INVALID_CREDENTIALS", "Invalid email/mobile or password");
    }
    return toProfile(shop);
  }

  async getProfile(shopId: string): Promise<ShopProfile> {
    const shop = await this._store.findShop(shopId);
    if (shop === undefined) {
      throw new ServiceError("SHOP_NOT_FOUND", `Shop '${shopId}' not found`);
    }
    return toProfile(shop);
  }

  // ─── Banks ─────────────────────────────────────────────────────────

  async listBanks(shopId: string): Promise<Bank[]> {
    const banks = await this._store.listBanks(shopId);
    return [...banks].sort(byName);
  }

  async getBank(shopId: string, bankId: RecordId): Promise<Bank> {
    const bank = await this._store.getBank(shopId, bankId);
    if (bank === undefined) {
      throw new ServiceError("BANK_NOT_FOUND", `Bank '${bankId}' not found`);
    }
    return bank;
  }

  async createBank(shopId: string, input: CreateBankDto): Promise<Bank> {
    await this._assertNameFree(shopId, input.name);

    const bank: Bank = {
      id: this._generateId(),
      shopId,
      name: input.name,
      openingBalance: input.openingBalance,
      createdAt: this._clock().toISOString(),
    };
    await this._store.insertBank(bank);
    return bank;
  }

  /**
   * Rename a bank or change its opening balance, then replay its whole
   * chain so balances and denormalized names follow.
   */
  async updateBank(shopId: string, bankId: RecordId, input: UpdateBankDto): Promise<Bank> {
    await this.getBank(shopId, bankId);
    if (input.name !== undefined) {
      await this._assertNameFree(shopId, input.name, bankId);
    }

    const updated = await this._store.updateBank(shopId, bankId, {
      name: input.name,
      openingBalance: input.openingBalance,
    });
    if (updated === undefined) {
      throw new ServiceError("BANK_NOT_FOUND", `Bank '${bankId}' not found`);
    }

    this._settle(shopId, await this._engine.recalculate({ shopId, bankId }));
    return updated;
  }

  /** Delete a bank and every entry posted against it. */
  async deleteBank(shopId: string, bankId: RecordId): Promise<BankDeletion> {
    await this.getBank(shopId, bankId);
    const entriesRemoved = await this._store.deleteEntries({ shopId, bankId });
    await this._store.deleteBank(shopId, bankId);
    this._logger.info({ shopId, bankId, entriesRemoved }, "Bank deleted");
    return { bankId, entriesRemoved };
  }

  async recalculateBank(
    shopId: string,
    bankId: RecordId,
    fromDate?: IsoDate,
  ): Promise<RecalculationSummary> {
    await this.getBank(shopId, bankId);
    return this._settle(shopId, await this._engine.recalculate({ shopId, bankId }, fromDate));
  }

  /**
   * Balance available to a new entry on `date`. Unknown banks report 0.
   */
  async balanceOn(shopId: string, bankId: RecordId, date: IsoDate): Promise<number> {
    const bank = await this._store.getBank(shopId, bankId);
    if (bank === undefined) {
      return 0;
    }
    return this._engine.resolveOpeningBalance(bank, date);
  }

  // ─── Entries ───────────────────────────────────────────────────────

  /** Entries newest first. */
  async listEntries(shopId: string, filter: EntryListFilter = {}): Promise<Entry[]> {
    const entries = await this._store.listEntries({
      shopId,
      bankId: filter.bankId,
      fromDate: filter.from,
      toDate: filter.to,
    });
    return sortEntries(entries)
      .map(({ entry }) => entry)
      .reverse();
  }

  async listEntriesByDate(
    shopId: string,
    filter: EntryListFilter = {},
  ): Promise<EntryGroup<Entry>[]> {
    return groupEntriesByDate(await this.listEntries(shopId, filter));
  }

  async getEntry(shopId: string, entryId: RecordId): Promise<Entry> {
    const entry = await this._store.getEntry(shopId, entryId);
    if (entry === undefined) {
      throw new ServiceError("ENTRY_NOT_FOUND", `Entry '${entryId}' not found`);
    }
    return entry;
  }

  /**
   * Post an entry on `input.date` at the current time of day.
   *
   * Resolution and insert run under the bank's lock; the recalculation
   * from the entry's date queues behind them.
   */
  async createEntry(shopId: string, input: CreateEntryDto): Promise<Entry> {
    const bank = await this.getBank(shopId, input.bankId);
    const ref: BankRef = { shopId, bankId: bank.id };
    const now = this._clock();

    const entry = await this._engine.locks.run(ref, async () => {
      const opening = await this._engine.resolveOpeningBalance(bank, input.date);
      if (!coversDebit(opening, input.debited)) {
        throw new ServiceError(
          "INSUFFICIENT_BALANCE",
          `Debit of ${input.debited} exceeds the available balance of ${opening}`,
          { available: opening },
        );
      }

      const time = localTime(now);
      const created: Entry = {
        id: this._generateId(),
        shopId,
        bankId: bank.id,
        bankName: bank.name,
        date: input.date,
        time,
        entryAt: new Date(entryTimestamp(input.date, time)),
        credited: input.credited,
        debited: input.debited,
        openingBalance: opening,
        remainingBalance: projectRemaining(opening, input.credited, input.debited),
        createdAt: now.toISOString(),
      };
      await this._store.insertEntry(created);
      return created;
    });

    this._settle(shopId, await this._engine.recalculate(ref, input.date));
    return this.getEntry(shopId, entry.id);
  }

  async updateEntry(shopId: string, entryId: RecordId, input: UpdateEntryDto): Promise<Entry> {
    const entry = await this.getEntry(shopId, entryId);
    this._assertSameDay(entry, "Editing past entries is not allowed");

    if (!coversDebit(entry.openingBalance, input.debited)) {
      throw new ServiceError(
        "INSUFFICIENT_BALANCE",
        `Debit of ${input.debited} exceeds the available balance of ${entry.openingBalance}`,
        { available: entry.openingBalance },
      );
    }

    await this._store.updateEntryAmounts(shopId, entryId, {
      credited: input.credited,
      debited: input.debited,
    });
    this._settle(shopId, await this._engine.recalculate({ shopId, bankId: entry.bankId }, entry.date));
    return this.getEntry(shopId, entryId);
  }

  async deleteEntry(shopId: string, entryId: RecordId): Promise<Entry> {
    const entry = await this.getEntry(shopId, entryId);
    this._assertSameDay(entry, "Deleting past entries is not allowed");

    await this._store.deleteEntry(shopId, entryId);
    this._settle(shopId, await this._engine.recalculate({ shopId, bankId: entry.bankId }, entry.date));
    return entry;
  }

  /**
   * Delete every entry of a month or year, optionally for one bank, and
   * recalculate each bank that lost entries from the period start.
   */
  async deleteEntriesInPeriod(shopId: string, query: DeletePeriodQuery): Promise<PeriodDeletion> {
    let range: DateRange;
    if (query.month !== undefined) {
      range = monthRange(query.month);
    } else if (query.year !== undefined) {
      range = yearRange(query.year);
    } else {
      throw new LedgerError("INVALID_RANGE", "Provide a month or a year");
    }
    const filter = {
      shopId,
      bankId: query.bankId,
      fromDate: range.start,
      toDate: range.end,
    };

    const affected = await this._store.listEntries(filter);
    const entriesRemoved = await this._store.deleteEntries(filter);
    const bankIds = [...new Set(affected.map((e) => e.bankId))];

    const results = await this._engine.recalculateAll(shopId, bankIds, range.start);
    for (const result of results) {
      this._settle(shopId, result);
    }

    this._logger.info({ shopId, range, entriesRemoved }, "Entries deleted for period");
    return { range, entriesRemoved, banksRecalculated: bankIds };
  }

  // ─── Reports & Export ──────────────────────────────────────────────

  async report(shopId: string, period: ReportPeriod, range: DateRange): Promise<LedgerReport> {
    const entries = await this._store.listEntries({
      shopId,
      fromDate: range.start,
      toDate: range.end,
    });
    return buildReport(entries, range, period);
  }

  /** Entries oldest first, for export. */
  async exportEntries(shopId: string, filter: EntryListFilter = {}): Promise<Entry[]> {
    return (await this.listEntries(shopId, filter)).reverse();
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private async _assertNameFree(shopId: string, name: string, excludeId?: RecordId): Promise<void> {
    const clash = await this._store.findBankByName(shopId, name, excludeId);
    if (clash !== undefined) {
      throw new ServiceError("BANK_NAME_TAKEN", `Bank name '${name}' already exists`);
    }
  }

  private _assertSameDay(entry: Entry, message: string): void {
    if (entry.date !== this.today()) {
      throw new ServiceError("PAST_ENTRY_LOCKED", message, { date: entry.date });
    }
  }

  private _settle(shopId: string, result: RecalculationResult): RecalculationSummary {
    if (result.ok) {
      return result.summary;
    }
    this._logger.error(
      { err: result.error, shopId, bankId: result.bankId },
      "Balance recalculation failed",
    );
    throw new ServiceError(
      "RECALCULATION_FAILED",
      "Balances are being updated, please try again",
      { bankId: result.bankId },
    );
  }
}
