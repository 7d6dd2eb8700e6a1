/**
 * Shared fixtures for @daybook/ledger tests.
 */

import type { Bank, Entry } from "@daybook/types";
import type { LedgerStore } from "@daybook/store";
import { entryTimestamp } from "../src/ordering.js";
import { projectRemaining, resolveOpeningBalance } from "../src/resolver.js";

export const SHOP = "owner@example.com";

export function makeBank(overrides: Partial<Bank> = {}): Bank {
  return {
    id: "bank-1",
    shopId: SHOP,
    name: "City Bank",
    openingBalance: 1000,
    createdAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

let sequence = 0;

export interface EntryInput {
  readonly id: string;
  readonly date: string;
  readonly time: string;
  readonly credited?: number;
  readonly debited?: number;
  readonly bankId?: string;
}

/**
 * An entry with zeroed balances; `createdAt` increases with every call
 * so insertion order is well defined.
 */
export function makeEntry(input: EntryInput, overrides: Partial<Entry> = {}): Entry {
  sequence++;
  return {
    id: input.id,
    shopId: SHOP,
    bankId: input.bankId ?? "bank-1",
    bankName: "City Bank",
    date: input.date,
    time: input.time,
    entryAt: new Date(entryTimestamp(input.date, input.time)),
    credited: input.credited ?? 0,
    debited: input.debited ?? 0,
    openingBalance: 0,
    remainingBalance: 0,
    createdAt: new Date(Date.UTC(2024, 0, 1, 0, 0, 0, sequence)).toISOString(),
    ...overrides,
  };
}

/**
 * Insert an entry the way the service does: resolve its opening balance
 * first, then store it with its projected remaining balance.
 */
export async function insertResolved(
  store: LedgerStore,
  bank: Bank,
  input: EntryInput,
): Promise<Entry> {
  const opening = await resolveOpeningBalance(store, bank, input.date);
  const base = makeEntry({ ...input, bankId: bank.id });
  const entry: Entry = {
    ...base,
    openingBalance: opening,
    remainingBalance: projectRemaining(opening, base.credited, base.debited),
  };
  await store.insertEntry(entry);
  return entry;
}

/**
 * Balances of a bank's entries keyed by id.
 */
export async function balancesById(
  store: LedgerStore,
  bankId = "bank-1",
): Promise<Record<string, { opening: number; remaining: number }>> {
  const entries = await store.listEntries({ shopId: SHOP, bankId });
  const result: Record<string, { opening: number; remaining: number }> = {};
  for (const e of entries) {
    result[e.id] = { opening: e.openingBalance, remaining: e.remainingBalance };
  }
  return result;
}
