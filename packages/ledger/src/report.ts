/**
 * @daybook/ledger: Report aggregation.
 *
 * Summarizes the entries of a date range: totals, per-bank volume and
 * closing balances, the most used banks and the single largest amount.
 * Amounts are coerced the same way recalculation coerces them.
 */

import type { Entry } from "@daybook/types";
import { coerceAmount, sumAmounts, toMinor, fromMinor } from "./money-math.js";
import { entryTimestamp } from "./ordering.js";
import type {
  BankSummary,
  DateRange,
  EntryGroup,
  LedgerReport,
  ReportPeriod,
} from "./types.js";

const NONE = "N/A";
const TOP_BANK_COUNT = 3;

interface BankAccumulator {
  readonly bank: string;
  credit: number; // minor units
  debit: number; // minor units
  closing: number;
  closingTimestamp: number;
}

/**
 * Build a report for entries already narrowed to `range`.
 */
export function buildReport(
  entries: readonly Entry[],
  range: DateRange,
  period: ReportPeriod,
): LedgerReport {
  const byBank = new Map<string, BankAccumulator>();

  let highestMinor = 0;
  let highestBank = NONE;

  for (const entry of entries) {
    const credited = coerceAmount(entry.credited);
    const debited = coerceAmount(entry.debited);
    const timestamp = entryTimestamp(entry.date, entry.time);

    let acc = byBank.get(entry.bankName);
    if (acc === undefined) {
      acc = {
        bank: entry.bankName,
        credit: 0,
        debit: 0,
        closing: coerceAmount(entry.remainingBalance),
        closingTimestamp: timestamp,
      };
      byBank.set(entry.bankName, acc);
    }
    acc.credit += toMinor(credited);
    acc.debit += toMinor(debited);
    if (timestamp >= acc.closingTimestamp) {
      acc.closing = coerceAmount(entry.remainingBalance);
      acc.closingTimestamp = timestamp;
    }

    // Ties go to the later entry.
    const amount = toMinor(Math.max(credited, debited));
    if (amount >= highestMinor) {
      highestMinor = amount;
      highestBank = entry.bankName;
    }
  }

  const bankWise: BankSummary[] = [...byBank.values()]
    .map((acc) => ({
      bank: acc.bank,
      totalCredit: fromMinor(acc.credit),
      totalDebit: fromMinor(acc.debit),
      closingBalance: acc.closing,
    }))
    .sort((a, b) => a.bank.toLowerCase().localeCompare(b.bank.toLowerCase()));

  const byVolume = [...bankWise].sort(
    (a, b) => toMinor(b.totalCredit + b.totalDebit) - toMinor(a.totalCredit + a.totalDebit),
  );

  return {
    period,
    range,
    entryCount: entries.length,
    totalCredit: sumAmounts(entries.map((e) => coerceAmount(e.credited))),
    totalDebit: sumAmounts(entries.map((e) => coerceAmount(e.debited))),
    mostUsedBank: byVolume[0]?.bank ?? NONE,
    topBanks: byVolume.slice(0, TOP_BANK_COUNT).map((b) => b.bank),
    highestAmount: fromMinor(highestMinor),
    highestBank: entries.length > 0 ? highestBank : NONE,
    closingBalance: sumAmounts(bankWise.map((b) => b.closingBalance)),
    bankWise,
  };
}

/**
 * Group consecutive rows sharing a business date. Input order is kept,
 * so callers sort first.
 */
export function groupEntriesByDate<T extends { readonly date: string }>(
  entries: readonly T[],
): EntryGroup<T>[] {
  const groups: { date: string; rows: T[] }[] = [];
  for (const entry of entries) {
    const last = groups[groups.length - 1];
    if (last !== undefined && last.date === entry.date) {
      last.rows.push(entry);
    } else {
      groups.push({ date: entry.date, rows: [entry] });
    }
  }
  return groups;
}
