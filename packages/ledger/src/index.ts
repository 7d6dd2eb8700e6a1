/**
 * @daybook/ledger: Balance engine for per-bank running balances.
 *
 * Maintains each bank's "opening balance → remaining balance" chain
 * across inserts, edits, deletes and backdated entries:
 * - A deterministic order over entries (date, time, insertion)
 * - Recalculation from a date forward in one batched write
 * - Opening-balance resolution for new entries
 * - Per-bank serialization of recalculations
 *
 * Plus the report aggregation that reads those chains.
 */

// Engine
export { BalanceEngine } from "./engine.js";
export { BankLocks, bankKey } from "./bank-locks.js";

// Recalculation
export { recalculateBalances, replayChain } from "./recalculate.js";
export type { ChainReplay } from "./recalculate.js";

// Resolution
export { resolveOpeningBalance, projectRemaining, coversDebit } from "./resolver.js";

// Ordering
export {
  MIN_TIMESTAMP,
  entryTimestamp,
  normalizeTime,
  compareEntries,
  sortEntries,
} from "./ordering.js";

// Arithmetic
export {
  MINOR_UNITS,
  MAX_AMOUNT,
  toMinor,
  fromMinor,
  coerceAmount,
  clampBalance,
  applyAmounts,
  sumAmounts,
  hasMinorPrecision,
} from "./money-math.js";

// Periods and reports
export {
  localDate,
  localTime,
  addDays,
  dayRange,
  weekToDate,
  monthRange,
  yearRange,
  customRange,
} from "./periods.js";
export { buildReport, groupEntriesByDate } from "./report.js";

// Types
export type {
  RecalculationSummary,
  RecalculationResult,
  ReportPeriod,
  DateRange,
  BankSummary,
  LedgerReport,
  EntryGroup,
  LedgerErrorCode,
} from "./types.js";
export { LedgerError } from "./types.js";
