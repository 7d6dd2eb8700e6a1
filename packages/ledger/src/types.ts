/**
 * @daybook/ledger: Types for the balance engine and reports.
 *
 * Rules:
 * - All types are readonly
 * - The engine never throws for bad stored data; it repairs it
 * - Storage failures come back as values, not exceptions
 */

import type { IsoDate, RecordId } from "@daybook/types";
import type { StoreError } from "@daybook/store";

// ─── Recalculation ───────────────────────────────────────────────────────

/**
 * What a recalculation did for one bank.
 */
export interface RecalculationSummary {
  readonly bankId: RecordId;

  /** First date replayed; undefined for a full-chain replay */
  readonly fromDate?: IsoDate | undefined;

  /** False when the bank no longer exists (nothing to do) */
  readonly bankFound: boolean;

  /** Balance carried into the first replayed entry */
  readonly baseBalance: number;

  /** Remaining balance after the last replayed entry */
  readonly closingBalance: number;

  /** Entries rewritten by the batched write */
  readonly updated: number;
}

export type RecalculationResult =
  | { readonly ok: true; readonly summary: RecalculationSummary }
  | { readonly ok: false; readonly bankId: RecordId; readonly error: StoreError };

// ─── Reports ─────────────────────────────────────────────────────────────

export type ReportPeriod = "daily" | "weekly" | "monthly" | "yearly" | "custom";

/** Inclusive date range. */
export interface DateRange {
  readonly start: IsoDate;
  readonly end: IsoDate;
}

export interface BankSummary {
  readonly bank: string;
  readonly totalCredit: number;
  readonly totalDebit: number;

  /** Remaining balance of the bank's latest entry in the range */
  readonly closingBalance: number;
}

export interface LedgerReport {
  readonly period: ReportPeriod;
  readonly range: DateRange;
  readonly entryCount: number;
  readonly totalCredit: number;
  readonly totalDebit: number;
  readonly mostUsedBank: string;
  readonly topBanks: readonly string[];
  readonly highestAmount: number;
  readonly highestBank: string;

  /** Sum of bank-wise closing balances */
  readonly closingBalance: number;
  readonly bankWise: readonly BankSummary[];
}

/** Rows of one business date, as listed on the entries page. */
export interface EntryGroup<T> {
  readonly date: string;
  readonly rows: readonly T[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type LedgerErrorCode = "INVALID_RANGE";

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
