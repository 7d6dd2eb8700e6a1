/**
 * @daybook/types: Shared record types for the Daybook stack.
 *
 * Used across all Daybook packages:
 * - Shops, banks and daily entries
 * - Format and record guards for system boundaries
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

export type {
  RecordId,
  IsoDate,
  TimeOfDay,
  Shop,
  Bank,
  Entry,
  EntryDirection,
  BankRef,
} from "./bookkeeping.js";

export {
  isIsoDate,
  isTimeOfDay,
  isIsoMonth,
  isIsoYear,
  isShop,
  isBank,
  isEntry,
  entryDirection,
} from "./guards.js";
