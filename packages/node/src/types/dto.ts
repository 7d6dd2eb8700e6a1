/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import { isIsoDate, isIsoMonth, isIsoYear } from "@daybook/types";
import { MAX_AMOUNT, hasMinorPrecision } from "@daybook/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .number()
  .finite()
  .nonnegative()
  .max(MAX_AMOUNT, { message: `Amount must not exceed ${MAX_AMOUNT}` })
  .refine(hasMinorPrecision, { message: "Amount must have at most two decimals" });

export const IsoDateSchema = z
  .string()
  .refine(isIsoDate, { message: "Expected a YYYY-MM-DD date" });

export const IsoMonthSchema = z
  .string()
  .refine(isIsoMonth, { message: "Expected a YYYY-MM month" });

export const IsoYearSchema = z
  .string()
  .refine(isIsoYear, { message: "Expected a YYYY year" });

const BankNameSchema = z.string().trim().min(1).max(60);

const AmountFields = {
  credited: AmountSchema.default(0),
  debited: AmountSchema.default(0),
};

/**
 * credited/debited: both non-negative, exactly one nonzero.
 */
function requireOneAmount(
  value: { credited: number; debited: number },
  ctx: z.RefinementCtx,
): void {
  if (value.credited > 0 && value.debited > 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Enter either credited or debited amount, not both",
      path: ["debited"],
    });
  } else if (value.credited === 0 && value.debited === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Enter a credited or debited amount",
      path: ["credited"],
    });
  }
}

// =============================================================================
// Auth DTOs
// =============================================================================

export const SignupSchema = z.object({
  identifier: z.string().trim().min(1).max(254),
  password: z.string().min(1).max(1024),
  name: z.string().trim().min(1).max(120),
});

export type SignupDto = z.infer<typeof SignupSchema>;

export const LoginSchema = z.object({
  identifier: z.string().trim().min(1),
  password: z.string().min(1),
});

export type LoginDto = z.infer<typeof LoginSchema>;

// =============================================================================
// Bank DTOs
// =============================================================================

export const CreateBankSchema = z.object({
  name: BankNameSchema,
  openingBalance: AmountSchema,
});

export type CreateBankDto = z.infer<typeof CreateBankSchema>;

export const UpdateBankSchema = z
  .object({
    name: BankNameSchema.optional(),
    openingBalance: AmountSchema.optional(),
  })
  .refine((v) => v.name !== undefined || v.openingBalance !== undefined, {
    message: "Provide a name or an opening balance",
  });

export type UpdateBankDto = z.infer<typeof UpdateBankSchema>;

export const BalanceQuerySchema = z.object({
  date: IsoDateSchema,
});

export type BalanceQuery = z.infer<typeof BalanceQuerySchema>;

export const RecalculateQuerySchema = z.object({
  from: IsoDateSchema.optional(),
});

export type RecalculateQuery = z.infer<typeof RecalculateQuerySchema>;

// =============================================================================
// Entry DTOs
// =============================================================================

export const CreateEntrySchema = z
  .object({
    bankId: z.string().min(1),
    date: IsoDateSchema,
    ...AmountFields,
  })
  .superRefine(requireOneAmount);

export type CreateEntryDto = z.infer<typeof CreateEntrySchema>;

export const UpdateEntrySchema = z.object(AmountFields).superRefine(requireOneAmount);

export type UpdateEntryDto = z.infer<typeof UpdateEntrySchema>;

export const ListEntriesQuerySchema = z.object({
  bankId: z.string().min(1).optional(),
  from: IsoDateSchema.optional(),
  to: IsoDateSchema.optional(),
  grouped: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
});

export type ListEntriesQuery = z.infer<typeof ListEntriesQuerySchema>;

export const DeletePeriodQuerySchema = z
  .object({
    month: IsoMonthSchema.optional(),
    year: IsoYearSchema.optional(),
    bankId: z.string().min(1).optional(),
  })
  .refine((v) => (v.month === undefined) !== (v.year === undefined), {
    message: "Provide exactly one of month or year",
  });

export type DeletePeriodQuery = z.infer<typeof DeletePeriodQuerySchema>;

// =============================================================================
// Report DTOs
// =============================================================================

export const DailyReportQuerySchema = z.object({ date: IsoDateSchema.optional() });
export const MonthlyReportQuerySchema = z.object({ month: IsoMonthSchema.optional() });
export const YearlyReportQuerySchema = z.object({ year: IsoYearSchema.optional() });
export const CustomReportQuerySchema = z.object({
  start: IsoDateSchema,
  end: IsoDateSchema,
});

export const ExportQuerySchema = z.object({
  from: IsoDateSchema.optional(),
  to: IsoDateSchema.optional(),
});

export type ExportQuery = z.infer<typeof ExportQuerySchema>;
