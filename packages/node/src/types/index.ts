/**
 * Type barrel: re-exports all public types from @daybook/node.
 */

// DTOs
export {
  AmountSchema,
  IsoDateSchema,
  IsoMonthSchema,
  IsoYearSchema,
  SignupSchema,
  LoginSchema,
  CreateBankSchema,
  UpdateBankSchema,
  BalanceQuerySchema,
  RecalculateQuerySchema,
  CreateEntrySchema,
  UpdateEntrySchema,
  ListEntriesQuerySchema,
  DeletePeriodQuerySchema,
  DailyReportQuerySchema,
  MonthlyReportQuerySchema,
  YearlyReportQuerySchema,
  CustomReportQuerySchema,
  ExportQuerySchema,
} from "./dto.js";
export type {
  SignupDto,
  LoginDto,
  CreateBankDto,
  UpdateBankDto,
  BalanceQuery,
  RecalculateQuery,
  CreateEntryDto,
  UpdateEntryDto,
  ListEntriesQuery,
  DeletePeriodQuery,
  ExportQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { JwtClaimsSchema } from "./auth.js";
export type { AuthContext, JwtClaims, IssuedToken } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
