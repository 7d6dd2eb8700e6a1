/**
 * @daybook/node: HTTP API for Daybook.
 *
 * Public API of the package. `main.ts` is the executable entry point.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { LedgerService } from "./services/ledger-service.js";
export type {
  LedgerServiceOptions,
  ShopProfile,
  EntryListFilter,
  BankDeletion,
  PeriodDeletion,
} from "./services/ledger-service.js";
export { ServiceError } from "./services/errors.js";
export type { ServiceErrorCode } from "./services/errors.js";
export { hashPassword, verifyPassword } from "./services/passwords.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
