/**
 * Service-layer errors.
 *
 * Each carries a stable `code` that the error handler maps to an HTTP
 * status. `details` is passed through to the error envelope.
 */

export type ServiceErrorCode =
  | "SHOP_EXISTS"
  | "SHOP_NOT_FOUND"
  | "INVALID_CREDENTIALS"
  | "BANK_NOT_FOUND"
  | "BANK_NAME_TAKEN"
  | "ENTRY_NOT_FOUND"
  | "PAST_ENTRY_LOCKED"
  | "INSUFFICIENT_BALANCE"
  | "RECALCULATION_FAILED";

export class ServiceError extends Error {
  public readonly code: ServiceErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: ServiceErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
    this.details = details;
  }
}
