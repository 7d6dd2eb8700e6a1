/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler, handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  scopedKey,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
export { versionTag, ifMatchAdmits, rejectStale, tagResponse } from "./etag.js";
export type { Versioned } from "./etag.js";
export { authMiddleware, verifyJwt, signJwt, issueToken } from "./auth.js";
export type { AuthConfig } from "./auth.js";
