/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { LedgerService } from "../services/ledger-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the Daybook app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Shared LedgerService (set for every /api/* request) */
    service: LedgerService;

    /** Authenticated shop (set by auth middleware) */
    auth: AuthContext;
  };
}
