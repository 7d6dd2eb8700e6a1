/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { LedgerStore } from "@daybook/store";
import { BalanceEngine } from "@daybook/ledger";
import type { AppEnv } from "./types/api-contract.js";
import { LedgerService } from "./services/ledger-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAuthRoutes } from "./routes/auth.js";
import { createShopRoutes } from "./routes/shop.js";
import { createBankRoutes } from "./routes/banks.js";
import { createEntryRoutes } from "./routes/entries.js";
import { createReportRoutes } from "./routes/reports.js";
import { createExportRoutes } from "./routes/export.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly store: LedgerStore;
  readonly auth: AuthConfig;
  /** Service and error logging. Silent when omitted. */
  readonly logger?: Logger | undefined;
  /** Per-request log sink. Request logging is off when omitted. */
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  readonly idempotencyTtlMs?: number | undefined;
  /** Wall clock for "today", entry times and token timestamps */
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LedgerService;
  readonly engine: BalanceEngine;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const clock = options.clock ?? (() => new Date());
  const engine = new BalanceEngine(options.store);
  const service = new LedgerService({
    store: options.store,
    engine,
    logger: options.logger,
    clock,
  });
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
    () => clock().getTime(),
  );
  const auth: AuthConfig = {
    ...options.auth,
    now: options.auth.now ?? (() => clock().getTime()),
  };

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(options.store, clock));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Public: signup and login answer before the auth middleware runs
  app.route("/api/v1/auth", createAuthRoutes(auth));

  // Secured: auth → idempotency
  app.use("/api/v1/*", authMiddleware(auth));
  app.use("/api/v1/*", idempotencyMiddleware(idempotencyStore));

  app.route("/api/v1", createShopRoutes());
  app.route("/api/v1/banks", createBankRoutes());
  app.route("/api/v1/entries", createEntryRoutes());
  app.route("/api/v1/reports", createReportRoutes());
  app.route("/api/v1/export", createExportRoutes());

  return { app, service, engine, idempotencyStore };
}
