/**
 * Request logging middleware.
 *
 * One record per request, handed to a sink; main.ts forwards it to pino
 * at the record's level.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export type RequestLogLevel = "info" | "warn" | "error";

export interface RequestLogEntry {
  readonly level: RequestLogLevel;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Authenticated shop, when the request carried a valid token */
  readonly shopId?: string | undefined;
  /** The response came from the idempotency cache, not a second post */
  readonly replayed: boolean;
}

export function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const status = c.res.status;
    log({
      level: levelForStatus(status),
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      shopId: c.var.auth?.shopId,
      replayed: c.res.headers.get("X-Idempotent-Replay") === "true",
    });
  };
}
