/**
 * Request ID middleware.
 *
 * Generates or propagates an X-Request-Id header for request tracing.
 * An incoming X-Request-Id is kept when it is a short token of letters,
 * digits, dots, dashes, colons and underscores. Otherwise a new UUID is
 * generated.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const USABLE_ID = /^[\w.:-]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const existing = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      existing !== undefined && USABLE_ID.test(existing) ? existing : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
