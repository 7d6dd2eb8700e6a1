/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import pino from "pino";
import { LedgerError } from "@daybook/ledger";
import { StoreError } from "@daybook/store";
import { ServiceError } from "../../src/services/errors.js";
import { createErrorHandler, handleError } from "../../src/middleware/error-handler.js";

function throwingApp(err: Error, handler = handleError) {
  const app = new Hono();
  app.get("/boom", () => {
    throw err;
  });
  app.onError(handler);
  return app;
}

async function envelope(res: Response) {
  return (await res.json()) as {
    error: { code: string; message: string; details?: Record<string, unknown> };
  };
}

describe("error handler", () => {
  it.each([
    ["SHOP_EXISTS", 409],
    ["INVALID_CREDENTIALS", 401],
    ["BANK_NOT_FOUND", 404],
    ["BANK_NAME_TAKEN", 409],
    ["ENTRY_NOT_FOUND", 404],
    ["PAST_ENTRY_LOCKED", 403],
    ["INSUFFICIENT_BALANCE", 422],
    ["RECALCULATION_FAILED", 503],
  ] as const)("maps %s to %i", async (code, status) => {
    const res = await throwingApp(new ServiceError(code, "nope")).request("/boom");

    expect(res.status).toBe(status);
    expect((await envelope(res)).error).toEqual({ code, message: "nope" });
  });

  it("passes service error details through", async () => {
    const res = await throwingApp(
      new ServiceError("INSUFFICIENT_BALANCE", "too much", { available: 12.5 }),
    ).request("/boom");

    expect((await envelope(res)).error.details).toEqual({ available: 12.5 });
  });

  it("maps ledger range errors to 400", async () => {
    const res = await throwingApp(new LedgerError("INVALID_RANGE", "bad range")).request("/boom");

    expect(res.status).toBe(400);
    expect((await envelope(res)).error).toEqual({ code: "INVALID_RANGE", message: "bad range" });
  });

  it("maps an unavailable store to 503", async () => {
    const res = await throwingApp(new StoreError("STORE_UNAVAILABLE", "down")).request("/boom");
    expect(res.status).toBe(503);
  });

  it("hides unknown errors behind a 500", async () => {
    const res = await throwingApp(new Error("secret internals")).request("/boom");

    expect(res.status).toBe(500);
    expect((await envelope(res)).error).toEqual({
      code: "INTERNAL_ERROR",
      message: "Internal server error",
    });
  });

  it("logs unknown errors", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "error" }, { write: (line: string) => lines.push(line) });

    await throwingApp(new Error("secret internals"), createErrorHandler(logger)).request("/boom");

    expect(lines).toHaveLength(1);
    const record = JSON.parse(lines[0] ?? "{}") as { msg: string; path: string; err: { message: string } };
    expect(record.msg).toBe("Unhandled error");
    expect(record.path).toBe("/boom");
    expect(record.err.message).toBe("secret internals");
  });

  it("does not log mapped errors", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "error" }, { write: (line: string) => lines.push(line) });

    await throwingApp(new ServiceError("BANK_NOT_FOUND", "gone"), createErrorHandler(logger)).request(
      "/boom",
    );

    expect(lines).toEqual([]);
  });
});
