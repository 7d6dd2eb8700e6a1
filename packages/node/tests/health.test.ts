/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready pings the store
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import { InMemoryLedgerStore, StoreError } from "@daybook/store";
import { createTestApp, jsonRequest } from "./setup.js";

class UnreachableStore extends InMemoryLedgerStore {
  override async ping(): Promise<void> {
    throw new StoreError("STORE_UNAVAILABLE", "connection refused");
  }
}

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app, clock } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body).toEqual({ status: "ok", timestamp: clock.now().toISOString() });
  });

  it("generates an X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "test-req-123",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces an unusable incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "x".repeat(200),
      }),
    );

    expect(res.headers.get("X-Request-Id")).toHaveLength(36);
  });
});

describe("GET /ready", () => {
  it("returns 200 ready when the store answers", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      status: string;
      subsystems: { store: { status: string } };
    };
    expect(body.status).toBe("ready");
    expect(body.subsystems.store.status).toBe("ok");
  });

  it("returns 503 when the store is unreachable", async () => {
    const { app } = createTestApp({ store: new UnreachableStore() });
    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as {
      status: string;
      subsystems: { store: { status: string; detail: string } };
    };
    expect(body.status).toBe("not_ready");
    expect(body.subsystems.store).toEqual({ status: "down", detail: "connection refused" });
  });
});
