/**
 * Tests for bank routes.
 *
 * Verifies:
 * - Create, list, get, rename, delete
 * - Case-insensitive name uniqueness per shop
 * - Opening balance edits replay the chain
 * - Balance lookups and manual recalculation
 * - Shops never see each other's banks
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Bank } from "@daybook/types";
import {
  bearer,
  createBank,
  createTestApp,
  jsonRequest,
  postEntry,
  signupAndLogin,
} from "../setup.js";
import type { EntryJson, TestApp } from "../setup.js";

interface ErrorBody {
  error: { code: string; message: string };
}

let testApp: TestApp;
let token: string;

beforeEach(async () => {
  testApp = createTestApp();
  token = await signupAndLogin(testApp);
});

function request(path: string, method = "GET", body?: unknown, headers: Record<string, string> = {}) {
  return testApp.app.request(jsonRequest(path, method, body, { ...bearer(token), ...headers }));
}

// =============================================================================
// Create / List / Get
// =============================================================================

describe("POST /api/v1/banks", () => {
  it("creates a bank owned by the shop", async () => {
    const res = await request("/api/v1/banks", "POST", { name: "City Bank", openingBalance: 1000 });

    expect(res.status).toBe(201);
    expect(res.headers.get("ETag")).toMatch(/^"bank-[a-f0-9]{16}"$/);
    const body = (await res.json()) as { data: Bank };
    expect(body.data).toMatchObject({
      shopId: "owner@example.com",
      name: "City Bank",
      openingBalance: 1000,
    });
    expect(body.data.id).toBeTruthy();
  });

  it("rejects a name already used with different casing", async () => {
    await createBank(testApp, token, "City Bank", 1000);

    const res = await request("/api/v1/banks", "POST", { name: "city bank", openingBalance: 5 });

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "BANK_NAME_TAKEN",
      message: "Bank name 'city bank' already exists",
    });
  });

  it("rejects a negative opening balance", async () => {
    const res = await request("/api/v1/banks", "POST", { name: "City Bank", openingBalance: -1 });
    expect(res.status).toBe(400);
  });

  it("rejects more than two decimals", async () => {
    const res = await request("/api/v1/banks", "POST", { name: "City Bank", openingBalance: 10.005 });
    expect(res.status).toBe(400);
  });

  it("rejects an opening balance above the amount ceiling", async () => {
    const res = await request("/api/v1/banks", "POST", { name: "City Bank", openingBalance: 1e13 });
    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/banks", () => {
  it("lists banks by name, ignoring case", async () => {
    await createBank(testApp, token, "Zen Bank", 1);
    await createBank(testApp, token, "apex bank", 2);
    await createBank(testApp, token, "City Bank", 3);

    const res = await request("/api/v1/banks");
    const body = (await res.json()) as { data: Bank[] };

    expect(body.data.map((b) => b.name)).toEqual(["apex bank", "City Bank", "Zen Bank"]);
  });

  it("does not list another shop's banks", async () => {
    await createBank(testApp, token, "City Bank", 1000);
    const otherToken = await signupAndLogin(testApp, "other@example.com", "Other Shop");

    const res = await testApp.app.request(
      jsonRequest("/api/v1/banks", "GET", undefined, bearer(otherToken)),
    );
    const body = (await res.json()) as { data: Bank[] };

    expect(body.data).toEqual([]);
  });
});

describe("GET /api/v1/banks/:id", () => {
  it("returns 404 for another shop's bank", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    const otherToken = await signupAndLogin(testApp, "other@example.com", "Other Shop");

    const res = await testApp.app.request(
      jsonRequest(`/api/v1/banks/${bank.id}`, "GET", undefined, bearer(otherToken)),
    );

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("BANK_NOT_FOUND");
  });
});

// =============================================================================
// Update
// =============================================================================

describe("PATCH /api/v1/banks/:id", () => {
  it("replays the chain when the opening balance changes", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    const entry = await postEntry(testApp, token, {
      bankId: bank.id,
      date: "2026-03-11",
      credited: 500,
    });
    expect(entry.remainingBalance).toBe(1500);

    const res = await request(`/api/v1/banks/${bank.id}`, "PATCH", { openingBalance: 2000 });
    expect(res.status).toBe(200);

    const after = await request(`/api/v1/entries/${entry.id}`);
    const body = (await after.json()) as { data: EntryJson };
    expect(body.data.openingBalance).toBe(2000);
    expect(body.data.remainingBalance).toBe(2500);
  });

  it("carries a rename into existing entries", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    const entry = await postEntry(testApp, token, {
      bankId: bank.id,
      date: "2026-03-11",
      credited: 10,
    });

    await request(`/api/v1/banks/${bank.id}`, "PATCH", { name: "City Bank Ltd" });

    const after = await request(`/api/v1/entries/${entry.id}`);
    const body = (await after.json()) as { data: EntryJson };
    expect(body.data.bankName).toBe("City Bank Ltd");
  });

  it("allows re-casing the bank's own name", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    const res = await request(`/api/v1/banks/${bank.id}`, "PATCH", { name: "CITY BANK" });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: Bank };
    expect(body.data.name).toBe("CITY BANK");
  });

  it("returns 400 for an empty patch", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    const res = await request(`/api/v1/banks/${bank.id}`, "PATCH", {});
    expect(res.status).toBe(400);
  });

  it("returns 412 when If-Match is stale", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);

    const res = await request(
      `/api/v1/banks/${bank.id}`,
      "PATCH",
      { name: "Renamed" },
      { "If-Match": '"0000000000000000"' },
    );

    expect(res.status).toBe(412);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("PRECONDITION_FAILED");
  });

  it("applies the patch when If-Match is current", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    const get = await request(`/api/v1/banks/${bank.id}`);
    const etag = get.headers.get("ETag") ?? "";

    const res = await request(
      `/api/v1/banks/${bank.id}`,
      "PATCH",
      { openingBalance: 1200 },
      { "If-Match": etag },
    );

    expect(res.status).toBe(200);
    expect(res.headers.get("ETag")).not.toBe(etag);
  });
});

// =============================================================================
// Delete
// =============================================================================

describe("DELETE /api/v1/banks/:id", () => {
  it("removes the bank and its entries", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    await postEntry(testApp, token, { bankId: bank.id, date: "2026-03-11", credited: 10 });
    await postEntry(testApp, token, { bankId: bank.id, date: "2026-03-11", debited: 5 });

    const res = await request(`/api/v1/banks/${bank.id}`, "DELETE");
    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { bankId: string; entriesRemoved: number } };
    expect(body.data).toEqual({ bankId: bank.id, entriesRemoved: 2 });

    expect((await request(`/api/v1/banks/${bank.id}`)).status).toBe(404);
    const list = (await (await request("/api/v1/entries")).json()) as { data: EntryJson[] };
    expect(list.data).toEqual([]);
  });
});

// =============================================================================
// Balance & Recalculation
// =============================================================================

describe("GET /api/v1/banks/:id/balance", () => {
  it("returns the balance available on a date", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    await postEntry(testApp, token, { bankId: bank.id, date: "2026-03-11", credited: 500 });

    const before = await request(`/api/v1/banks/${bank.id}/balance?date=2026-03-10`);
    const on = await request(`/api/v1/banks/${bank.id}/balance?date=2026-03-11`);

    expect(((await before.json()) as { data: unknown }).data).toEqual({
      bankId: bank.id,
      date: "2026-03-10",
      balance: 1000,
    });
    expect(((await on.json()) as { data: { balance: number } }).data.balance).toBe(1500);
  });

  it("reports 0 for an unknown bank", async () => {
    const res = await request("/api/v1/banks/missing/balance?date=2026-03-11");

    expect(res.status).toBe(200);
    expect(((await res.json()) as { data: { balance: number } }).data.balance).toBe(0);
  });

  it("requires a date", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    const res = await request(`/api/v1/banks/${bank.id}/balance`);
    expect(res.status).toBe(400);
  });
});

describe("POST /api/v1/banks/:id/recalculate", () => {
  it("replays the whole chain and reports what it did", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    await postEntry(testApp, token, { bankId: bank.id, date: "2026-03-10", credited: 500 });
    await postEntry(testApp, token, { bankId: bank.id, date: "2026-03-11", debited: 300 });

    const res = await request(`/api/v1/banks/${bank.id}/recalculate`, "POST");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data).toEqual({
      bankId: bank.id,
      bankFound: true,
      baseBalance: 1000,
      closingBalance: 1200,
      updated: 2,
    });
  });

  it("replays from a date", async () => {
    const bank = await createBank(testApp, token, "City Bank", 1000);
    await postEntry(testApp, token, { bankId: bank.id, date: "2026-03-10", credited: 500 });
    await postEntry(testApp, token, { bankId: bank.id, date: "2026-03-11", debited: 300 });

    const res = await request(`/api/v1/banks/${bank.id}/recalculate?from=2026-03-11`, "POST");
    const body = (await res.json()) as { data: Record<string, unknown> };

    expect(body.data).toEqual({
      bankId: bank.id,
      fromDate: "2026-03-11",
      bankFound: true,
      baseBalance: 1500,
      closingBalance: 1200,
      updated: 1,
    });
  });

  it("returns 404 for an unknown bank", async () => {
    const res = await request("/api/v1/banks/missing/recalculate", "POST");
    expect(res.status).toBe(404);
  });
});
