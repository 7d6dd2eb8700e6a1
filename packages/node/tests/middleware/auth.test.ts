/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - JWT bearer auth (valid, invalid, expired)
 * - Signature, algorithm and issuer checks
 * - Token issuing
 */

import { createHmac } from "node:crypto";
import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { AuthContext } from "../../src/types/auth.js";
import {
  authMiddleware,
  issueToken,
  signJwt,
  verifyJwt,
} from "../../src/middleware/auth.js";

const JWT_SECRET = "test-secret";
const NOW_SEC = 1_800_000_000;

function makeApp() {
  const app = new Hono<AppEnv>();
  app.use(
    "*",
    authMiddleware({
      jwtSecret: JWT_SECRET,
      jwtIssuer: "daybook",
      now: () => NOW_SEC * 1000,
    }),
  );
  app.get("/test", (c) => {
    const auth = c.get("auth");
    return c.json({ auth });
  });
  return app;
}

function token(overrides: Partial<{ sub: string; iss: string; exp: number }> = {}): string {
  return signJwt(
    {
      sub: "owner@example.com",
      name: "Corner Shop",
      iss: "daybook",
      exp: NOW_SEC + 60,
      iat: NOW_SEC,
      ...overrides,
    },
    JWT_SECRET,
  );
}

function encode(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

function hs256(input: string): string {
  return createHmac("sha256", JWT_SECRET).update(input).digest("base64url");
}

// =============================================================================
// Middleware
// =============================================================================

describe("JWT bearer auth", () => {
  it("authenticates with a valid token", async () => {
    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token()}` },
    });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({ shopId: "owner@example.com", shopName: "Corner Shop" });
  });

  it("returns 401 without an Authorization header", async () => {
    const res = await makeApp().request("/test");

    expect(res.status).toBe(401);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });
  });

  it("returns 401 for a non-bearer scheme", async () => {
    const res = await makeApp().request("/test", {
      headers: { Authorization: "Basic dXNlcjpwYXNz" },
    });
    expect(res.status).toBe(401);
  });

  it("returns 401 for an expired token", async () => {
    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token({ exp: NOW_SEC - 1 })}` },
    });

    expect(res.status).toBe(401);
    const body = (await res.json()) as { error: { message: string } };
    expect(body.error.message).toBe("Invalid or expired token");
  });

  it("returns 401 for a token from another issuer", async () => {
    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token({ iss: "elsewhere" })}` },
    });
    expect(res.status).toBe(401);
  });
});

// =============================================================================
// verifyJwt
// =============================================================================

describe("verifyJwt", () => {
  it("returns the claims of a valid token", () => {
    const claims = verifyJwt(token(), JWT_SECRET, "daybook", NOW_SEC);
    expect(claims).toEqual({
      sub: "owner@example.com",
      name: "Corner Shop",
      iss: "daybook",
      exp: NOW_SEC + 60,
      iat: NOW_SEC,
    });
  });

  it("accepts a token at its exact expiry second", () => {
    expect(verifyJwt(token({ exp: NOW_SEC }), JWT_SECRET, "daybook", NOW_SEC)).toBeDefined();
  });

  it("rejects a token signed with another secret", () => {
    const forged = signJwt(
      { sub: "owner@example.com", name: "x", iss: "daybook", exp: NOW_SEC + 60 },
      "other-secret",
    );
    expect(verifyJwt(forged, JWT_SECRET, "daybook", NOW_SEC)).toBeUndefined();
  });

  it("rejects a tampered payload", () => {
    const [header = "", , signature = ""] = token().split(".");
    const payload = encode({
      sub: "intruder@example.com",
      name: "x",
      iss: "daybook",
      exp: NOW_SEC + 60,
      iat: NOW_SEC,
    });
    expect(verifyJwt(`${header}.${payload}.${signature}`, JWT_SECRET, "daybook", NOW_SEC)).toBeUndefined();
  });

  it("rejects any algorithm but HS256", () => {
    const header = encode({ alg: "none", typ: "JWT" });
    const payload = encode({
      sub: "owner@example.com",
      name: "x",
      iss: "daybook",
      exp: NOW_SEC + 60,
      iat: NOW_SEC,
    });
    const forged = `${header}.${payload}.${hs256(`${header}.${payload}`)}`;

    expect(verifyJwt(forged, JWT_SECRET, "daybook", NOW_SEC)).toBeUndefined();
  });

  it("rejects claims of the wrong shape", () => {
    const header = encode({ alg: "HS256", typ: "JWT" });
    const payload = encode({ sub: "owner@example.com", exp: "tomorrow" });

    expect(
      verifyJwt(`${header}.${payload}.${hs256(`${header}.${payload}`)}`, JWT_SECRET, undefined, NOW_SEC),
    ).toBeUndefined();
  });

  it("rejects a token that is not three segments", () => {
    expect(verifyJwt("a.b", JWT_SECRET, undefined, NOW_SEC)).toBeUndefined();
  });
});

// =============================================================================
// issueToken
// =============================================================================

describe("issueToken", () => {
  it("issues a token the middleware accepts", () => {
    const issued = issueToken(
      { identifier: "owner@example.com", name: "Corner Shop" },
      { jwtSecret: JWT_SECRET, jwtIssuer: "daybook", tokenTtlSeconds: 600, now: () => NOW_SEC * 1000 },
    );

    expect(issued.expiresAt).toBe(new Date((NOW_SEC + 600) * 1000).toISOString());
    expect(verifyJwt(issued.token, JWT_SECRET, "daybook", NOW_SEC + 600)?.sub).toBe(
      "owner@example.com",
    );
    expect(verifyJwt(issued.token, JWT_SECRET, "daybook", NOW_SEC + 601)).toBeUndefined();
  });
});
