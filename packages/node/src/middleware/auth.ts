/**
 * Authentication middleware.
 *
 * Accepts a JWT bearer token via the Authorization header, verified with
 * HMAC-SHA256. The token subject is the shop identifier.
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, IssuedToken, JwtClaims } from "../types/auth.js";
import { JwtClaimsSchema } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Config
// =============================================================================

export interface AuthConfig {
  /** JWT HMAC secret */
  readonly jwtSecret: string;
  /** Issuer written into and expected on every token */
  readonly jwtIssuer?: string | undefined;
  /** Lifetime of issued tokens. Default: 12 hours */
  readonly tokenTtlSeconds?: number | undefined;
  /** Clock used for `iat`/`exp`. Default: Date.now */
  readonly now?: (() => number) | undefined;
}

const DEFAULT_TTL_SECONDS = 12 * 60 * 60;

function nowSeconds(config: AuthConfig): number {
  return Math.floor((config.now ?? Date.now)() / 1000);
}

// =============================================================================
// Auth Middleware
// =============================================================================

/**
 * Create authentication middleware.
 *
 * Returns 401 if the Authorization header is missing or the token is
 * invalid or expired.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const authHeader = c.req.header("Authorization");
    if (authHeader === undefined || !authHeader.startsWith("Bearer ")) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const claims = verifyJwt(
      authHeader.slice(7),
      config.jwtSecret,
      config.jwtIssuer,
      nowSeconds(config),
    );
    if (claims === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid or expired token"),
        401,
      );
    }

    const auth: AuthContext = { shopId: claims.sub, shopName: claims.name };
    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// JWT Helpers
// =============================================================================

function sign(input: string, secret: string): string {
  return createHmac("sha256", secret).update(input).digest("base64url");
}

function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
}

/**
 * Verify a JWT token using HMAC-SHA256.
 *
 * Only supports HS256 (alg: "HS256").
 *
 * @param nowSec - current time in seconds since the epoch
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
  nowSec: number = Math.floor(Date.now() / 1000),
): JwtClaims | undefined {
  const parts = token.split(".");
  if (parts.length !== 3) {
    return undefined;
  }
  const [headerB64 = "", payloadB64 = "", signatureB64 = ""] = parts;

  // Verify signature
  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signatureB64);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return undefined;
  }

  const header = decodeSegment(headerB64);
  if (
    typeof header !== "object" ||
    header === null ||
    !("alg" in header) ||
    header.alg !== "HS256"
  ) {
    return undefined;
  }

  const parsed = JwtClaimsSchema.safeParse(decodeSegment(payloadB64));
  if (!parsed.success) {
    return undefined;
  }
  const claims = parsed.data;

  if (claims.exp < nowSec) {
    return undefined;
  }
  if (expectedIssuer !== undefined && claims.iss !== expectedIssuer) {
    return undefined;
  }

  return claims;
}

/**
 * Create a signed JWT.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(
    JSON.stringify({ alg: "HS256", typ: "JWT" }),
  ).toString("base64url");

  const payload = Buffer.from(
    JSON.stringify({
      ...claims,
      iat: claims.iat ?? Math.floor(Date.now() / 1000),
    }),
  ).toString("base64url");

  return `${header}.${payload}.${sign(`${header}.${payload}`, secret)}`;
}

/**
 * Issue a login token for a shop.
 */
export function issueToken(
  shop: { readonly identifier: string; readonly name: string },
  config: AuthConfig,
): IssuedToken {
  const iat = nowSeconds(config);
  const exp = iat + (config.tokenTtlSeconds ?? DEFAULT_TTL_SECONDS);
  const token = signJwt(
    { sub: shop.identifier, name: shop.name, iss: config.jwtIssuer ?? "", exp, iat },
    config.jwtSecret,
  );
  return { token, expiresAt: new Date(exp * 1000).toISOString() };
}
