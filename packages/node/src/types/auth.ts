/**
 * Authentication types.
 *
 * A shop authenticates with a bearer JWT whose subject is the shop
 * identifier. That identifier is also the tenant scope of every query.
 */

import { z } from "zod";

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  /** Shop identifier (email or mobile) */
  readonly shopId: string;
  readonly shopName: string;
}

// =============================================================================
// JWT Claims
// =============================================================================

export const JwtClaimsSchema = z.object({
  sub: z.string().min(1),
  name: z.string(),
  iss: z.string().default(""),
  exp: z.number(),
  iat: z.number(),
});

export type JwtClaims = z.infer<typeof JwtClaimsSchema>;

/** Token handed out on login. */
export interface IssuedToken {
  readonly token: string;
  /** ISO 8601 */
  readonly expiresAt: string;
}
