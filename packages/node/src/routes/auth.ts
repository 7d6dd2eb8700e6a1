/**
 * Shop registration and login.
 *
 * POST /api/v1/auth/signup  Register a shop
 * POST /api/v1/auth/login   Exchange credentials for a bearer token
 *
 * Mounted before the auth middleware; these are the only public /api routes.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { LoginSchema, SignupSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { issueToken } from "../middleware/auth.js";
import type { AuthConfig } from "../middleware/auth.js";

export function createAuthRoutes(config: AuthConfig): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/signup", validateBody(SignupSchema), async (c) => {
    const shop = await c.get("service").signup(c.get("validatedBody"));
    return c.json({ data: shop }, 201);
  });

  routes.post("/login", validateBody(LoginSchema), async (c) => {
    const shop = await c.get("service").login(c.get("validatedBody"));
    const { token, expiresAt } = issueToken(shop, config);
    return c.json({ data: { token, expiresAt, shop } });
  });

  return routes;
}
