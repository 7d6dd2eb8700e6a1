/**
 * GET /api/v1/me  The authenticated shop's profile.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createShopRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/me", async (c) => {
    const profile = await c.get("service").getProfile(c.get("auth").shopId);
    return c.json({ data: profile });
  });

  return routes;
}
