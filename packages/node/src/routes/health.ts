/**
 * Health check routes.
 *
 * GET /health  Liveness probe (always 200 if server is running)
 * GET /ready   Readiness probe (store round trip)
 */

import { Hono } from "hono";
import type { LedgerStore } from "@daybook/store";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(
  store: LedgerStore,
  clock: () => Date = () => new Date(),
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: clock().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    try {
      await store.ping();
    } catch (err: unknown) {
      return c.json(
        {
          status: "not_ready",
          subsystems: {
            store: {
              status: "down",
              detail: err instanceof Error ? err.message : String(err),
            },
          },
          timestamp: clock().toISOString(),
        },
        503,
      );
    }

    return c.json({
      status: "ready",
      subsystems: { store: { status: "ok" } },
      timestamp: clock().toISOString(),
    });
  });

  return routes;
}
