/**
 * Export routes.
 *
 * GET /api/v1/export/entries  Stream entries as NDJSON, oldest first (?from&to)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ExportQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createExportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/entries", validateQuery(ExportQuerySchema), async (c) => {
    const entries = await c
      .get("service")
      .exportEntries(c.get("auth").shopId, c.get("validatedQuery"));

    const lines = entries.map((e) => JSON.stringify(e)).join("\n");
    const body = entries.length > 0 ? lines + "\n" : "";

    return c.text(body, 200, {
      "Content-Type": "application/x-ndjson",
    });
  });

  return routes;
}
