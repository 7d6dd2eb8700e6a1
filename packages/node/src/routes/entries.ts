/**
 * Entry routes.
 *
 * GET    /api/v1/entries        List entries, newest first (?bankId&from&to&grouped)
 * POST   /api/v1/entries        Post a credit or debit
 * DELETE /api/v1/entries        Delete a month or year (?month | ?year, optional bankId)
 * GET    /api/v1/entries/:id    Get an entry
 * PATCH  /api/v1/entries/:id    Change amounts (same day only)
 * DELETE /api/v1/entries/:id    Delete (same day only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateEntrySchema,
  DeletePeriodQuerySchema,
  ListEntriesQuerySchema,
  UpdateEntrySchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { rejectStale, tagResponse } from "../middleware/etag.js";

export function createEntryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ListEntriesQuerySchema), async (c) => {
    const service = c.get("service");
    const shopId = c.get("auth").shopId;
    const { grouped, ...filter } = c.get("validatedQuery");

    if (grouped) {
      return c.json({ data: await service.listEntriesByDate(shopId, filter) });
    }
    return c.json({ data: await service.listEntries(shopId, filter) });
  });

  routes.post("/", validateBody(CreateEntrySchema), async (c) => {
    const entry = await c.get("service").createEntry(c.get("auth").shopId, c.get("validatedBody"));
    tagResponse(c, entry);
    return c.json({ data: entry }, 201);
  });

  routes.delete("/", validateQuery(DeletePeriodQuerySchema), async (c) => {
    const result = await c
      .get("service")
      .deleteEntriesInPeriod(c.get("auth").shopId, c.get("validatedQuery"));
    return c.json({ data: result });
  });

  routes.get("/:id", async (c) => {
    const entry = await c.get("service").getEntry(c.get("auth").shopId, c.req.param("id"));
    tagResponse(c, entry);
    return c.json({ data: entry });
  });

  routes.patch("/:id", validateBody(UpdateEntrySchema), async (c) => {
    const service = c.get("service");
    const shopId = c.get("auth").shopId;
    const id = c.req.param("id");

    const stale = rejectStale(c, await service.getEntry(shopId, id));
    if (stale !== undefined) {
      return stale;
    }

    const entry = await service.updateEntry(shopId, id, c.get("validatedBody"));
    tagResponse(c, entry);
    return c.json({ data: entry });
  });

  routes.delete("/:id", async (c) => {
    const service = c.get("service");
    const shopId = c.get("auth").shopId;
    const id = c.req.param("id");

    const stale = rejectStale(c, await service.getEntry(shopId, id));
    if (stale !== undefined) {
      return stale;
    }

    const entry = await service.deleteEntry(shopId, id);
    return c.json({ data: { id: entry.id, bankId: entry.bankId, date: entry.date } });
  });

  return routes;
}
