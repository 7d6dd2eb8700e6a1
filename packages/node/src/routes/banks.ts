/**
 * Bank routes.
 *
 * GET    /api/v1/banks                   List banks (by name)
 * POST   /api/v1/banks                   Create a bank
 * GET    /api/v1/banks/:id               Get a bank
 * PATCH  /api/v1/banks/:id               Rename / change opening balance (full recalculation)
 * DELETE /api/v1/banks/:id               Delete a bank and its entries
 * POST   /api/v1/banks/:id/recalculate   Replay the bank's chain (optionally ?from=)
 * GET    /api/v1/banks/:id/balance       Balance available on ?date=
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  BalanceQuerySchema,
  CreateBankSchema,
  RecalculateQuerySchema,
  UpdateBankSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { rejectStale, tagResponse } from "../middleware/etag.js";

export function createBankRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const banks = await c.get("service").listBanks(c.get("auth").shopId);
    return c.json({ data: banks });
  });

  routes.post("/", validateBody(CreateBankSchema), async (c) => {
    const bank = await c.get("service").createBank(c.get("auth").shopId, c.get("validatedBody"));
    tagResponse(c, bank);
    return c.json({ data: bank }, 201);
  });

  routes.get("/:id", async (c) => {
    const bank = await c.get("service").getBank(c.get("auth").shopId, c.req.param("id"));
    tagResponse(c, bank);
    return c.json({ data: bank });
  });

  routes.patch("/:id", validateBody(UpdateBankSchema), async (c) => {
    const service = c.get("service");
    const shopId = c.get("auth").shopId;
    const id = c.req.param("id");

    const stale = rejectStale(c, await service.getBank(shopId, id));
    if (stale !== undefined) {
      return stale;
    }

    const bank = await service.updateBank(shopId, id, c.get("validatedBody"));
    tagResponse(c, bank);
    return c.json({ data: bank });
  });

  routes.delete("/:id", async (c) => {
    const result = await c.get("service").deleteBank(c.get("auth").shopId, c.req.param("id"));
    return c.json({ data: result });
  });

  routes.post("/:id/recalculate", validateQuery(RecalculateQuerySchema), async (c) => {
    const summary = await c
      .get("service")
      .recalculateBank(c.get("auth").shopId, c.req.param("id"), c.get("validatedQuery").from);
    return c.json({ data: summary });
  });

  routes.get("/:id/balance", validateQuery(BalanceQuerySchema), async (c) => {
    const { date } = c.get("validatedQuery");
    const bankId = c.req.param("id");
    const balance = await c.get("service").balanceOn(c.get("auth").shopId, bankId, date);
    return c.json({ data: { bankId, date, balance } });
  });

  return routes;
}
