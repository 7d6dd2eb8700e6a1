/**
 * Report routes.
 *
 * GET /api/v1/reports/daily     ?date (default today)
 * GET /api/v1/reports/weekly    Monday of this week through today
 * GET /api/v1/reports/monthly   ?month=YYYY-MM (default this month)
 * GET /api/v1/reports/yearly    ?year=YYYY (default this year)
 * GET /api/v1/reports/custom    ?start&end
 */

import { Hono } from "hono";
import { customRange, dayRange, monthRange, weekToDate, yearRange } from "@daybook/ledger";
import type { AppEnv } from "../types/api-contract.js";
import {
  CustomReportQuerySchema,
  DailyReportQuerySchema,
  MonthlyReportQuerySchema,
  YearlyReportQuerySchema,
} from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/daily", validateQuery(DailyReportQuerySchema), async (c) => {
    const service = c.get("service");
    const range = dayRange(c.get("validatedQuery").date ?? service.today());
    return c.json({ data: await service.report(c.get("auth").shopId, "daily", range) });
  });

  routes.get("/weekly", async (c) => {
    const service = c.get("service");
    const range = weekToDate(service.today());
    return c.json({ data: await service.report(c.get("auth").shopId, "weekly", range) });
  });

  routes.get("/monthly", validateQuery(MonthlyReportQuerySchema), async (c) => {
    const service = c.get("service");
    const month = c.get("validatedQuery").month ?? service.today().slice(0, 7);
    return c.json({
      data: await service.report(c.get("auth").shopId, "monthly", monthRange(month)),
    });
  });

  routes.get("/yearly", validateQuery(YearlyReportQuerySchema), async (c) => {
    const service = c.get("service");
    const year = c.get("validatedQuery").year ?? service.today().slice(0, 4);
    return c.json({
      data: await service.report(c.get("auth").shopId, "yearly", yearRange(year)),
    });
  });

  routes.get("/custom", validateQuery(CustomReportQuerySchema), async (c) => {
    const { start, end } = c.get("validatedQuery");
    return c.json({
      data: await c.get("service").report(c.get("auth").shopId, "custom", customRange(start, end)),
    });
  });

  return routes;
}
