/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAuthRoutes } from "./auth.js";
export { createShopRoutes } from "./shop.js";
export { createBankRoutes } from "./banks.js";
export { createEntryRoutes } from "./entries.js";
export { createReportRoutes } from "./reports.js";
export { createExportRoutes } from "./export.js";
