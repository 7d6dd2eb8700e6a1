/**
 * @daybook/node: Entry point.
 *
 * Bootstraps the Hono app, loads config, opens the store, starts the HTTP
 * server, and handles graceful shutdown.
 */

import { randomBytes } from "node:crypto";
import { serve } from "@hono/node-server";
import pino from "pino";
import { InMemoryLedgerStore, MongoLedgerStore } from "@daybook/store";
import type { LedgerStore } from "@daybook/store";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let store: LedgerStore;
  if (config.MONGODB_URI !== undefined) {
    const mongo = await MongoLedgerStore.connect(config.MONGODB_URI, config.MONGODB_DB);
    await mongo.ensureIndexes();
    store = mongo;
    logger.info({ db: config.MONGODB_DB }, "Connected to MongoDB");
  } else {
    store = new InMemoryLedgerStore();
    logger.warn("MONGODB_URI not set; using the in-memory store (data is lost on exit)");
  }

  let jwtSecret = config.JWT_SECRET;
  if (jwtSecret === undefined) {
    jwtSecret = randomBytes(32).toString("hex");
    logger.warn("JWT_SECRET not set; generated a throwaway secret for this process");
  }

  const { app } = createApp({
    store,
    auth: {
      jwtSecret,
      jwtIssuer: config.JWT_ISSUER,
      tokenTtlSeconds: config.TOKEN_TTL_SECONDS,
    },
    logger,
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST },
    "Daybook node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    try {
      await store.close();
    } catch (err: unknown) {
      logger.error({ err }, "Store did not close cleanly");
      process.exit(1);
    }
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
