import http from "node:http";
import { createApp } from "./app";
import { loadCommerceConfig } from "./config/commerce";
import { env } from "./config/env";
import { closeDatabase, DatabaseUnavailableError, getDb, pingDatabase } from "./db";
import logger from "./logger";
import { createCommerceEngine } from "./services/commerce";
import { createPostgresCommerceStore } from "./services/commerce/store/postgresStore";
import type { CommerceStore } from "./services/commerce/store/types";

function openStore(): CommerceStore {
  try {
    return createPostgresCommerceStore(getDb());
  } catch (error) {
    if (error instanceof DatabaseUnavailableError) {
      logger.fatal("[Server] Database unavailable, refusing to start", { error });
      process.exit(1);
    }
    throw error;
  }
}

const config = loadCommerceConfig(env);
const engine = createCommerceEngine({ store: openStore(), config });
const scheduler = engine.createScheduler();

const app = createApp({
  engine,
  scheduler,
  probeStore: pingDatabase,
  nodeEnv: env.NODE_ENV,
  allowedOrigins: env.ALLOWED_ORIGINS,
  cronSecret: env.CRON_SECRET,
  webhookSecret: env.PAYMENT_WEBHOOK_SECRET,
});

const server = http.createServer(app);
const port = Number.parseInt(env.PORT, 10);

server.listen(port, "0.0.0.0", () => {
  logger.info(`Commerce server running on port ${port}`, {
    currency: config.currency,
    homeCountry: config.homeCountry,
  });
  if (config.sweepIntervalMs > 0) {
    scheduler.start();
  }
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`[Server] ${signal} received, shutting down`);
  scheduler.stop();
  server.close(() => {
    logger.info("[Server] HTTP server closed");
    void closeDatabase()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("[Server] Failed to close database pool", { error });
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
