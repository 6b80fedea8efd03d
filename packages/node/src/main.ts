/**
 * @navledger/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { SystemClock } from "@navledger/types";
import { loadConfig, toAuthConfig, toServiceConfig } from "./config.js";
import { createApp } from "./app.js";
import { NavService } from "./services/nav-service.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const auth = toAuthConfig(config);
  if (auth !== undefined) {
    logger.info(
      { apiKeyCount: auth.apiKeys.size, jwtEnabled: auth.jwtSecret !== undefined },
      "Auth configured",
    );
  } else {
    logger.warn("No API keys or JWT secret configured — callers identify with X-Caller-Address");
  }

  const service = new NavService(toServiceConfig(config, new SystemClock(), logger));
  const app = createApp({
    service,
    logger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    auth,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, vault: service.vault.address, oracle: service.vault.oracle.address },
    "NAV ledger node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      service.stop();
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
