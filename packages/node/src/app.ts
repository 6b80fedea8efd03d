/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { NavService } from "./services/nav-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createEventRoutes } from "./routes/events.js";
import { createOracleRoutes } from "./routes/oracles.js";
import { createVaultRoutes } from "./routes/vault.js";
import { createAssetRoutes } from "./routes/asset.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: NavService;
  /** Receives unhandled errors */
  readonly logger?: Logger | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", options.service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    // Secured mode: X-Api-Key or Bearer JWT
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Caller-Address header
    app.use("/api/*", callerHeaderMiddleware());
  }

  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/oracles", createOracleRoutes());
  app.route("/api/v1/vault", createVaultRoutes());
  app.route("/api/v1/asset", createAssetRoutes());

  return app;
}
