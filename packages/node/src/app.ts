/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Kept apart from main.ts so tests can build the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { PotkeeperService } from "./services/potkeeper-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { apiKeyMiddleware } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createBalanceRoutes } from "./routes/balances.js";
import { createTransferRoutes } from "./routes/transfers.js";
import { createTriggerRoutes } from "./routes/triggers.js";
import { createActionRoutes } from "./routes/actions.js";
import { createSavingsRoutes } from "./routes/savings.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: PotkeeperService;
  readonly logger: Logger;
  /** When set, /api/* requires it in X-Api-Key */
  readonly apiKey?: string | undefined;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): Hono<AppEnv> {
  const { service, logger } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger.child({ component: "http" })));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(logger));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.apiKey !== undefined) {
    app.use("/api/*", apiKeyMiddleware(options.apiKey));
  }
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/balances", createBalanceRoutes());
  app.route("/api/v1/transfers", createTransferRoutes());
  app.route("/api/v1/triggers", createTriggerRoutes());
  app.route("/api/v1/actions", createActionRoutes());
  app.route("/api/v1/savings", createSavingsRoutes());

  return app;
}
