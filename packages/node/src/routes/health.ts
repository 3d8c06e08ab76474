/**
 * Health check routes.
 *
 * GET /health: Liveness probe (always 200 if server is running)
 * GET /ready : Readiness probe (transfer ledger hash chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { PotkeeperService } from "../services/potkeeper-service.js";

export function createHealthRoutes(service: PotkeeperService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyIntegrity();
    const ledger = integrity.valid
      ? { status: "ok", events: integrity.lastVerifiedPosition }
      : { status: "down", events: integrity.lastVerifiedPosition, errors: integrity.errors.length };

    return c.json(
      {
        status: integrity.valid ? "ready" : "not_ready",
        ledger,
        timestamp: new Date().toISOString(),
      },
      integrity.valid ? 200 : 503,
    );
  });

  return routes;
}
