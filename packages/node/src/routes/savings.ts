/**
 * Savings sweep routes.
 *
 * GET  /api/v1/savings       : What the next sweep would save
 * POST /api/v1/savings/sweep : Deposit it into the savings pot
 *
 * A sweep repeated before it commits maps to the same idempotency key
 * and is skipped.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createSavingsRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const { window, calculation } = await c.get("service").calculateSavings();
    return c.json({
      data: {
        idempotencyKey: window.idempotencyKey,
        since: window.since.toISOString(),
        ...calculation,
      },
    });
  });

  routes.post("/sweep", async (c) => {
    return c.json({ data: await c.get("service").runSavingsSweep() });
  });

  return routes;
}
