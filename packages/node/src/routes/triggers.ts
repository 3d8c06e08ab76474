/**
 * Trigger webhook routes.
 *
 * POST /api/v1/triggers/track: A liked track; may save a small amount
 *
 * Deliveries are at least once. A redelivered trigger maps to the same
 * idempotency key and returns the existing record.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { TrackTriggerSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createTriggerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/track", validateBody(TrackTriggerSchema), async (c) => {
    const record = await c.get("service").handleTrigger(c.get("validatedBody"));
    return c.json({ data: record });
  });

  return routes;
}
