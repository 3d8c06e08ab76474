/**
 * Notification action routes.
 *
 * GET  /api/v1/actions/pending: Proposals waiting for confirmation
 * POST /api/v1/actions        : Handle an action tapped on the phone
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ActionSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createActionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/pending", (c) => {
    const workflow = c.get("service").creditCardPot;
    return c.json({ data: workflow === undefined ? [] : workflow.pending() });
  });

  routes.post("/", validateBody(ActionSchema), async (c) => {
    const record = await c.get("service").handleAction(c.get("validatedBody").action);
    return c.json({ data: record });
  });

  return routes;
}
