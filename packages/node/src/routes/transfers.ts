/**
 * Transfer ledger routes.
 *
 * GET  /api/v1/transfers              : List records (?status=, ?prefix=)
 * GET  /api/v1/transfers/:key         : Get one record
 * POST /api/v1/transfers/:key/resolve : Resolve an abandoned transfer
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListTransfersQuerySchema, ResolveTransferSchema } from "../types/dto.js";
import { errorEnvelope } from "../types/error.js";
import { validateBody, validationFailed } from "../middleware/validate.js";

export function createTransferRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListTransfersQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return validationFailed(c, "Invalid query parameters", queryResult.error);
    }

    const records = c.get("service").transfers(queryResult.data);
    return c.json({ data: records });
  });

  routes.get("/:key", (c) => {
    const key = c.req.param("key");
    const record = c.get("service").transfer(key);
    if (record === undefined) {
      return c.json(errorEnvelope("NOT_FOUND", `Transfer "${key}" not found`), 404);
    }
    return c.json({ data: record });
  });

  routes.post("/:key/resolve", validateBody(ResolveTransferSchema), (c) => {
    const body = c.get("validatedBody");
    const record = c.get("service").resolve(c.req.param("key"), body.outcome, body.note);
    return c.json({ data: record });
  });

  return routes;
}
