/**
 * Balance routes.
 *
 * GET  /api/v1/balances                : Latest snapshot of every group
 * GET  /api/v1/balances/:bankRef       : Latest snapshots of one bank
 * POST /api/v1/balances/:bankRef/poll  : Poll one bank now
 */

import { Hono } from "hono";
import { parseBankRef } from "@potkeeper/types";
import type { AppEnv } from "../types/api-contract.js";
import { errorEnvelope } from "../types/error.js";

export function createBalanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").aggregator.all() });
  });

  routes.get("/:bankRef", (c) => {
    const bankRef = parseBankRef(c.req.param("bankRef"));
    if (bankRef === undefined) {
      return c.json(errorEnvelope("UNKNOWN_BANK", `Unknown bank "${c.req.param("bankRef")}"`), 404);
    }
    const snapshots = c.get("service").aggregator.all().filter((s) => s.bankRef === bankRef);
    return c.json({ data: snapshots });
  });

  routes.post("/:bankRef/poll", async (c) => {
    const bankRef = parseBankRef(c.req.param("bankRef"));
    if (bankRef === undefined) {
      return c.json(errorEnvelope("UNKNOWN_BANK", `Unknown bank "${c.req.param("bankRef")}"`), 404);
    }
    const snapshots = await c.get("service").aggregator.poll(bankRef);
    return c.json({ data: [...snapshots.values()] });
  });

  return routes;
}
