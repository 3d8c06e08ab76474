/**
 * API key middleware.
 *
 * When an API key is configured, every /api/* request must carry it in
 * X-Api-Key. Health routes stay open.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { errorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

export function apiKeyMiddleware(apiKey: string): MiddlewareHandler<AppEnv> {
  const expected = digest(apiKey);

  return async (c, next) => {
    const presented = c.req.header(API_KEY_HEADER);
    if (presented === undefined) {
      return c.json(errorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }
    if (!timingSafeEqual(digest(presented), expected)) {
      return c.json(errorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }
    return next();
  };
}
