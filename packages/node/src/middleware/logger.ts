/**
 * Structured logging middleware.
 *
 * Logs one line per request through pino, with the request id bound.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const status = c.res.status;
    const entry = {
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Date.now() - start,
    };

    if (status >= 500) {
      logger.error(entry, "Request failed");
    } else {
      logger.info(entry, "Request completed");
    }
  };
}
