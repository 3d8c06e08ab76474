/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { PotkeeperService } from "../services/potkeeper-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The running service (set by the /api/* middleware in createApp) */
    service: PotkeeperService;
  };
}
