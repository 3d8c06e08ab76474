/**
 * Request bodies and queries, as zod schemas with their inferred types.
 */

import { z } from "zod";
import { TRANSFER_STATUSES } from "@potkeeper/types";

// =============================================================================
// Transfer DTOs
// =============================================================================

export const ListTransfersQuerySchema = z.object({
  status: z.enum(TRANSFER_STATUSES).optional(),
  prefix: z.string().min(1).optional(),
});

export type ListTransfersQuery = z.infer<typeof ListTransfersQuerySchema>;

export const ResolveTransferSchema = z.object({
  outcome: z.enum(["committed", "failed"]),
  note: z.string().min(1).max(1024),
});

export type ResolveTransferDto = z.infer<typeof ResolveTransferSchema>;

// =============================================================================
// Trigger DTOs
// =============================================================================

/**
 * A track trigger webhook. Unknown payload fields are kept; the
 * auto-saver decides what it needs.
 */
export const TrackTriggerSchema = z.object({
  eventId: z.string().min(1).max(256),
  timestamp: z.string().min(1),
  payload: z.record(z.unknown()),
});

export type TrackTriggerDto = z.infer<typeof TrackTriggerSchema>;

// =============================================================================
// Action DTOs
// =============================================================================

export const ActionSchema = z.object({
  action: z.string().min(1).max(512),
});

export type ActionDto = z.infer<typeof ActionSchema>;
