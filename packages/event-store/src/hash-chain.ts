/**
 * @potkeeper/event-store: Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[0].hash = sha256(canonicalize(event[0]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Editing a persisted transfer event breaks the chain from that point on.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { DomainEvent } from "@potkeeper/types";
import type { ChainBreak, ChainVerification, StoredEvent } from "./types.js";

export const GENESIS_HASH = "genesis";

/**
 * The hashed portion of a stored event (everything but the chain links).
 */
export interface UnhashedEvent {
  readonly event: DomainEvent;
  readonly streamId: string;
  readonly version: number;
  readonly globalPosition: number;
  readonly appendedAt: string;
}

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 */
export function computeEventHash(
  event: UnhashedEvent,
  previousHash: string,
): string {
  const content = canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify the hash chain of events in global position order.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): ChainVerification {
  const errors: ChainBreak[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const event of events) {
    if (event.previousHash !== previousHash) {
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}`,
      });
    }

    previousHash = event.hash;
    if (errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
