/**
 * @potkeeper/event-store: Core types.
 *
 * The transfer ledger keeps one stream per idempotency key. Streams
 * only grow; versions within a stream and positions across the store
 * both start at 1 and have no gaps. Every stored event is chained to
 * its predecessor by SHA-256 so that edits to the ledger file show up
 * on verification.
 */

import type { DomainEvent } from "@potkeeper/types";

// =============================================================================
// Stored Event
// =============================================================================

export interface StoredEvent {
  readonly event: DomainEvent;
  readonly streamId: string;

  /** Position within the stream */
  readonly version: number;

  /** Position across all streams */
  readonly globalPosition: number;

  /** Store clock at append time; the domain timestamp lives in the metadata */
  readonly appendedAt: string;

  readonly hash: string;

  /** Hash of the preceding event in global order, or "genesis" */
  readonly previousHash: string;
}

// =============================================================================
// Append
// =============================================================================

/**
 * Stream head required for an append to go through:
 * an exact version, "no_stream" for the first write, or "any".
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion | undefined;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly events: readonly StoredEvent[];
}

export interface EventStoreOptions {
  /** Clock for `appendedAt` */
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Verification
// =============================================================================

export interface ChainBreak {
  readonly position: number;
  readonly reason: string;
}

export interface ChainVerification {
  readonly valid: boolean;
  /** Last position before the first break (all of them when valid) */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly ChainBreak[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * An append persists all of its events or none of them, and a failed
 * version check leaves the store as it was.
 */
export interface EventStore {
  /**
   * @throws EventStoreError CONCURRENCY_CONFLICT when the stream head
   *         does not match `expectedVersion`
   */
  append(streamId: string, events: readonly DomainEvent[], options?: AppendOptions): AppendResult;

  /** One stream in version order; empty for an unknown stream. */
  read(streamId: string): readonly StoredEvent[];

  /** Every event in global order. */
  readAll(): readonly StoredEvent[];

  /** 0 for an unknown stream */
  streamVersion(streamId: string): number;

  /** 0 for an empty store */
  globalPosition(): number;

  verifyIntegrity(): ChainVerification;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "CONCURRENCY_CONFLICT" | "INVALID_STREAM_ID" | "EMPTY_APPEND";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
