/**
 * @potkeeper/event-store: Shared in-memory index.
 *
 * Subclasses decide where a batch goes before it becomes visible;
 * the per-stream and global indexes live here.
 */

import type { DomainEvent } from "@potkeeper/types";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type {
  AppendOptions,
  AppendResult,
  ChainVerification,
  EventStore,
  EventStoreOptions,
  ExpectedVersion,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";

function assertExpectedVersion(streamId: string, current: number, expected: ExpectedVersion): void {
  if (expected === "any") {
    return;
  }
  if (expected === "no_stream" && current !== 0) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" already exists (version ${current}), expected no_stream`,
      streamId,
    );
  }
  if (typeof expected === "number" && current !== expected) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${current}, expected ${expected}`,
      streamId,
    );
  }
}

export abstract class IndexedEventStore implements EventStore {
  private readonly streams = new Map<string, StoredEvent[]>();
  private readonly log: StoredEvent[] = [];
  private readonly now: () => Date;

  constructor(options: EventStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Write a batch somewhere durable before it is indexed.
   * Throwing aborts the append with the store unchanged.
   */
  protected abstract persist(batch: readonly StoredEvent[]): void;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[], options: AppendOptions = {}): AppendResult {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const current = this.streamVersion(streamId);
    assertExpectedVersion(streamId, current, options.expectedVersion ?? "any");

    const appendedAt = this.now().toISOString();
    let previousHash = this.log.at(-1)?.hash ?? GENESIS_HASH;
    let position = this.globalPosition();

    const batch = events.map((event, i): StoredEvent => {
      position += 1;
      const unhashed = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: current + 1 + i,
        globalPosition: position,
        appendedAt,
      };
      const hash = computeEventHash(unhashed, previousHash);
      const stored = { ...unhashed, hash, previousHash };
      previousHash = hash;
      return stored;
    });

    this.persist(batch);
    this.index(batch);

    return { streamId, fromVersion: current + 1, toVersion: current + batch.length, events: batch };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string): readonly StoredEvent[] {
    return [...(this.streams.get(streamId) ?? [])];
  }

  readAll(): readonly StoredEvent[] {
    return [...this.log];
  }

  streamVersion(streamId: string): number {
    return this.streams.get(streamId)?.at(-1)?.version ?? 0;
  }

  globalPosition(): number {
    return this.log.at(-1)?.globalPosition ?? 0;
  }

  verifyIntegrity(): ChainVerification {
    return verifyHashChain(this.log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /** Add persisted events to the indexes; also used while loading a file. */
  protected index(batch: readonly StoredEvent[]): void {
    for (const stored of batch) {
      const stream = this.streams.get(stored.streamId) ?? [];
      stream.push(stored);
      this.streams.set(stored.streamId, stream);
      this.log.push(stored);
    }
  }
}
