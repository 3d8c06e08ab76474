/**
 * @potkeeper/event-store: Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests
 * - JsonlEventStore for durable file-based persistence
 * - Hash-chain integrity verification
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  EventStore,
  EventStoreOptions,
  EventStoreErrorCode,
  ChainBreak,
  ChainVerification,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { IndexedEventStore } from "./base-store.js";
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";
