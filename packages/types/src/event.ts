/**
 * Event Types
 *
 * Every transfer ledger change is recorded as a DomainEvent; replaying
 * a key's events in order rebuilds its TransferRecord.
 */

export const EVENT_SOURCES = ["ledger", "mover", "automation", "operator"] as const;

/** Subsystem that wrote the event; "operator" for manual resolutions */
export type EventSource = (typeof EVENT_SOURCES)[number];

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID for grouping related events (the idempotency key for transfers) */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "transfer.reserved") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
