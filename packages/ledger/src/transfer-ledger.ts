/**
 * Transfer Ledger: Durable record of every money movement.
 *
 * Each idempotency key owns one event stream (`transfer:<key>`).
 * The current TransferRecord of every key is a projection of those
 * events, rebuilt from the store on construction.
 *
 * Rules:
 * - A key is reserved before any transfer API call is made
 * - `reserve` is a compare-and-set on the stream version: of two
 *   callers racing on one key, exactly one wins
 * - Committed is terminal
 * - Failed and abandoned keys may be reserved again; a key reserved
 *   over an abandoned record keeps its attempt count and last error,
 *   since those attempts may have moved money
 * - Abandoned keys are resolved by an operator
 */

import { randomUUID } from "node:crypto";
import type {
  EventStore,
  ChainVerification,
  ExpectedVersion,
  StoredEvent,
} from "@potkeeper/event-store";
import { EventStoreError } from "@potkeeper/event-store";
import type {
  DomainEvent,
  EventSource,
  TransferIntent,
  TransferRecord,
  TransferStatus,
} from "@potkeeper/types";
import { isTransferIntent } from "@potkeeper/types";
import type { Logger } from "pino";
import { fingerprintIntent } from "./fingerprint.js";
import {
  TRANSFER_EVENT_TYPES,
  TRANSFER_STREAM_PREFIX,
  TransferLedgerError,
  transferStreamId,
} from "./types.js";
import type {
  ResolutionOutcome,
  TransferEventType,
  TransferFilter,
  TransferHistory,
  TransferLedgerOptions,
} from "./types.js";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<TransferStatus, readonly TransferStatus[]> = {
  reserved: ["committed", "failed", "abandoned"],
  failed: ["reserved"],
  abandoned: ["reserved", "committed", "failed"],
  committed: [],
};

export function canTransition(from: TransferStatus, to: TransferStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

// =============================================================================
// Projection
// =============================================================================

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Apply one event to the current record of its key.
 * Returns a reason string when the event does not fit the record.
 */
export function applyTransferEvent(
  current: TransferRecord | undefined,
  event: DomainEvent,
): TransferRecord | string {
  const at = event.metadata.timestamp;
  const { payload } = event;

  if (event.type === TRANSFER_EVENT_TYPES.reserved) {
    const { intent, fingerprint } = payload;
    if (!isTransferIntent(intent) || typeof fingerprint !== "string") {
      return "malformed reservation payload";
    }
    if (current !== undefined && !canTransition(current.status, "reserved")) {
      return `cannot reserve a ${current.status} record`;
    }
    const carried = current?.status === "abandoned" ? current : undefined;
    return {
      idempotencyKey: intent.idempotencyKey,
      status: "reserved",
      attempts: carried?.attempts ?? 0,
      lastError: carried?.lastError ?? null,
      amountMinorUnits: intent.amountMinorUnits,
      intent,
      fingerprint,
      reservedAt: at,
      updatedAt: at,
    };
  }

  if (current === undefined) {
    return `${event.type} before reservation`;
  }

  const error = optionalString(payload.error);

  switch (event.type) {
    case TRANSFER_EVENT_TYPES.attempted:
      if (current.status !== "reserved") {
        return `attempt recorded on a ${current.status} record`;
      }
      return { ...current, attempts: current.attempts + 1, lastError: error ?? null, updatedAt: at };

    case TRANSFER_EVENT_TYPES.committed: {
      if (!canTransition(current.status, "committed")) {
        return `cannot commit a ${current.status} record`;
      }
      const transferId = optionalString(payload.transferId);
      return {
        ...current,
        status: "committed",
        attempts: current.attempts + 1,
        updatedAt: at,
        ...(transferId !== undefined ? { transferId } : {}),
      };
    }

    case TRANSFER_EVENT_TYPES.failed:
    case TRANSFER_EVENT_TYPES.abandoned: {
      const status = event.type === TRANSFER_EVENT_TYPES.failed ? "failed" : "abandoned";
      if (!canTransition(current.status, status)) {
        return `cannot mark a ${current.status} record ${status}`;
      }
      return {
        ...current,
        status,
        attempts: current.attempts + 1,
        lastError: error ?? current.lastError,
        updatedAt: at,
      };
    }

    case TRANSFER_EVENT_TYPES.resolved: {
      const { outcome } = payload;
      if (outcome !== "committed" && outcome !== "failed") {
        return "malformed resolution payload";
      }
      if (current.status !== "abandoned") {
        return `cannot resolve a ${current.status} record`;
      }
      const note = optionalString(payload.note);
      return {
        ...current,
        status: outcome,
        lastError: outcome === "failed" ? (note ?? current.lastError) : current.lastError,
        updatedAt: at,
      };
    }

    default:
      return `unknown event type ${event.type}`;
  }
}

// =============================================================================
// Transfer Ledger
// =============================================================================

export class TransferLedger implements TransferHistory {
  private readonly store: EventStore;
  private readonly logger: Logger;
  private readonly actor: string;
  private readonly now: () => Date;

  private readonly records = new Map<string, TransferRecord>();
  private readonly versions = new Map<string, number>();

  constructor(options: TransferLedgerOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.actor = options.actor ?? "potkeeper";
    this.now = options.now ?? (() => new Date());

    for (const stored of this.store.readAll()) {
      this.project(stored);
    }

    const reserved = this.list({ status: "reserved" }).length;
    if (reserved > 0) {
      this.logger.warn({ reserved }, "Ledger has transfers reserved before restart");
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Reserve an idempotency key before calling the transfer API.
   *
   * @throws TransferLedgerError DUPLICATE_INTENT when the key is held by
   *         a reserved or committed record (the record is attached)
   * @throws TransferLedgerError INTENT_MISMATCH when the key is held by
   *         a different intent that may already have moved money
   */
  reserve(intent: TransferIntent): TransferRecord {
    const key = intent.idempotencyKey;
    if (!isTransferIntent(intent)) {
      throw new TransferLedgerError(
        "INVALID_INTENT",
        `Intent for key "${key}" is not a valid transfer intent`,
      );
    }

    const fingerprint = fingerprintIntent(intent);
    const existing = this.records.get(key);
    if (existing !== undefined) {
      this.assertReservable(existing, fingerprint);
    }

    try {
      return this.appendEvent(key, TRANSFER_EVENT_TYPES.reserved, { intent, fingerprint });
    } catch (err: unknown) {
      if (err instanceof EventStoreError && err.code === "CONCURRENCY_CONFLICT") {
        const winner = this.refresh(key);
        throw new TransferLedgerError(
          "DUPLICATE_INTENT",
          `Transfer "${key}" was reserved concurrently`,
          winner,
        );
      }
      throw err;
    }
  }

  /**
   * Record a successful transfer API call.
   */
  commit(idempotencyKey: string, transferId?: string): TransferRecord {
    this.requireReserved(idempotencyKey);
    return this.appendEvent(
      idempotencyKey,
      TRANSFER_EVENT_TYPES.committed,
      transferId !== undefined ? { transferId } : {},
    );
  }

  /**
   * Record a definitive rejection. The key may be reserved again.
   */
  fail(idempotencyKey: string, error: string): TransferRecord {
    this.requireReserved(idempotencyKey);
    return this.appendEvent(idempotencyKey, TRANSFER_EVENT_TYPES.failed, { error });
  }

  /**
   * Record an attempt whose outcome is unknown. The record stays reserved.
   */
  recordAttempt(idempotencyKey: string, error: string): TransferRecord {
    this.requireReserved(idempotencyKey);
    return this.appendEvent(idempotencyKey, TRANSFER_EVENT_TYPES.attempted, { error });
  }

  /**
   * Give up after the final ambiguous attempt. An operator must
   * establish whether the money moved.
   */
  abandon(idempotencyKey: string, error: string): TransferRecord {
    this.requireReserved(idempotencyKey);
    return this.appendEvent(idempotencyKey, TRANSFER_EVENT_TYPES.abandoned, { error });
  }

  /**
   * Manual reconciliation of an abandoned record.
   */
  resolve(idempotencyKey: string, outcome: ResolutionOutcome, note: string): TransferRecord {
    const record = this.records.get(idempotencyKey);
    if (record === undefined) {
      throw new TransferLedgerError("UNKNOWN_RECORD", `No transfer recorded for "${idempotencyKey}"`);
    }
    if (record.status !== "abandoned") {
      throw new TransferLedgerError(
        "INVALID_TRANSITION",
        `Only abandoned transfers can be resolved; "${idempotencyKey}" is ${record.status}`,
      );
    }
    return this.appendEvent(
      idempotencyKey,
      TRANSFER_EVENT_TYPES.resolved,
      { outcome, note },
      "operator",
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(idempotencyKey: string): TransferRecord | undefined {
    return this.records.get(idempotencyKey);
  }

  /**
   * Records in order of first reservation.
   */
  list(filter: TransferFilter = {}): readonly TransferRecord[] {
    const { prefix, status } = filter;
    return [...this.records.values()].filter(
      (record) =>
        (prefix === undefined || record.idempotencyKey.startsWith(prefix)) &&
        (status === undefined || record.status === status),
    );
  }

  verifyIntegrity(): ChainVerification {
    return this.store.verifyIntegrity();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private assertReservable(existing: TransferRecord, fingerprint: string): void {
    const key = existing.idempotencyKey;
    if (existing.status === "failed") {
      return;
    }
    if (existing.fingerprint !== fingerprint) {
      throw new TransferLedgerError(
        "INTENT_MISMATCH",
        `Transfer "${key}" is ${existing.status} with a different intent`,
        existing,
      );
    }
    if (existing.status !== "abandoned") {
      throw new TransferLedgerError(
        "DUPLICATE_INTENT",
        `Transfer "${key}" is already ${existing.status}`,
        existing,
      );
    }
  }

  private requireReserved(idempotencyKey: string): void {
    const record = this.records.get(idempotencyKey);
    if (record === undefined || record.status !== "reserved") {
      throw new TransferLedgerError(
        "UNKNOWN_RECORD",
        `No reserved transfer for "${idempotencyKey}"`,
      );
    }
  }

  private appendEvent(
    idempotencyKey: string,
    type: TransferEventType,
    payload: Readonly<Record<string, unknown>>,
    source: EventSource = "ledger",
  ): TransferRecord {
    const expectedVersion: ExpectedVersion = this.versions.get(idempotencyKey) ?? "no_stream";
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: this.now().toISOString(),
        actor: this.actor,
        correlationId: idempotencyKey,
        source,
      },
      payload,
    };

    const result = this.store.append(transferStreamId(idempotencyKey), [event], { expectedVersion });
    for (const stored of result.events) {
      this.project(stored);
    }

    const record = this.records.get(idempotencyKey);
    if (record === undefined) {
      throw new TransferLedgerError("UNKNOWN_RECORD", `Transfer "${idempotencyKey}" vanished after append`);
    }

    this.logger.debug(
      { idempotencyKey, type, status: record.status, attempts: record.attempts },
      "Transfer event appended",
    );
    return record;
  }

  private project(stored: StoredEvent): void {
    if (!stored.streamId.startsWith(TRANSFER_STREAM_PREFIX)) {
      return;
    }

    const key = stored.streamId.slice(TRANSFER_STREAM_PREFIX.length);
    const next = applyTransferEvent(this.records.get(key), stored.event);
    this.versions.set(key, stored.version);

    if (typeof next === "string") {
      this.logger.warn(
        { idempotencyKey: key, version: stored.version, type: stored.event.type },
        `Skipping transfer event: ${next}`,
      );
      return;
    }
    this.records.set(key, next);
  }

  /** Re-read one stream after another writer got there first. */
  private refresh(idempotencyKey: string): TransferRecord | undefined {
    this.records.delete(idempotencyKey);
    this.versions.delete(idempotencyKey);
    for (const stored of this.store.read(transferStreamId(idempotencyKey))) {
      this.project(stored);
    }
    return this.records.get(idempotencyKey);
  }
}
