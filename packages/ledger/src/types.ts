/**
 * @potkeeper/ledger: Internal types for the transfer ledger.
 *
 * Rules:
 * - All types are readonly
 * - Records change only through ledger events
 * - Fail-closed: invalid transitions throw, never silently succeed
 */

import type { EventStore } from "@potkeeper/event-store";
import type { TransferRecord, TransferStatus } from "@potkeeper/types";
import type { Logger } from "pino";

// ─── Events ──────────────────────────────────────────────────────────────

export const TRANSFER_EVENT_TYPES = {
  reserved: "transfer.reserved",
  attempted: "transfer.attempted",
  committed: "transfer.committed",
  failed: "transfer.failed",
  abandoned: "transfer.abandoned",
  resolved: "transfer.resolved",
} as const;

export type TransferEventType =
  (typeof TRANSFER_EVENT_TYPES)[keyof typeof TRANSFER_EVENT_TYPES];

/** Stream holding every event of one idempotency key. */
export const TRANSFER_STREAM_PREFIX = "transfer:";

export function transferStreamId(idempotencyKey: string): string {
  return `${TRANSFER_STREAM_PREFIX}${idempotencyKey}`;
}

// ─── Read Side ───────────────────────────────────────────────────────────

export interface TransferFilter {
  /** Only keys starting with this prefix (e.g. "pot:MONZO:pot_1:") */
  readonly prefix?: string | undefined;
  readonly status?: TransferStatus | undefined;
}

/**
 * Read-only view of the ledger, used by the automation rules
 * and the HTTP surface.
 */
export interface TransferHistory {
  get(idempotencyKey: string): TransferRecord | undefined;
  list(filter?: TransferFilter): readonly TransferRecord[];
}

/** Outcome an operator assigns to an abandoned transfer. */
export type ResolutionOutcome = "committed" | "failed";

// ─── Options ─────────────────────────────────────────────────────────────

export interface TransferLedgerOptions {
  readonly store: EventStore;
  readonly logger: Logger;

  /** Recorded as the actor of ledger events. Default: "potkeeper" */
  readonly actor?: string | undefined;

  /** Clock (injectable for tests). Default: () => new Date() */
  readonly now?: (() => Date) | undefined;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type TransferLedgerErrorCode =
  | "DUPLICATE_INTENT"
  | "INTENT_MISMATCH"
  | "UNKNOWN_RECORD"
  | "INVALID_TRANSITION"
  | "INVALID_INTENT"
  | "INVALID_AMOUNT";

export class TransferLedgerError extends Error {
  public readonly code: TransferLedgerErrorCode;

  /** The existing record, for DUPLICATE_INTENT and INTENT_MISMATCH */
  public readonly record: TransferRecord | undefined;

  constructor(code: TransferLedgerErrorCode, message: string, record?: TransferRecord) {
    super(message);
    this.name = "TransferLedgerError";
    this.code = code;
    this.record = record;
  }
}
