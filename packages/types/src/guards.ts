/**
 * Runtime Type Guards
 *
 * Narrowing functions for potkeeper domain types.
 * Used at system boundaries (deserialized ledger files, webhook bodies).
 */

import { BANK_REFS } from "./bank.js";
import type { BankRef, BalanceSnapshot } from "./bank.js";
import { TRANSFER_STATUSES } from "./transfer.js";
import type { TransferIntent, TransferStatus } from "./transfer.js";
import { EVENT_SOURCES } from "./event.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Bank guards
// =============================================================================

const BANK_REF_SET = new Set<string>(BANK_REFS);

export function isBankRef(value: unknown): value is BankRef {
  return typeof value === "string" && BANK_REF_SET.has(value);
}

/**
 * Parse a configured bank name ("starling joint", "Amex") into a BankRef.
 * Returns undefined for unknown institutions.
 */
export function parseBankRef(value: string): BankRef | undefined {
  const normalized = value.trim().toUpperCase().replace(/\s+/g, "_");
  return isBankRef(normalized) ? normalized : undefined;
}

export function isMinorUnits(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

export function isBalanceSnapshot(value: unknown): value is BalanceSnapshot {
  if (!isRecord(value)) return false;
  return (
    isBankRef(value.bankRef) &&
    typeof value.accountGroup === "string" &&
    isMinorUnits(value.amountMinorUnits) &&
    typeof value.currency === "string" &&
    typeof value.observedAt === "string" &&
    typeof value.stale === "boolean"
  );
}

// =============================================================================
// Transfer guards
// =============================================================================

const TRANSFER_STATUS_SET = new Set<string>(TRANSFER_STATUSES);

export function isTransferStatus(value: unknown): value is TransferStatus {
  return typeof value === "string" && TRANSFER_STATUS_SET.has(value);
}

export function isTransferIntent(value: unknown): value is TransferIntent {
  if (!isRecord(value)) return false;
  return (
    typeof value.idempotencyKey === "string" &&
    value.idempotencyKey.length > 0 &&
    typeof value.sourceAccountRef === "string" &&
    typeof value.destinationPotOrAccountRef === "string" &&
    (value.direction === "deposit" || value.direction === "withdraw") &&
    isMinorUnits(value.amountMinorUnits) &&
    value.amountMinorUnits > 0 &&
    typeof value.currency === "string" &&
    typeof value.reason === "string" &&
    typeof value.createdAt === "string"
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCE_SET = new Set<string>(EVENT_SOURCES);

function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCE_SET.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
