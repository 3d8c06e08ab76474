/**
 * @potkeeper/ledger: Idempotent transfer ledger.
 *
 * Records every money movement under its idempotency key before the
 * transfer API is called, and tracks each key through
 * reserved → committed | failed | abandoned.
 *
 * Design rules:
 * - All types are readonly
 * - State is a projection of an append-only event log
 * - All monetary arithmetic uses integers (no floating point)
 * - Fail-closed: invalid transitions throw, never silently succeed
 */

// Core ledger
export { TransferLedger, applyTransferEvent, canTransition } from "./transfer-ledger.js";

// Fingerprints
export { fingerprintIntent } from "./fingerprint.js";

// Money arithmetic
export {
  DEFAULT_DECIMALS,
  parseAmount,
  toMinorUnits,
  formatMinorUnits,
  sumMinorUnits,
  assertMinorUnits,
} from "./money-math.js";

// Types
export {
  TRANSFER_EVENT_TYPES,
  TRANSFER_STREAM_PREFIX,
  TransferLedgerError,
  transferStreamId,
} from "./types.js";
export type {
  TransferEventType,
  TransferFilter,
  TransferHistory,
  ResolutionOutcome,
  TransferLedgerOptions,
  TransferLedgerErrorCode,
} from "./types.js";
