/**
 * Error envelopes returned by the HTTP API:
 * `{ error: { code, message, details? } }`.
 */

import type { PotManagerErrorCode, AutoSaverErrorCode } from "@potkeeper/automation";
import type { BalanceAggregatorErrorCode } from "@potkeeper/balances";
import type { EventStoreErrorCode } from "@potkeeper/event-store";
import type { TransferLedgerErrorCode } from "@potkeeper/ledger";
import type { MoneyMoverErrorCode } from "@potkeeper/mover";
import type { ServiceErrorCode } from "../services/errors.js";

/** Raised by the HTTP layer itself */
export type HttpErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "UNAUTHORIZED" | "INTERNAL_ERROR";

/** Domain errors that can surface through a route */
export type DomainErrorCode =
  | TransferLedgerErrorCode
  | EventStoreErrorCode
  | MoneyMoverErrorCode
  | BalanceAggregatorErrorCode
  | PotManagerErrorCode
  | AutoSaverErrorCode
  | ServiceErrorCode;

export type ErrorCode = HttpErrorCode | DomainErrorCode;

export interface ErrorEnvelope {
  readonly error: {
    readonly code: ErrorCode;
    readonly message: string;
    readonly details?: Readonly<Record<string, unknown>>;
  };
}

export function errorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}
