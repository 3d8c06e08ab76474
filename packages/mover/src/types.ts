/**
 * @potkeeper/mover: Transfer API port and error types.
 */

import type { TransferHistory } from "@potkeeper/ledger";
import type { TransferDirection, TransferIntent, TransferRecord } from "@potkeeper/types";
import type { Logger } from "pino";
import type { RetryConfig, SleepFn } from "./retry.js";

// =============================================================================
// Transfer API Port
// =============================================================================

export interface TransferRequest {
  /** Account (deposit) or pot (withdraw) the money leaves */
  readonly sourceRef: string;
  /** Pot (deposit) or account (withdraw) the money enters */
  readonly destinationRef: string;
  readonly direction: TransferDirection;
  readonly amountMinorUnits: number;
  /** Passed to the API's own deduplication; always the ledger key */
  readonly clientIdempotencyKey: string;
}

export interface TransferResult {
  /** Identifier of the executed transfer, when the API returns one */
  readonly transferId?: string | undefined;
}

/**
 * Executes transfers against a bank. Implementations throw
 * TransferApiError to classify failures.
 */
export interface TransferApi {
  transfer(request: TransferRequest): Promise<TransferResult>;
}

/**
 * How a failed transfer call is handled.
 *
 * - rejected: the API definitively refused (insufficient funds, invalid
 *   destination, other 4xx); no money moved
 * - ambiguous: timeout, network error or 5xx; money may have moved
 * - rate_limited: 429; the API did not execute the call
 */
export type TransferFailureKind = "rejected" | "ambiguous" | "rate_limited";

export class TransferApiError extends Error {
  public readonly kind: TransferFailureKind;
  public readonly status: number | undefined;

  constructor(kind: TransferFailureKind, message: string, status?: number) {
    super(message);
    this.name = "TransferApiError";
    this.kind = kind;
    this.status = status;
  }
}

// =============================================================================
// Money Mover
// =============================================================================

/**
 * The ledger operations the mover drives.
 */
export interface MoverLedger extends TransferHistory {
  reserve(intent: TransferIntent): TransferRecord;
  commit(idempotencyKey: string, transferId?: string): TransferRecord;
  fail(idempotencyKey: string, error: string): TransferRecord;
  recordAttempt(idempotencyKey: string, error: string): TransferRecord;
  abandon(idempotencyKey: string, error: string): TransferRecord;
}

export interface MoneyMoverOptions {
  readonly ledger: MoverLedger;
  readonly api: TransferApi;
  readonly logger: Logger;
  readonly retry?: Partial<RetryConfig> | undefined;
  /** Sleep function (injectable for testing) */
  readonly sleepFn?: SleepFn | undefined;
}

export type MoneyMoverErrorCode = "NOT_RESERVED";

export class MoneyMoverError extends Error {
  public readonly code: MoneyMoverErrorCode;
  constructor(code: MoneyMoverErrorCode, message: string) {
    super(message);
    this.name = "MoneyMoverError";
    this.code = code;
  }
}
