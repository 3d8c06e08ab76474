/**
 * Transfer Types
 *
 * Pots, transfer intents and the ledger's record of each attempt.
 *
 * Rules:
 * - An intent is identified solely by its idempotency key
 * - Keys are derived deterministically from the triggering event
 * - A committed record is terminal
 */

import type { BankRef, Currency } from "./bank.js";

/**
 * A ring-fenced sub-balance inside a bank account.
 */
export interface Pot {
  readonly potId: string;

  /** Bank holding the pot */
  readonly bankRef: BankRef;

  /** Free-form purpose ("credit-card buffer", "auto-save") */
  readonly purpose: string;

  /**
   * Fixed target balance in minor units.
   * `null` means no automatic target: discretionary contributions only.
   */
  readonly targetBalanceMinorUnits: number | null;
}

/**
 * Whether money moves into a pot or back out of it.
 */
export type TransferDirection = "deposit" | "withdraw";

/**
 * A unit of work handed to the money mover.
 */
export interface TransferIntent {
  readonly idempotencyKey: string;

  /** Account (deposit) or pot (withdraw) the money leaves */
  readonly sourceAccountRef: string;

  /** Pot (deposit) or account (withdraw) the money enters */
  readonly destinationPotOrAccountRef: string;

  readonly direction: TransferDirection;

  /** Always positive, in minor units */
  readonly amountMinorUnits: number;

  readonly currency: Currency;

  /** Human-readable reason (appears in logs and notifications) */
  readonly reason: string;

  /** ISO 8601 timestamp */
  readonly createdAt: string;
}

/**
 * Lifecycle of a transfer record.
 *
 * reserved  → committed | failed | abandoned
 * failed    → reserved (re-reservation)
 * abandoned → reserved (re-reservation) | committed | failed (manual resolution)
 * committed → (terminal)
 */
export const TRANSFER_STATUSES = ["reserved", "committed", "failed", "abandoned"] as const;

export type TransferStatus = (typeof TRANSFER_STATUSES)[number];

/**
 * The ledger's view of one idempotency key.
 */
export interface TransferRecord {
  readonly idempotencyKey: string;
  readonly status: TransferStatus;

  /** Number of calls made to the transfer API under this key */
  readonly attempts: number;

  readonly lastError: string | null;
  readonly amountMinorUnits: number;

  /** The intent as last reserved */
  readonly intent: TransferIntent;

  /** SHA-256 of the canonical money-relevant intent fields */
  readonly fingerprint: string;

  readonly reservedAt: string;
  readonly updatedAt: string;

  /** Identifier returned by the transfer API once committed */
  readonly transferId?: string | undefined;
}
