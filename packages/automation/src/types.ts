/**
 * @potkeeper/automation: Rule configuration and error types.
 */

import type { TransferHistory } from "@potkeeper/ledger";
import type { BalanceSnapshot, Currency } from "@potkeeper/types";
import type { Logger } from "pino";

// =============================================================================
// Pot Manager
// =============================================================================

export interface ReconcileOptions {
  /** Account the pot is topped up from and withdrawn to */
  readonly fundingAccountRef: string;

  /** Differences smaller than this are ignored. Default: 1 */
  readonly minDeltaMinorUnits?: number | undefined;

  /** Move surplus back to the funding account. Default: true */
  readonly allowWithdrawals?: boolean | undefined;

  /** Snapshots older than this are not acted upon. Default: 1 hour */
  readonly maxSnapshotAgeMs?: number | undefined;

  /** Current balance of the funding account; caps top-ups when given */
  readonly fundingBalance?: BalanceSnapshot | undefined;

  /** Amount always left in the funding account. Default: 0 */
  readonly minFundingRemainderMinorUnits?: number | undefined;
}

export interface PotManagerOptions {
  readonly history: TransferHistory;
  readonly logger: Logger;
  /** Time zone of the day stamp in idempotency keys. Default: "UTC" */
  readonly timeZone?: string | undefined;
  /** Clock (injectable for tests). Default: () => new Date() */
  readonly now?: (() => Date) | undefined;
}

export type PotManagerErrorCode = "CURRENCY_MISMATCH";

export class PotManagerError extends Error {
  public readonly code: PotManagerErrorCode;
  constructor(code: PotManagerErrorCode, message: string) {
    super(message);
    this.name = "PotManagerError";
    this.code = code;
  }
}

// =============================================================================
// Auto Saver
// =============================================================================

/**
 * A webhook event from the trigger source (e.g. a liked track).
 * Delivered at least once.
 */
export interface TriggerEvent {
  readonly eventId: string;
  readonly payload: Readonly<Record<string, unknown>>;
  /** ISO 8601 time of the triggering action */
  readonly timestamp: string;
}

/** Local hours [startHour, endHour); wraps past midnight when start > end. */
export interface ActiveHours {
  readonly startHour: number;
  readonly endHour: number;
}

export interface AutoSaverConfig {
  readonly potId: string;
  readonly fundingAccountRef: string;
  /** Default: 79 */
  readonly amountPerTriggerMinorUnits?: number | undefined;
  /** Default: "GBP" */
  readonly currency?: Currency | undefined;
  /** Window in which repeated triggers collapse. Default: 60 seconds */
  readonly debounceMs?: number | undefined;
  readonly activeHours?: ActiveHours | undefined;
  /** IANA time zone of activeHours. Default: "UTC" */
  readonly timeZone?: string | undefined;
}

export interface AutoSaverOptions {
  readonly config: AutoSaverConfig;
  readonly history: TransferHistory;
  readonly logger: Logger;
}

export type AutoSaverErrorCode = "INVALID_TRIGGER";

export class AutoSaverError extends Error {
  public readonly code: AutoSaverErrorCode;
  constructor(code: AutoSaverErrorCode, message: string) {
    super(message);
    this.name = "AutoSaverError";
    this.code = code;
  }
}

// =============================================================================
// Savings Sweep
// =============================================================================

export interface LikedTrackFeed {
  likedTracksSince(since: Date): Promise<number>;
}
