/**
 * @potkeeper/balances: Ports and error types.
 */

import type { AccountGroup, AccountMember, BankRef, Currency } from "@potkeeper/types";
import type { Logger } from "pino";

// =============================================================================
// Account Source Port
// =============================================================================

/**
 * One member's balance as reported by the aggregation API.
 */
export interface MemberBalance {
  readonly amountMinorUnits: number;
  readonly currency: Currency;
  /** ISO 8601 time the provider observed this balance */
  readonly asOf: string;
}

export interface AccountSource {
  fetchBalance(bankRef: BankRef, member: AccountMember): Promise<MemberBalance>;
}

/**
 * - unauthorized: the bank's access token was rejected
 * - rate_limited: the provider refused with 429
 * - unavailable: timeout, network error or 5xx
 */
export type AccountSourceFailureKind = "unauthorized" | "rate_limited" | "unavailable";

export class AccountSourceError extends Error {
  public readonly kind: AccountSourceFailureKind;

  constructor(kind: AccountSourceFailureKind, message: string) {
    super(message);
    this.name = "AccountSourceError";
    this.kind = kind;
  }
}

// =============================================================================
// State Sink Port
// =============================================================================

export interface PublishedState {
  readonly entityId: string;
  readonly value: string;
  readonly attributes: Readonly<Record<string, unknown>>;
}

export interface StateSink {
  publish(state: PublishedState): Promise<void>;
}

// =============================================================================
// Aggregator
// =============================================================================

export const DEFAULT_ENTITY_PREFIX = "potkeeper_balance";

export interface BalanceAggregatorOptions {
  readonly groups: readonly AccountGroup[];
  readonly source: AccountSource;
  readonly logger: Logger;
  readonly sink?: StateSink | undefined;
  /** Default: "potkeeper_balance" */
  readonly entityPrefix?: string | undefined;
  /** Called once per poll in which the bank's credentials were rejected */
  readonly onAuthFailure?: ((bankRef: BankRef) => void) | undefined;
}

export type BalanceAggregatorErrorCode = "EMPTY_GROUP" | "DUPLICATE_GROUP" | "UNKNOWN_BANK";

export class BalanceAggregatorError extends Error {
  public readonly code: BalanceAggregatorErrorCode;

  constructor(code: BalanceAggregatorErrorCode, message: string) {
    super(message);
    this.name = "BalanceAggregatorError";
    this.code = code;
  }
}
