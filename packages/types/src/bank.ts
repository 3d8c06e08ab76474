/**
 * Bank Types
 *
 * Institutions, account groupings and balance observations.
 *
 * Rules:
 * - All amounts are integer minor units (pence, cents)
 * - Account groups are fixed at startup and never mutated
 * - A snapshot replaces the previous one; no history is kept
 */

/**
 * Financial institutions reachable through the aggregation API.
 * Used as the partition key for credentials and account groupings.
 */
export const BANK_REFS = [
  "AMEX",
  "HSBC",
  "MONZO",
  "SANTANDER",
  "STARLING",
  "STARLING_JOINT",
] as const;

export type BankRef = (typeof BANK_REFS)[number];

/**
 * ISO 4217 currency code (e.g. "GBP").
 */
export type Currency = string;

/**
 * The kind of external entity an identifier points at.
 * Accounts and cards are served by different aggregation endpoints.
 */
export type AccountMemberKind = "account" | "card";

/**
 * One external account or card identifier inside a group.
 */
export interface AccountMember {
  readonly kind: AccountMemberKind;
  readonly id: string;
}

/**
 * A named bucket of accounts/cards under one bank
 * (e.g. "current_account", "savings", "credit_cards").
 */
export interface AccountGroup {
  readonly bankRef: BankRef;
  readonly name: string;
  readonly members: readonly AccountMember[];
}

/**
 * The combined balance of one account group at a point in time.
 */
export interface BalanceSnapshot {
  readonly bankRef: BankRef;

  /** Name of the account group this snapshot belongs to */
  readonly accountGroup: string;

  /** Sum of member balances in minor units */
  readonly amountMinorUnits: number;

  readonly currency: Currency;

  /** ISO 8601 timestamp of the oldest member observation in the sum */
  readonly observedAt: string;

  /**
   * True when the latest poll could not refresh this group and the
   * previous value was retained.
   */
  readonly stale: boolean;
}
