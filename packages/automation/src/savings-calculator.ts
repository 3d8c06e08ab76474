/**
 * Savings Calculator: How much the next sweep moves into savings.
 *
 * Works on integer minor units. Transactions carry the sign the account
 * sees: negative amounts were spent, positive ones were received. Card
 * spends are negated by the feed that reads them.
 *
 * Categories:
 * - roundUps: each spend rounded up to the next whole unit; a spend of
 *   whole units rounds up by a full unit
 * - incomeShare: a share of money received, pot withdrawals excluded
 * - flaggedSpendShare: a share of spends whose description matches a
 *   pattern
 * - likedTracks: a fixed amount per liked track
 * - minimum: a fixed amount on every sweep
 */

import { formatMinorUnits, sumMinorUnits } from "@potkeeper/ledger";

export const SAVINGS_CATEGORIES = [
  "roundUps",
  "incomeShare",
  "flaggedSpendShare",
  "likedTracks",
  "minimum",
] as const;

export type SavingsCategory = (typeof SAVINGS_CATEGORIES)[number];

/** Descriptions of money moved out of a pot */
const POT_TRANSFER_PREFIX = "pot_";

export interface SavingsTransaction {
  readonly description: string;
  readonly amountMinorUnits: number;
}

export interface SavingsInputs {
  readonly transactions: readonly SavingsTransaction[];
  readonly likedTracks: number;
}

export interface SavingsRules {
  readonly roundUps: boolean;
  /** Share of income, in basis points (250 = 2.5%) */
  readonly incomeShareBasisPoints: number;
  readonly flaggedPattern: RegExp | undefined;
  /** Share of flagged spends, in basis points */
  readonly flaggedShareBasisPoints: number;
  readonly perLikedTrackMinorUnits: number;
  readonly minimumMinorUnits: number;
}

export interface SavingsCalculation {
  readonly totalMinorUnits: number;
  readonly categories: Readonly<Record<SavingsCategory, number>>;
  /** Contributing transactions per category, e.g. "12.34 @ CORNER SHOP" */
  readonly breakdown: Readonly<Partial<Record<SavingsCategory, readonly string[]>>>;
}

function describe(amountMinorUnits: number, description: string): string {
  return `${formatMinorUnits(amountMinorUnits)} @ ${description.replace(/\s+/g, " ").trim()}`;
}

function share(totalMinorUnits: number, basisPoints: number): number {
  return Math.floor((totalMinorUnits * basisPoints) / 10_000);
}

export function roundUp(spentMinorUnits: number): number {
  return 100 - (spentMinorUnits % 100);
}

export function calculateSavings(inputs: SavingsInputs, rules: SavingsRules): SavingsCalculation {
  const spends = inputs.transactions.filter((tx) => tx.amountMinorUnits < 0);
  const income = inputs.transactions.filter(
    (tx) => tx.amountMinorUnits > 0 && !tx.description.startsWith(POT_TRANSFER_PREFIX),
  );
  const { flaggedPattern } = rules;
  const flagged =
    flaggedPattern === undefined ? [] : spends.filter((tx) => flaggedPattern.test(tx.description));

  const categories: Record<SavingsCategory, number> = {
    roundUps: rules.roundUps ? sumMinorUnits(spends.map((tx) => roundUp(-tx.amountMinorUnits))) : 0,
    incomeShare: share(sumMinorUnits(income.map((tx) => tx.amountMinorUnits)), rules.incomeShareBasisPoints),
    flaggedSpendShare: share(
      sumMinorUnits(flagged.map((tx) => -tx.amountMinorUnits)),
      rules.flaggedShareBasisPoints,
    ),
    likedTracks: inputs.likedTracks * rules.perLikedTrackMinorUnits,
    minimum: rules.minimumMinorUnits,
  };

  const breakdown: Partial<Record<SavingsCategory, readonly string[]>> = {};
  if (categories.incomeShare > 0) {
    breakdown.incomeShare = income.map((tx) => describe(tx.amountMinorUnits, tx.description));
  }
  if (flaggedPattern === undefined) {
    if (rules.flaggedShareBasisPoints > 0) {
      breakdown.flaggedSpendShare = ["No pattern set"];
    }
  } else if (categories.flaggedSpendShare > 0) {
    breakdown.flaggedSpendShare = flagged.map((tx) => describe(-tx.amountMinorUnits, tx.description));
  }

  return {
    totalMinorUnits: sumMinorUnits(SAVINGS_CATEGORIES.map((category) => categories[category])),
    categories,
    breakdown,
  };
}
