/**
 * Savings Sweep: Saves a share of the day's money into a pot.
 *
 * Each run reads what happened since the last committed sweep (account
 * transactions from Monzo, card purchases through TrueLayer and liked
 * tracks), works out the amount, publishes it with its breakdown, and
 * on request deposits it under the window's idempotency key.
 */

import { calculateSavings, SavingsSweep } from "@potkeeper/automation";
import type {
  LikedTrackFeed,
  SavingsCalculation,
  SavingsRules,
  SavingsTransaction,
  SweepWindow,
} from "@potkeeper/automation";
import type { StateSink } from "@potkeeper/balances";
import { formatMinorUnits } from "@potkeeper/ledger";
import type { TransferHistory } from "@potkeeper/ledger";
import type { BankRef, Currency, TransferRecord } from "@potkeeper/types";
import type { Logger } from "pino";
import type { FrozenSavingsSweepConfig } from "../config.js";
import type { TransferExecutor } from "./credit-card-pot.js";
import { ServiceError } from "./errors.js";

export const SAVINGS_ENTITY_ID = "sensor.potkeeper_auto_save_amount";

export interface AccountTransactionReader {
  listTransactions(accountId: string, since: Date): Promise<readonly SavingsTransaction[]>;
}

export interface CardTransactionReader {
  cardTransactions(bankRef: BankRef, cardId: string, from: Date, to: Date): Promise<readonly SavingsTransaction[]>;
}

export interface SavingsSweepWorkflowOptions {
  readonly config: FrozenSavingsSweepConfig;
  readonly currency: Currency;
  readonly history: TransferHistory;
  readonly accounts: AccountTransactionReader;
  readonly cards?: CardTransactionReader | undefined;
  readonly likedTracks?: LikedTrackFeed | undefined;
  readonly sink?: StateSink | undefined;
  readonly transfers: TransferExecutor;
  readonly logger: Logger;
  /** Clock (injectable for tests). Default: () => new Date() */
  readonly now?: (() => Date) | undefined;
}

export interface SavingsEstimate {
  readonly window: SweepWindow;
  readonly calculation: SavingsCalculation;
}

export type SavingsSweepResult =
  | { readonly outcome: "skipped"; readonly reason: string; readonly calculation: SavingsCalculation }
  | { readonly outcome: "executed"; readonly record: TransferRecord; readonly calculation: SavingsCalculation };

/** Percent (2.5) to basis points (250) */
export function basisPoints(percent: number): number {
  return Math.round(percent * 100);
}

export class SavingsSweepWorkflow {
  private readonly config: FrozenSavingsSweepConfig;
  private readonly currency: Currency;
  private readonly history: TransferHistory;
  private readonly sweep: SavingsSweep;
  private readonly rules: SavingsRules;
  private readonly accounts: AccountTransactionReader;
  private readonly cards: CardTransactionReader | undefined;
  private readonly likedTracks: LikedTrackFeed | undefined;
  private readonly sink: StateSink | undefined;
  private readonly transfers: TransferExecutor;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SavingsSweepWorkflowOptions) {
    const { config } = options;
    this.config = config;
    this.currency = options.currency;
    this.history = options.history;
    this.accounts = options.accounts;
    this.cards = options.cards;
    this.likedTracks = options.likedTracks;
    this.sink = options.sink;
    this.transfers = options.transfers;
    this.logger = options.logger.child({ workflow: "savings-sweep" });
    this.now = options.now ?? (() => new Date());

    this.sweep = new SavingsSweep({
      config: {
        potId: config.potId,
        fundingAccountRef: config.fundingAccountId,
        currency: options.currency,
        lookbackMs: config.lookbackHours * 60 * 60 * 1000,
      },
      history: options.history,
      logger: this.logger,
    });
    this.rules = {
      roundUps: config.roundUps,
      incomeShareBasisPoints: basisPoints(config.incomePercent),
      flaggedPattern: config.flaggedPattern === undefined ? undefined : new RegExp(config.flaggedPattern, "i"),
      flaggedShareBasisPoints: basisPoints(config.flaggedPercent),
      perLikedTrackMinorUnits: config.perLikedTrackMinorUnits,
      minimumMinorUnits: config.minimumMinorUnits,
    };
  }

  /**
   * Work out what the next sweep would save and publish it.
   *
   * @throws ServiceError SAVINGS_INPUT_UNAVAILABLE when transactions or
   *         liked tracks cannot be read
   */
  async calculate(): Promise<SavingsEstimate> {
    const now = this.now();
    const window = this.sweep.window(now);

    const [transactions, likedTracks] = await Promise.all([
      this.transactions(window.since, now),
      this.countLikedTracks(window.since),
    ]);
    const calculation = calculateSavings({ transactions, likedTracks }, this.rules);

    this.logger.info(
      { idempotencyKey: window.idempotencyKey, amount: calculation.totalMinorUnits, categories: calculation.categories },
      "Savings calculated",
    );
    await this.publish(window, calculation);
    return { window, calculation };
  }

  /**
   * Calculate and deposit the amount into the savings pot.
   *
   * @throws ServiceError SAVINGS_INPUT_UNAVAILABLE
   */
  async run(): Promise<SavingsSweepResult> {
    const { window, calculation } = await this.calculate();
    const intent = this.sweep.propose(window, calculation, this.now());
    if (intent === null) {
      const existing = this.history.get(window.idempotencyKey);
      const reason = existing === undefined ? "Nothing to save" : `Sweep already ${existing.status}`;
      return { outcome: "skipped", reason, calculation };
    }

    const record = await this.transfers.execute(intent);
    return { outcome: "executed", record, calculation };
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private async transactions(since: Date, now: Date): Promise<readonly SavingsTransaction[]> {
    const { cards } = this;
    if (this.config.cards.length > 0 && cards === undefined) {
      throw new ServiceError("SAVINGS_INPUT_UNAVAILABLE", "Card transactions are configured but cannot be read");
    }

    const accountId = this.config.transactionAccountId ?? this.config.fundingAccountId;
    const reads = [this.read("account transactions", () => this.accounts.listTransactions(accountId, since))];
    if (cards !== undefined) {
      for (const card of this.config.cards) {
        reads.push(
          this.read(`card ${card.bankRef}/${card.cardId}`, () =>
            cards.cardTransactions(card.bankRef, card.cardId, since, now),
          ),
        );
      }
    }

    return (await Promise.all(reads)).flat();
  }

  private async countLikedTracks(since: Date): Promise<number> {
    if (this.config.perLikedTrackMinorUnits === 0) {
      return 0;
    }
    const feed = this.likedTracks;
    if (feed === undefined) {
      this.logger.warn("No liked track feed; liked tracks are not counted");
      return 0;
    }
    return this.read("liked tracks", () => feed.likedTracksSince(since));
  }

  private async read<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ input: what, error: message }, "Savings input unavailable");
      throw new ServiceError("SAVINGS_INPUT_UNAVAILABLE", `Could not read ${what}: ${message}`);
    }
  }

  private async publish(window: SweepWindow, calculation: SavingsCalculation): Promise<void> {
    const sink = this.sink;
    if (sink === undefined) {
      return;
    }
    try {
      await sink.publish({
        entityId: SAVINGS_ENTITY_ID,
        value: formatMinorUnits(calculation.totalMinorUnits),
        attributes: {
          unit_of_measurement: this.currency,
          device_class: "monetary",
          friendly_name: "Auto save amount",
          since: window.since.toISOString(),
          ...Object.fromEntries(
            Object.entries(calculation.categories).map(([category, amount]) => [category, formatMinorUnits(amount)]),
          ),
          breakdown: JSON.stringify(calculation.breakdown),
        },
      });
    } catch (err: unknown) {
      this.logger.error(
        { entityId: SAVINGS_ENTITY_ID, error: err instanceof Error ? err.message : String(err) },
        "Failed to publish savings amount",
      );
    }
  }
}
