/**
 * PotkeeperService: Wires the packages into one running system.
 *
 * event store → transfer ledger → money mover
 * account source → balance aggregator → state sink
 * pot manager → credit card pot workflow
 * auto-saver ← track triggers
 * transactions + liked tracks → savings sweep → state sink
 *
 * All money moves through `execute`, which records the outcome in the
 * ledger and alerts on transfers that did not commit.
 */

import { AutoSaver, PotManager } from "@potkeeper/automation";
import type { LikedTrackFeed, TriggerEvent } from "@potkeeper/automation";
import { BalanceAggregator } from "@potkeeper/balances";
import type { AccountSource, StateSink } from "@potkeeper/balances";
import type { Notifier } from "@potkeeper/clients";
import type { EventStore, ChainVerification } from "@potkeeper/event-store";
import { TransferLedger } from "@potkeeper/ledger";
import type { ResolutionOutcome, TransferFilter } from "@potkeeper/ledger";
import { MoneyMover } from "@potkeeper/mover";
import type { RetryConfig, SleepFn, TransferApi } from "@potkeeper/mover";
import type { TransferIntent, TransferRecord } from "@potkeeper/types";
import type { Logger } from "pino";
import { accountGroups } from "../config.js";
import type { FrozenAppsConfig } from "../config.js";
import { CreditCardPotWorkflow, TOP_UP_ACTION } from "./credit-card-pot.js";
import type { CreditCardRunResult, PotBalanceReader } from "./credit-card-pot.js";
import { ServiceError } from "./errors.js";
import { NotificationService } from "./notifications.js";
import { SavingsSweepWorkflow } from "./savings-sweep.js";
import type {
  AccountTransactionReader,
  CardTransactionReader,
  SavingsEstimate,
  SavingsSweepResult,
} from "./savings-sweep.js";

export interface PotkeeperServiceOptions {
  readonly apps: FrozenAppsConfig;
  readonly store: EventStore;
  readonly accountSource: AccountSource;
  readonly transferApi: TransferApi;
  readonly pots: PotBalanceReader;
  readonly accountTransactions?: AccountTransactionReader | undefined;
  readonly cardTransactions?: CardTransactionReader | undefined;
  readonly likedTracks?: LikedTrackFeed | undefined;
  readonly stateSink?: StateSink | undefined;
  readonly notifier?: Notifier | undefined;
  readonly logger: Logger;
  /** Clock (injectable for tests). Default: () => new Date() */
  readonly now?: (() => Date) | undefined;
  readonly retry?: Partial<RetryConfig> | undefined;
  readonly sleepFn?: SleepFn | undefined;
}

export class PotkeeperService {
  readonly ledger: TransferLedger;
  readonly aggregator: BalanceAggregator;
  readonly notifications: NotificationService;
  readonly creditCardPot: CreditCardPotWorkflow | undefined;
  readonly savingsSweep: SavingsSweepWorkflow | undefined;

  private readonly mover: MoneyMover;
  private readonly autoSaver: AutoSaver | undefined;
  private readonly logger: Logger;

  constructor(options: PotkeeperServiceOptions) {
    const { apps, logger } = options;
    this.logger = logger;

    this.notifications = new NotificationService({
      notifier: options.notifier,
      logger: logger.child({ component: "notifications" }),
    });

    this.ledger = new TransferLedger({
      store: options.store,
      logger: logger.child({ component: "ledger" }),
      now: options.now,
    });

    this.mover = new MoneyMover({
      ledger: this.ledger,
      api: options.transferApi,
      logger: logger.child({ component: "mover" }),
      retry: options.retry,
      sleepFn: options.sleepFn,
    });

    this.aggregator = new BalanceAggregator({
      groups: accountGroups(apps),
      source: options.accountSource,
      sink: options.stateSink,
      logger: logger.child({ component: "balances" }),
      entityPrefix: apps.entityPrefix,
      onAuthFailure: (bankRef) => {
        void this.notifications.tokenExpired(bankRef);
      },
    });

    const potManager = new PotManager({
      history: this.ledger,
      logger: logger.child({ component: "pot-manager" }),
      timeZone: apps.timeZone,
      now: options.now,
    });

    this.creditCardPot =
      apps.creditCardPot === undefined
        ? undefined
        : new CreditCardPotWorkflow({
            config: apps.creditCardPot,
            aggregator: this.aggregator,
            pots: options.pots,
            potManager,
            transfers: this,
            notifications: this.notifications,
            logger,
            now: options.now,
          });

    this.autoSaver =
      apps.autoSaver === undefined
        ? undefined
        : new AutoSaver({
            config: {
              potId: apps.autoSaver.potId,
              fundingAccountRef: apps.autoSaver.fundingAccountId,
              amountPerTriggerMinorUnits: apps.autoSaver.amountPerTriggerMinorUnits,
              currency: apps.currency,
              debounceMs: apps.autoSaver.debounceMs,
              activeHours: apps.autoSaver.activeHours,
              timeZone: apps.timeZone,
            },
            history: this.ledger,
            logger: logger.child({ component: "auto-saver" }),
          });

    const { accountTransactions } = options;
    if (apps.savingsSweep !== undefined && accountTransactions === undefined) {
      logger.warn("Savings sweep configured without a transaction reader; sweeps are disabled");
    }
    this.savingsSweep =
      apps.savingsSweep === undefined || accountTransactions === undefined
        ? undefined
        : new SavingsSweepWorkflow({
            config: apps.savingsSweep,
            currency: apps.currency,
            history: this.ledger,
            accounts: accountTransactions,
            cards: options.cardTransactions,
            likedTracks: options.likedTracks,
            sink: options.stateSink,
            transfers: this,
            logger,
            now: options.now,
          });
  }

  // ─── Transfers ─────────────────────────────────────────────────────

  /**
   * Execute an intent through the mover and alert if it did not commit.
   */
  async execute(intent: TransferIntent): Promise<TransferRecord> {
    const record = await this.mover.execute(intent);
    await this.notifications.transferOutcome(record);
    return record;
  }

  /**
   * Re-drive every transfer left reserved by a previous run. Called once
   * at startup, before anything else can reserve.
   */
  async resumeReserved(): Promise<readonly TransferRecord[]> {
    const reserved = this.ledger.list({ status: "reserved" });
    const resumed: TransferRecord[] = [];

    for (const record of reserved) {
      try {
        const result = await this.mover.resume(record.idempotencyKey);
        await this.notifications.transferOutcome(result);
        resumed.push(result);
      } catch (err: unknown) {
        this.logger.error(
          { idempotencyKey: record.idempotencyKey, error: err instanceof Error ? err.message : String(err) },
          "Failed to resume reserved transfer",
        );
      }
    }

    if (reserved.length > 0) {
      this.logger.info({ reserved: reserved.length, resumed: resumed.length }, "Reserved transfers resumed");
    }
    return resumed;
  }

  resolve(idempotencyKey: string, outcome: ResolutionOutcome, note: string): TransferRecord {
    const record = this.ledger.resolve(idempotencyKey, outcome, note);
    this.logger.info({ idempotencyKey, outcome }, "Transfer resolved by operator");
    return record;
  }

  transfer(idempotencyKey: string): TransferRecord | undefined {
    return this.ledger.get(idempotencyKey);
  }

  transfers(filter?: TransferFilter): readonly TransferRecord[] {
    return this.ledger.list(filter);
  }

  // ─── Balances ──────────────────────────────────────────────────────

  async pollAll(): Promise<void> {
    await Promise.all(this.aggregator.banks().map((bankRef) => this.aggregator.poll(bankRef)));
  }

  // ─── Workflows ─────────────────────────────────────────────────────

  /**
   * @throws ServiceError NOT_CONFIGURED without a credit card pot rule
   */
  runCreditCardPot(): Promise<CreditCardRunResult> {
    if (this.creditCardPot === undefined) {
      return Promise.reject(new ServiceError("NOT_CONFIGURED", "No credit card pot is configured"));
    }
    return this.creditCardPot.run();
  }

  /**
   * Turn a track trigger into a saving. Returns null when the trigger
   * does not lead to a transfer.
   *
   * @throws ServiceError NOT_CONFIGURED without an auto-saver
   * @throws AutoSaverError INVALID_TRIGGER for an unparseable timestamp
   */
  async handleTrigger(event: TriggerEvent): Promise<TransferRecord | null> {
    if (this.autoSaver === undefined) {
      throw new ServiceError("NOT_CONFIGURED", "No auto-saver is configured");
    }
    const intent = this.autoSaver.onTrigger(event);
    if (intent === null) {
      return null;
    }
    return this.execute(intent);
  }

  /**
   * What the next savings sweep would save. Publishes the amount.
   *
   * @throws ServiceError NOT_CONFIGURED, SAVINGS_INPUT_UNAVAILABLE
   */
  calculateSavings(): Promise<SavingsEstimate> {
    if (this.savingsSweep === undefined) {
      return Promise.reject(new ServiceError("NOT_CONFIGURED", "No savings sweep is configured"));
    }
    return this.savingsSweep.calculate();
  }

  /**
   * @throws ServiceError NOT_CONFIGURED, SAVINGS_INPUT_UNAVAILABLE
   */
  runSavingsSweep(): Promise<SavingsSweepResult> {
    if (this.savingsSweep === undefined) {
      return Promise.reject(new ServiceError("NOT_CONFIGURED", "No savings sweep is configured"));
    }
    return this.savingsSweep.run();
  }

  /**
   * Handle a notification action, e.g. "TOP_UP_CREDIT_CARD_POT:<key>".
   *
   * @throws ServiceError UNKNOWN_ACTION for an unrecognised action
   * @throws ServiceError NOT_CONFIGURED, NO_PENDING_TOP_UP
   */
  async handleAction(action: string): Promise<TransferRecord> {
    const separator = action.indexOf(":");
    const phrase = separator === -1 ? action : action.slice(0, separator);
    const argument = separator === -1 ? "" : action.slice(separator + 1);

    if (phrase !== TOP_UP_ACTION || argument.length === 0) {
      throw new ServiceError("UNKNOWN_ACTION", `Unknown action "${action}"`);
    }
    if (this.creditCardPot === undefined) {
      throw new ServiceError("NOT_CONFIGURED", "No credit card pot is configured");
    }
    return this.creditCardPot.confirm(argument);
  }

  // ─── Health ────────────────────────────────────────────────────────

  verifyIntegrity(): ChainVerification {
    return this.ledger.verifyIntegrity();
  }
}
