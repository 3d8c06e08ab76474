/**
 * Credit Card Pot: Keeps a Monzo pot holding what the credit cards owe.
 *
 * Runs once a day:
 *   1. Polls the banks of the card and funding groups
 *   2. Reads the pot balance from Monzo
 *   3. Asks the pot manager for the transfer that closes the gap
 *   4. Executes transfers below the auto top-up limit and asks for
 *      confirmation (a notification action) for larger ones
 *
 * Only the latest proposal can be confirmed; each run discards the
 * previous one. Its idempotency key is deterministic, so a proposal
 * lost to a restart is proposed again by the next run.
 */

import type { BalanceAggregator } from "@potkeeper/balances";
import type { PotManager } from "@potkeeper/automation";
import type { MobileNotification, MonzoPot, NotificationAction } from "@potkeeper/clients";
import type { BalanceSnapshot, BankRef, Pot, TransferIntent, TransferRecord } from "@potkeeper/types";
import type { Logger } from "pino";
import type { FrozenCreditCardPotConfig } from "../config.js";
import { ServiceError } from "./errors.js";
import { formatAmount } from "./notifications.js";
import type { NotificationService } from "./notifications.js";

export const TOP_UP_ACTION = "TOP_UP_CREDIT_CARD_POT";

/** A pot up to this much above what is owed still gets a "skipped" notice */
export const SKIP_NOTICE_THRESHOLD_MINOR_UNITS = 5000;

const MONZO_APP_ACTION: NotificationAction = {
  action: "open_monzo",
  title: "Open Monzo",
  uri: "app://co.uk.getmondo",
};

export interface PotBalanceReader {
  getPot(accountId: string, potId: string): Promise<MonzoPot>;
}

export interface TransferExecutor {
  execute(intent: TransferIntent): Promise<TransferRecord>;
}

export interface CreditCardPotWorkflowOptions {
  readonly config: FrozenCreditCardPotConfig;
  readonly aggregator: BalanceAggregator;
  readonly pots: PotBalanceReader;
  readonly potManager: PotManager;
  readonly transfers: TransferExecutor;
  readonly notifications: NotificationService;
  readonly logger: Logger;
  /** Clock (injectable for tests). Default: () => new Date() */
  readonly now?: (() => Date) | undefined;
}

export type CreditCardRunResult =
  | { readonly outcome: "skipped"; readonly reason: string }
  | { readonly outcome: "executed"; readonly record: TransferRecord }
  | { readonly outcome: "pending"; readonly intent: TransferIntent };

interface PendingTopUp {
  readonly intent: TransferIntent;
  readonly fundingMinorUnits: number;
}

/**
 * One snapshot for several groups: the sum, as old as its oldest part,
 * stale if any part is.
 */
export function combineSnapshots(
  snapshots: readonly BalanceSnapshot[],
  accountGroup: string,
): BalanceSnapshot | undefined {
  const [first] = snapshots;
  if (first === undefined || snapshots.some((s) => s.currency !== first.currency)) {
    return undefined;
  }
  return {
    bankRef: first.bankRef,
    accountGroup,
    amountMinorUnits: snapshots.reduce((sum, s) => sum + s.amountMinorUnits, 0),
    currency: first.currency,
    observedAt: snapshots.reduce(
      (oldest, s) => (Date.parse(s.observedAt) < Date.parse(oldest) ? s.observedAt : oldest),
      first.observedAt,
    ),
    stale: snapshots.some((s) => s.stale),
  };
}

export class CreditCardPotWorkflow {
  private readonly config: FrozenCreditCardPotConfig;
  private readonly aggregator: BalanceAggregator;
  private readonly pots: PotBalanceReader;
  private readonly potManager: PotManager;
  private readonly transfers: TransferExecutor;
  private readonly notifications: NotificationService;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly pot: Pot;

  private readonly pendingTopUps = new Map<string, PendingTopUp>();

  constructor(options: CreditCardPotWorkflowOptions) {
    this.config = options.config;
    this.aggregator = options.aggregator;
    this.pots = options.pots;
    this.potManager = options.potManager;
    this.transfers = options.transfers;
    this.notifications = options.notifications;
    this.logger = options.logger.child({ workflow: "credit-card-pot" });
    this.now = options.now ?? (() => new Date());
    this.pot = {
      potId: options.config.potId,
      bankRef: "MONZO",
      purpose: "credit card",
      targetBalanceMinorUnits: null,
    };
  }

  // ─── Daily Run ─────────────────────────────────────────────────────

  async run(): Promise<CreditCardRunResult> {
    const { config } = this;
    this.pendingTopUps.clear();

    const banks = new Set<BankRef>([
      ...config.cardGroups.map((ref) => ref.bankRef),
      config.fundingGroup.bankRef,
    ]);
    await Promise.all([...banks].map((bankRef) => this.aggregator.poll(bankRef)));

    const cards: BalanceSnapshot[] = [];
    for (const ref of config.cardGroups) {
      const snapshot = this.aggregator.latest(ref.bankRef, ref.group);
      if (snapshot === undefined) {
        return this.skip(`No balance for ${ref.bankRef}/${ref.group}`);
      }
      cards.push(snapshot);
    }
    const owed = combineSnapshots(cards, "credit_cards");
    if (owed === undefined) {
      return this.skip("Card balances use different currencies");
    }

    const funding = this.aggregator.latest(config.fundingGroup.bankRef, config.fundingGroup.group);
    if (funding === undefined) {
      return this.skip(`No balance for ${config.fundingGroup.bankRef}/${config.fundingGroup.group}`);
    }
    if (owed.stale || funding.stale) {
      return this.skip("Balances are stale");
    }

    let potBalance: BalanceSnapshot;
    try {
      const pot = await this.pots.getPot(config.fundingAccountId, config.potId);
      potBalance = {
        bankRef: "MONZO",
        accountGroup: `pot:${pot.potId}`,
        amountMinorUnits: pot.balanceMinorUnits,
        currency: pot.currency,
        observedAt: this.now().toISOString(),
        stale: false,
      };
    } catch (err: unknown) {
      return this.skip(`Pot balance unavailable: ${err instanceof Error ? err.message : String(err)}`);
    }

    const intent = this.potManager.reconcile(this.pot, potBalance, owed, {
      fundingAccountRef: config.fundingAccountId,
      minDeltaMinorUnits: config.minDeltaMinorUnits,
      allowWithdrawals: config.allowWithdrawals,
      fundingBalance: funding,
      minFundingRemainderMinorUnits: config.minFundingRemainderMinorUnits,
    });

    if (intent === null) {
      return this.noTransfer(owed, potBalance);
    }

    if (intent.amountMinorUnits < config.maxAutoTopUpMinorUnits) {
      const record = await this.transfers.execute(intent);
      if (record.status === "committed") {
        await this.announce(intent, funding.amountMinorUnits);
      }
      return { outcome: "executed", record };
    }

    this.pendingTopUps.set(intent.idempotencyKey, { intent, fundingMinorUnits: funding.amountMinorUnits });
    this.logger.info(
      { idempotencyKey: intent.idempotencyKey, amount: intent.amountMinorUnits },
      "Transfer above the auto top-up limit; asking for confirmation",
    );
    await this.notifications.notify(this.confirmationRequest(intent, funding.amountMinorUnits));
    return { outcome: "pending", intent };
  }

  // ─── Confirmation ──────────────────────────────────────────────────

  pending(): readonly TransferIntent[] {
    return [...this.pendingTopUps.values()].map((p) => p.intent);
  }

  /**
   * Execute a proposal the household confirmed.
   *
   * @throws ServiceError NO_PENDING_TOP_UP if the key is not the latest
   *         proposal or was already confirmed
   */
  async confirm(idempotencyKey: string): Promise<TransferRecord> {
    const pending = this.pendingTopUps.get(idempotencyKey);
    if (pending === undefined) {
      throw new ServiceError("NO_PENDING_TOP_UP", `No pending credit card pot transfer "${idempotencyKey}"`);
    }
    this.pendingTopUps.delete(idempotencyKey);

    const record = await this.transfers.execute(pending.intent);
    if (record.status === "committed") {
      await this.announce(pending.intent, pending.fundingMinorUnits);
    }
    return record;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private skip(reason: string): CreditCardRunResult {
    this.logger.warn({ reason }, "Credit card pot run skipped");
    return { outcome: "skipped", reason };
  }

  private async noTransfer(owed: BalanceSnapshot, pot: BalanceSnapshot): Promise<CreditCardRunResult> {
    const deficit = owed.amountMinorUnits - pot.amountMinorUnits;
    if (deficit > 0) {
      return this.skip("No transfer proposed");
    }

    this.logger.info({ surplus: -deficit }, "No top up needed");
    if (-deficit < SKIP_NOTICE_THRESHOLD_MINOR_UNITS) {
      await this.notifications.notify({
        title: "Credit Card Pot top up skipped",
        message: "No top up needed!",
      });
    }
    return { outcome: "skipped", reason: "No top up needed" };
  }

  private async announce(intent: TransferIntent, fundingMinorUnits: number): Promise<void> {
    const amount = formatAmount(intent.amountMinorUnits, intent.currency);
    if (intent.direction === "deposit") {
      const remaining = formatAmount(fundingMinorUnits - intent.amountMinorUnits, intent.currency);
      await this.notifications.notify({
        title: "Credit Card Pot topped up",
        message: `${amount} has been added to the credit card pot. Remaining balance: ${remaining}`,
        actions: [MONZO_APP_ACTION],
      });
    } else {
      await this.notifications.notify({
        title: "Credit Card Pot surplus returned",
        message: `${amount} has been moved from the credit card pot back to the current account.`,
        actions: [MONZO_APP_ACTION],
      });
    }
  }

  private confirmationRequest(intent: TransferIntent, fundingMinorUnits: number): MobileNotification {
    const amount = formatAmount(intent.amountMinorUnits, intent.currency);
    const confirm: NotificationAction = {
      action: `${TOP_UP_ACTION}:${intent.idempotencyKey}`,
      title: intent.direction === "deposit" ? `Top Up (${amount})` : `Move Back (${amount})`,
    };

    if (intent.direction === "deposit") {
      const remaining = formatAmount(fundingMinorUnits - intent.amountMinorUnits, intent.currency);
      return {
        title: "Top up Credit Card Pot?",
        message: `Credit Cards pot is ${amount} too low. Top up pot?\n\nAmount remaining: ${remaining}`,
        tag: TOP_UP_ACTION,
        actions: [confirm, MONZO_APP_ACTION],
      };
    }
    return {
      title: "Return Credit Card Pot surplus?",
      message: `Credit Cards pot holds ${amount} more than the cards owe. Move it back?`,
      tag: TOP_UP_ACTION,
      actions: [confirm, MONZO_APP_ACTION],
    };
  }
}
