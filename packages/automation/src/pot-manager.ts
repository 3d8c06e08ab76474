/**
 * Pot Manager: Keeps a pot at its target balance.
 *
 * Compares a pot's balance with its target (a fixed amount or a live
 * account-group balance such as the credit cards owed) and proposes
 * the transfer that closes the gap.
 *
 * Rules:
 * - Never acts on stale or outdated snapshots
 * - Never proposes a second transfer for a pot balance observed before
 *   the pot's last committed transfer
 * - Leaves pots with a transfer in flight alone, and pots with an
 *   abandoned transfer until it is resolved
 * - Top-ups never take the funding account below its minimum remainder
 */

import { formatMinorUnits } from "@potkeeper/ledger";
import type { TransferHistory } from "@potkeeper/ledger";
import type { BalanceSnapshot, Pot, TransferIntent } from "@potkeeper/types";
import type { Logger } from "pino";
import { dayStamp, potKeyPrefix, potTransferKey } from "./keys.js";
import { PotManagerError } from "./types.js";
import type { PotManagerOptions, ReconcileOptions } from "./types.js";

const DEFAULT_MAX_SNAPSHOT_AGE_MS = 60 * 60 * 1000;

export class PotManager {
  private readonly history: TransferHistory;
  private readonly logger: Logger;
  private readonly timeZone: string;
  private readonly now: () => Date;

  constructor(options: PotManagerOptions) {
    this.history = options.history;
    this.logger = options.logger;
    this.timeZone = options.timeZone ?? "UTC";
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Propose the transfer that brings the pot to its target, or null
   * when nothing should move.
   *
   * @param targetAccountGroupBalance - Dynamic target; overrides the
   *        pot's fixed target when given
   * @throws PotManagerError CURRENCY_MISMATCH if the snapshots disagree
   */
  reconcile(
    pot: Pot,
    currentPotBalance: BalanceSnapshot,
    targetAccountGroupBalance: BalanceSnapshot | undefined,
    options: ReconcileOptions,
  ): TransferIntent | null {
    const log = this.logger.child({ bank: pot.bankRef, potId: pot.potId });
    const now = this.now();
    const maxAge = options.maxSnapshotAgeMs ?? DEFAULT_MAX_SNAPSHOT_AGE_MS;
    const minDelta = Math.max(options.minDeltaMinorUnits ?? 1, 1);

    const snapshots = [currentPotBalance, targetAccountGroupBalance, options.fundingBalance].filter(
      (s): s is BalanceSnapshot => s !== undefined,
    );

    const currencies = new Set(snapshots.map((s) => s.currency));
    if (currencies.size > 1) {
      throw new PotManagerError(
        "CURRENCY_MISMATCH",
        `Pot ${pot.potId} snapshots use different currencies: ${[...currencies].join(", ")}`,
      );
    }

    for (const snapshot of snapshots) {
      if (snapshot.stale) {
        log.info({ group: snapshot.accountGroup }, "Snapshot is stale; not reconciling");
        return null;
      }
      const observedAt = Date.parse(snapshot.observedAt);
      if (Number.isNaN(observedAt) || now.getTime() - observedAt > maxAge) {
        log.info(
          { group: snapshot.accountGroup, observedAt: snapshot.observedAt },
          "Snapshot is too old; not reconciling",
        );
        return null;
      }
    }

    const target = targetAccountGroupBalance?.amountMinorUnits ?? pot.targetBalanceMinorUnits;
    if (target === null) {
      log.debug("Pot has no target");
      return null;
    }

    const prefix = potKeyPrefix(pot.bankRef, pot.potId);
    const potRecords = this.history.list({ prefix });

    if (potRecords.some((r) => r.status === "abandoned")) {
      log.warn("Pot has an abandoned transfer awaiting review; not reconciling");
      return null;
    }
    if (potRecords.some((r) => r.status === "reserved")) {
      log.info("Pot has a transfer in flight; not reconciling");
      return null;
    }

    const committed = potRecords.filter((r) => r.status === "committed");
    const lastCommitAt = committed.reduce<number | undefined>((latest, r) => {
      const at = Date.parse(r.updatedAt);
      return latest === undefined || at > latest ? at : latest;
    }, undefined);

    if (lastCommitAt !== undefined && Date.parse(currentPotBalance.observedAt) <= lastCommitAt) {
      log.info(
        { observedAt: currentPotBalance.observedAt },
        "Pot balance predates the last transfer; waiting for a fresh balance",
      );
      return null;
    }

    const delta = target - currentPotBalance.amountMinorUnits;
    let amount = Math.abs(delta);
    const direction = delta > 0 ? "deposit" : "withdraw";

    if (delta < 0 && options.allowWithdrawals === false) {
      log.debug({ surplus: amount }, "Pot above target; withdrawals disabled");
      return null;
    }

    if (direction === "deposit" && options.fundingBalance !== undefined) {
      const remainder = options.minFundingRemainderMinorUnits ?? 0;
      const available = Math.max(options.fundingBalance.amountMinorUnits - remainder, 0);
      if (available < amount) {
        log.info({ deficit: amount, available }, "Top-up capped by funding balance");
        amount = available;
      }
    }

    if (amount < minDelta) {
      log.debug({ delta, amount, minDelta }, "Difference below threshold");
      return null;
    }

    const day = dayStamp(now, this.timeZone);
    const seq = committed.filter((r) => r.idempotencyKey.startsWith(`${prefix}${day}:`)).length;
    const endpoints = direction === "deposit"
      ? { sourceAccountRef: options.fundingAccountRef, destinationPotOrAccountRef: pot.potId }
      : { sourceAccountRef: pot.potId, destinationPotOrAccountRef: options.fundingAccountRef };

    const intent: TransferIntent = {
      idempotencyKey: potTransferKey(pot.bankRef, pot.potId, day, seq),
      ...endpoints,
      direction,
      amountMinorUnits: amount,
      currency: currentPotBalance.currency,
      reason:
        direction === "deposit"
          ? `Top up ${pot.purpose} pot to ${formatMinorUnits(target)}`
          : `Return ${pot.purpose} pot surplus above ${formatMinorUnits(target)}`,
      createdAt: now.toISOString(),
    };

    log.info(
      { idempotencyKey: intent.idempotencyKey, direction, amountMinorUnits: amount },
      "Pot transfer proposed",
    );
    return intent;
  }
}
