/**
 * Savings Sweep: Moves the calculated savings into the savings pot.
 *
 * A sweep window runs from the last committed sweep to now. The key of
 * a window is fixed by when it opened, so repeating a sweep before it
 * commits never moves money twice; a failed sweep may be retried with
 * a fresh amount.
 */

import type { TransferHistory } from "@potkeeper/ledger";
import type { Currency, TransferIntent } from "@potkeeper/types";
import type { Logger } from "pino";
import { sweepKey, sweepKeyPrefix } from "./keys.js";
import type { SavingsCalculation } from "./savings-calculator.js";

export const DEFAULT_SWEEP_LOOKBACK_MS = 24 * 60 * 60 * 1000;

export interface SavingsSweepConfig {
  readonly potId: string;
  readonly fundingAccountRef: string;
  /** Default: "GBP" */
  readonly currency?: Currency | undefined;
  /** How far back the first sweep looks. Default: 24 hours */
  readonly lookbackMs?: number | undefined;
}

export interface SavingsSweepOptions {
  readonly config: SavingsSweepConfig;
  readonly history: TransferHistory;
  readonly logger: Logger;
}

export interface SweepWindow {
  readonly idempotencyKey: string;
  /** Transactions and tracks from this time on count */
  readonly since: Date;
  readonly lastSweepAt: Date | undefined;
}

export class SavingsSweep {
  private readonly config: SavingsSweepConfig;
  private readonly history: TransferHistory;
  private readonly logger: Logger;

  constructor(options: SavingsSweepOptions) {
    this.config = options.config;
    this.history = options.history;
    this.logger = options.logger;
  }

  window(now: Date): SweepWindow {
    const { potId } = this.config;
    const lastSweepMs = this.history
      .list({ prefix: sweepKeyPrefix(potId), status: "committed" })
      .map((record) => Date.parse(record.intent.createdAt))
      .filter((at) => !Number.isNaN(at))
      .reduce<number | undefined>((latest, at) => (latest === undefined || at > latest ? at : latest), undefined);

    const lastSweepAt = lastSweepMs === undefined ? undefined : new Date(lastSweepMs);
    const lookbackMs = this.config.lookbackMs ?? DEFAULT_SWEEP_LOOKBACK_MS;
    return {
      idempotencyKey: sweepKey(potId, lastSweepAt),
      since: lastSweepAt ?? new Date(now.getTime() - lookbackMs),
      lastSweepAt,
    };
  }

  /**
   * The deposit for a window, or null when there is nothing to save or
   * the window already has a transfer that is not failed.
   */
  propose(window: SweepWindow, calculation: SavingsCalculation, now: Date): TransferIntent | null {
    const key = window.idempotencyKey;
    const log = this.logger.child({ idempotencyKey: key });

    const existing = this.history.get(key);
    if (existing !== undefined && existing.status !== "failed") {
      log.info({ status: existing.status }, "Sweep window already has a transfer; not sweeping");
      return null;
    }

    if (calculation.totalMinorUnits <= 0) {
      log.info("Nothing to save");
      return null;
    }

    return {
      idempotencyKey: key,
      sourceAccountRef: this.config.fundingAccountRef,
      destinationPotOrAccountRef: this.config.potId,
      direction: "deposit",
      amountMinorUnits: calculation.totalMinorUnits,
      currency: this.config.currency ?? "GBP",
      reason: `Auto-save sweep since ${window.since.toISOString()}`,
      createdAt: now.toISOString(),
    };
  }
}
