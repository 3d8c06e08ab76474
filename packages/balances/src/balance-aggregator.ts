/**
 * Balance Aggregator: Combined balances per account group.
 *
 * Polls every member of a bank's account groups concurrently and sums
 * each group into a BalanceSnapshot. Only the latest snapshot per group
 * is kept.
 *
 * Failure handling:
 * - A member failure keeps the group's previous snapshot, flagged stale
 * - A group that has never succeeded is omitted until it does
 * - Rejected credentials mark every group of the bank stale and fire
 *   the onAuthFailure hook once
 * - A fetched value older than the retained snapshot never replaces it
 */

import { sumMinorUnits, formatMinorUnits } from "@potkeeper/ledger";
import type { AccountGroup, BalanceSnapshot, BankRef } from "@potkeeper/types";
import type { Logger } from "pino";
import {
  AccountSourceError,
  BalanceAggregatorError,
  DEFAULT_ENTITY_PREFIX,
} from "./types.js";
import type {
  AccountSource,
  BalanceAggregatorOptions,
  MemberBalance,
  StateSink,
} from "./types.js";

export type GroupSnapshots = ReadonlyMap<string, BalanceSnapshot>;

/**
 * Home Assistant entity id for a group's balance sensor.
 */
export function balanceEntityId(
  prefix: string,
  bankRef: BankRef,
  groupName: string,
): string {
  const slug = `${prefix}_${bankRef}_${groupName}`.toLowerCase().replace(/[^a-z0-9_]+/g, "_");
  return `sensor.${slug}`;
}

function snapshotKey(bankRef: BankRef, groupName: string): string {
  return `${bankRef}/${groupName}`;
}

export class BalanceAggregator {
  private readonly groupsByBank = new Map<BankRef, readonly AccountGroup[]>();
  private readonly source: AccountSource;
  private readonly sink: StateSink | undefined;
  private readonly logger: Logger;
  private readonly entityPrefix: string;
  private readonly onAuthFailure: ((bankRef: BankRef) => void) | undefined;

  private readonly latestSnapshots = new Map<string, BalanceSnapshot>();
  private readonly inFlight = new Map<BankRef, Promise<GroupSnapshots>>();

  /**
   * @throws BalanceAggregatorError EMPTY_GROUP or DUPLICATE_GROUP for
   *         invalid group configuration
   */
  constructor(options: BalanceAggregatorOptions) {
    this.source = options.source;
    this.sink = options.sink;
    this.logger = options.logger;
    this.entityPrefix = options.entityPrefix ?? DEFAULT_ENTITY_PREFIX;
    this.onAuthFailure = options.onAuthFailure;

    for (const group of options.groups) {
      if (group.members.length === 0) {
        throw new BalanceAggregatorError(
          "EMPTY_GROUP",
          `Account group "${group.name}" of ${group.bankRef} has no members`,
        );
      }
      const existing = this.groupsByBank.get(group.bankRef) ?? [];
      if (existing.some((g) => g.name === group.name)) {
        throw new BalanceAggregatorError(
          "DUPLICATE_GROUP",
          `Account group "${group.name}" is configured twice for ${group.bankRef}`,
        );
      }
      this.groupsByBank.set(group.bankRef, [...existing, group]);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Polling
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Refresh every group of a bank. Concurrent calls for the same bank
   * share one poll.
   */
  poll(bankRef: BankRef): Promise<GroupSnapshots> {
    const running = this.inFlight.get(bankRef);
    if (running !== undefined) {
      return running;
    }

    const groups = this.groupsByBank.get(bankRef);
    if (groups === undefined) {
      return Promise.reject(
        new BalanceAggregatorError("UNKNOWN_BANK", `No account groups configured for ${bankRef}`),
      );
    }

    const poll = this.runPoll(bankRef, groups).finally(() => {
      this.inFlight.delete(bankRef);
    });
    this.inFlight.set(bankRef, poll);
    return poll;
  }

  banks(): readonly BankRef[] {
    return [...this.groupsByBank.keys()];
  }

  groups(bankRef: BankRef): readonly AccountGroup[] {
    return this.groupsByBank.get(bankRef) ?? [];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  latest(bankRef: BankRef, groupName: string): BalanceSnapshot | undefined {
    return this.latestSnapshots.get(snapshotKey(bankRef, groupName));
  }

  all(): readonly BalanceSnapshot[] {
    return [...this.latestSnapshots.values()];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private async runPoll(bankRef: BankRef, groups: readonly AccountGroup[]): Promise<GroupSnapshots> {
    const log = this.logger.child({ bank: bankRef });

    const settledGroups = await Promise.all(
      groups.map(async (group) => ({
        group,
        results: await Promise.allSettled(
          group.members.map((member) => this.source.fetchBalance(bankRef, member)),
        ),
      })),
    );

    const unauthorized = settledGroups.some(({ results }) =>
      results.some(
        (r) => r.status === "rejected" && r.reason instanceof AccountSourceError && r.reason.kind === "unauthorized",
      ),
    );

    const snapshots = new Map<string, BalanceSnapshot>();

    for (const { group, results } of settledGroups) {
      const previous = this.latest(bankRef, group.name);
      const fresh = unauthorized ? undefined : this.combine(group, results, previous, log);
      const snapshot = fresh ?? (previous !== undefined ? { ...previous, stale: true } : undefined);

      if (snapshot === undefined) {
        continue;
      }

      this.latestSnapshots.set(snapshotKey(bankRef, group.name), snapshot);
      snapshots.set(group.name, snapshot);
      this.publish(snapshot, log);
    }

    if (unauthorized) {
      log.error("Access token rejected; balances for this bank are stale");
      this.onAuthFailure?.(bankRef);
    }

    log.info(
      {
        fresh: [...snapshots.values()].filter((s) => !s.stale).length,
        stale: [...snapshots.values()].filter((s) => s.stale).length,
        missing: groups.length - snapshots.size,
      },
      "Balances polled",
    );

    return snapshots;
  }

  /**
   * Sum a group's member balances, or return undefined when the group
   * cannot be refreshed this poll.
   */
  private combine(
    group: AccountGroup,
    results: readonly PromiseSettledResult<MemberBalance>[],
    previous: BalanceSnapshot | undefined,
    log: Logger,
  ): BalanceSnapshot | undefined {
    const balances: MemberBalance[] = [];
    for (const [i, result] of results.entries()) {
      if (result.status === "rejected") {
        const reason: unknown = result.reason;
        log.warn(
          {
            group: group.name,
            member: group.members[i]?.id,
            kind: reason instanceof AccountSourceError ? reason.kind : "unavailable",
            error: reason instanceof Error ? reason.message : String(reason),
          },
          "Member balance unavailable",
        );
        return undefined;
      }
      balances.push(result.value);
    }

    const currencies = new Set(balances.map((b) => b.currency));
    const [currency] = currencies;
    if (currency === undefined || currencies.size > 1) {
      log.warn({ group: group.name, currencies: [...currencies] }, "Mixed currencies in account group");
      return undefined;
    }

    const unreadable = balances.find((b) => Number.isNaN(Date.parse(b.asOf)));
    if (unreadable !== undefined) {
      log.warn({ group: group.name, asOf: unreadable.asOf }, "Member balance has an unreadable timestamp");
      return undefined;
    }

    const observedAt = balances
      .map((b) => b.asOf)
      .reduce((oldest, asOf) => (Date.parse(asOf) < Date.parse(oldest) ? asOf : oldest));

    if (previous !== undefined && Date.parse(observedAt) < Date.parse(previous.observedAt)) {
      log.warn(
        { group: group.name, observedAt, retainedObservedAt: previous.observedAt },
        "Fetched balance is older than the retained snapshot",
      );
      return undefined;
    }

    return {
      bankRef: group.bankRef,
      accountGroup: group.name,
      amountMinorUnits: sumMinorUnits(balances.map((b) => b.amountMinorUnits)),
      currency,
      observedAt,
      stale: false,
    };
  }

  /** Fire-and-forget; the poll never waits on the sink. */
  private publish(snapshot: BalanceSnapshot, log: Logger): void {
    const sink = this.sink;
    if (sink === undefined) {
      return;
    }

    const entityId = balanceEntityId(this.entityPrefix, snapshot.bankRef, snapshot.accountGroup);
    void Promise.resolve()
      .then(() =>
        sink.publish({
          entityId,
          value: formatMinorUnits(snapshot.amountMinorUnits),
          attributes: {
            unit_of_measurement: snapshot.currency,
            device_class: "monetary",
            friendly_name: `${snapshot.bankRef} ${snapshot.accountGroup.replace(/_/g, " ")}`,
            observed_at: snapshot.observedAt,
            stale: snapshot.stale,
          },
        }),
      )
      .catch((err: unknown) => {
        log.error(
          { entityId, error: err instanceof Error ? err.message : String(err) },
          "Failed to publish balance",
        );
      });
  }
}
