import { InMemoryEventStore } from "@potkeeper/event-store";
import { TransferLedger } from "@potkeeper/ledger";
import type { BalanceSnapshot, BankRef } from "@potkeeper/types";
import { pino } from "pino";

export const silentLogger = pino({ level: "silent" });

export const NOW = new Date("2026-03-01T21:00:00.000Z");

export function createLedger(now: () => Date = () => NOW): TransferLedger {
  return new TransferLedger({ store: new InMemoryEventStore(), logger: silentLogger, now });
}

export function snapshot(
  accountGroup: string,
  amountMinorUnits: number,
  overrides: Partial<BalanceSnapshot> = {},
): BalanceSnapshot {
  const bankRef: BankRef = "MONZO";
  return {
    bankRef,
    accountGroup,
    amountMinorUnits,
    currency: "GBP",
    observedAt: "2026-03-01T20:55:00.000Z",
    stale: false,
    ...overrides,
  };
}
