import { InMemoryEventStore } from "@potkeeper/event-store";
import type { EventStore } from "@potkeeper/event-store";
import type { TransferIntent } from "@potkeeper/types";
import { pino } from "pino";
import { TransferLedger } from "../src/transfer-ledger.js";
import { TransferLedgerError } from "../src/types.js";

export const silentLogger = pino({ level: "silent" });

export const T0 = new Date("2026-03-01T21:00:00.000Z");

export function makeIntent(overrides: Partial<TransferIntent> = {}): TransferIntent {
  return {
    idempotencyKey: "pot:MONZO:pot_cc:20260301:0",
    sourceAccountRef: "acc_current",
    destinationPotOrAccountRef: "pot_cc",
    direction: "deposit",
    amountMinorUnits: 2345,
    currency: "GBP",
    reason: "Credit card pot top-up",
    createdAt: T0.toISOString(),
    ...overrides,
  };
}

export function createLedger(store: EventStore = new InMemoryEventStore()): TransferLedger {
  return new TransferLedger({ store, logger: silentLogger, now: () => T0 });
}

/** Run fn and return what it threw. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  throw new Error("Expected function to throw");
}

export function errorCode(err: unknown): string | undefined {
  return err instanceof TransferLedgerError ? err.code : undefined;
}
