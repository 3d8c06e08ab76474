/**
 * Tests for the service wiring: restart recovery, track triggers and
 * operator resolution.
 */

import { describe, it, expect } from "vitest";
import { InMemoryEventStore } from "@potkeeper/event-store";
import { TransferLedger } from "@potkeeper/ledger";
import { TransferApiError } from "@potkeeper/mover";
import type { TransferIntent } from "@potkeeper/types";
import { ServiceError } from "../src/services/errors.js";
import { catchError, createHarness, NOW, silentLogger, TEST_APPS_CONFIG } from "./setup.js";

const TRIGGER = {
  eventId: "evt_1",
  timestamp: "2026-03-01T21:00:10.000Z",
  payload: { trackId: "track_1" },
};

const SAVE_KEY = "autosave:track_1:29539980";

function reservedBeforeRestart(store: InMemoryEventStore, attempts: number): TransferIntent {
  const ledger = new TransferLedger({ store, logger: silentLogger, now: () => NOW });
  const intent: TransferIntent = {
    idempotencyKey: "pot:MONZO:pot_cc:20260301:0",
    sourceAccountRef: "acc_current",
    destinationPotOrAccountRef: "pot_cc",
    direction: "deposit",
    amountMinorUnits: 2345,
    currency: "GBP",
    reason: "Top up credit card pot to 123.45",
    createdAt: NOW.toISOString(),
  };
  ledger.reserve(intent);
  for (let i = 0; i < attempts; i++) {
    ledger.recordAttempt(intent.idempotencyKey, "timeout");
  }
  return intent;
}

// =============================================================================
// Restart recovery
// =============================================================================

describe("PotkeeperService.resumeReserved", () => {
  it("re-drives a transfer left reserved under its original key", async () => {
    const store = new InMemoryEventStore();
    const intent = reservedBeforeRestart(store, 0);
    const { service, transfer } = createHarness({ store });

    const resumed = await service.resumeReserved();

    expect(resumed).toHaveLength(1);
    expect(resumed[0]).toMatchObject({ idempotencyKey: intent.idempotencyKey, status: "committed" });
    expect(transfer).toHaveBeenCalledWith(
      expect.objectContaining({ clientIdempotencyKey: intent.idempotencyKey, amountMinorUnits: 2345 }),
    );
  });

  it("abandons rather than fails a resumed transfer that was rate limited", async () => {
    const store = new InMemoryEventStore();
    reservedBeforeRestart(store, 1);
    const { service, transfer, alert } = createHarness({ store });
    transfer.mockRejectedValue(new TransferApiError("rate_limited", "HTTP 429", 429));

    const [record] = await service.resumeReserved();

    expect(record?.status).toBe("abandoned");
    expect(alert).toHaveBeenCalledWith(expect.objectContaining({ title: "Transfer needs review" }));
  });

  it("does nothing when no transfer is reserved", async () => {
    const { service, transfer } = createHarness();

    expect(await service.resumeReserved()).toEqual([]);
    expect(transfer).not.toHaveBeenCalled();
  });
});

// =============================================================================
// Track triggers
// =============================================================================

describe("PotkeeperService.handleTrigger", () => {
  it("saves into the auto-save pot", async () => {
    const { service, transfer } = createHarness();

    const record = await service.handleTrigger(TRIGGER);

    expect(record).toMatchObject({ idempotencyKey: SAVE_KEY, status: "committed", amountMinorUnits: 79 });
    expect(transfer).toHaveBeenCalledWith({
      sourceRef: "acc_current",
      destinationRef: "pot_savings",
      direction: "deposit",
      amountMinorUnits: 79,
      clientIdempotencyKey: SAVE_KEY,
    });
  });

  it("moves money once for a redelivered trigger", async () => {
    const { service, transfer } = createHarness();

    const first = await service.handleTrigger(TRIGGER);
    const second = await service.handleTrigger(TRIGGER);

    expect(second).toEqual(first);
    expect(transfer).toHaveBeenCalledTimes(1);
  });

  it("ignores triggers without a track", async () => {
    const { service, transfer } = createHarness();

    expect(await service.handleTrigger({ ...TRIGGER, payload: {} })).toBeNull();
    expect(transfer).not.toHaveBeenCalled();
  });

  it("reports an auto-saver that is not configured", async () => {
    const { autoSaver: _unused, ...apps } = TEST_APPS_CONFIG;
    const { service } = createHarness({ apps });

    const err = await catchError(() => service.handleTrigger(TRIGGER));

    expect(err).toBeInstanceOf(ServiceError);
    expect(err).toMatchObject({ code: "NOT_CONFIGURED" });
  });
});

// =============================================================================
// Resolution
// =============================================================================

describe("PotkeeperService.resolve", () => {
  it("settles an abandoned transfer", async () => {
    const { service, transfer } = createHarness();
    transfer.mockRejectedValue(new TransferApiError("ambiguous", "timeout"));
    await service.handleTrigger(TRIGGER);

    const record = service.resolve(SAVE_KEY, "committed", "Seen in the pot");

    expect(record.status).toBe("committed");
    expect(service.transfer(SAVE_KEY)?.status).toBe("committed");
  });

  it("lists transfers by status", async () => {
    const { service } = createHarness();
    await service.handleTrigger(TRIGGER);

    expect(service.transfers({ status: "committed" }).map((r) => r.idempotencyKey)).toEqual([SAVE_KEY]);
    expect(service.transfers({ status: "reserved" })).toEqual([]);
  });
});
