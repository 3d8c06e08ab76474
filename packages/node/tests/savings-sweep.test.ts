/**
 * Tests for the savings sweep workflow.
 */

import { describe, it, expect } from "vitest";
import { ServiceError } from "../src/services/errors.js";
import { basisPoints, SAVINGS_ENTITY_ID } from "../src/services/savings-sweep.js";
import { catchError, createHarness, NOW, SAVINGS_APPS_CONFIG } from "./setup.js";
import type { TestHarness } from "./setup.js";

const SINCE = new Date("2026-02-28T21:00:00.000Z");
const FIRST_KEY = "sweep:pot_savings:initial";

/**
 * Salary 2000.00, a pot withdrawal, a 15.50 takeaway, an 8.99 card
 * purchase and two liked tracks:
 *   round-ups 0.50 + 0.01, income 2.5% of 2000.00, takeaway 10% of
 *   15.50, 2 × 0.79 tracks, 1.00 minimum = 54.64
 */
function withActivity(harness: TestHarness): TestHarness {
  harness.listTransactions.mockResolvedValue([
    { description: "Salary", amountMinorUnits: 200000 },
    { description: "pot_0000savings", amountMinorUnits: 5000 },
    { description: "TAKEAWAY", amountMinorUnits: -1550 },
  ]);
  harness.cardTransactions.mockResolvedValue([{ description: "BOOK SHOP", amountMinorUnits: -899 }]);
  harness.likedTracksSince.mockResolvedValue(2);
  return harness;
}

describe("basisPoints", () => {
  it("converts a percentage without float drift", () => {
    expect(basisPoints(2.5)).toBe(250);
    expect(basisPoints(0.1)).toBe(10);
    expect(basisPoints(100)).toBe(10000);
  });
});

describe("savings calculation", () => {
  it("counts transactions, card purchases and liked tracks since the window opened", async () => {
    const { service, listTransactions, cardTransactions, likedTracksSince } = withActivity(
      createHarness({ apps: SAVINGS_APPS_CONFIG }),
    );

    const { window, calculation } = await service.calculateSavings();

    expect(window).toEqual({ idempotencyKey: FIRST_KEY, since: SINCE, lastSweepAt: undefined });
    expect(calculation).toEqual({
      totalMinorUnits: 5464,
      categories: { roundUps: 51, incomeShare: 5000, flaggedSpendShare: 155, likedTracks: 158, minimum: 100 },
      breakdown: { incomeShare: ["2000.00 @ Salary"], flaggedSpendShare: ["15.50 @ TAKEAWAY"] },
    });
    expect(listTransactions).toHaveBeenCalledWith("acc_current", SINCE);
    expect(cardTransactions).toHaveBeenCalledWith("AMEX", "amex_gold", SINCE, NOW);
    expect(likedTracksSince).toHaveBeenCalledWith(SINCE);
  });

  it("publishes the amount with its breakdown", async () => {
    const { service, publish } = withActivity(createHarness({ apps: SAVINGS_APPS_CONFIG }));

    await service.calculateSavings();

    expect(publish).toHaveBeenCalledWith({
      entityId: SAVINGS_ENTITY_ID,
      value: "54.64",
      attributes: {
        unit_of_measurement: "GBP",
        device_class: "monetary",
        friendly_name: "Auto save amount",
        since: "2026-02-28T21:00:00.000Z",
        roundUps: "0.51",
        incomeShare: "50.00",
        flaggedSpendShare: "1.55",
        likedTracks: "1.58",
        minimum: "1.00",
        breakdown: '{"incomeShare":["2000.00 @ Salary"],"flaggedSpendShare":["15.50 @ TAKEAWAY"]}',
      },
    });
  });

  it("still returns the amount when publishing fails", async () => {
    const { service, publish } = withActivity(createHarness({ apps: SAVINGS_APPS_CONFIG }));
    publish.mockRejectedValue(new Error("Home Assistant down"));

    const { calculation } = await service.calculateSavings();

    expect(calculation.totalMinorUnits).toBe(5464);
  });

  it("reports an unreadable card as unavailable input", async () => {
    const { service, cardTransactions } = withActivity(createHarness({ apps: SAVINGS_APPS_CONFIG }));
    cardTransactions.mockRejectedValue(new Error("bank offline"));

    const err = await catchError(() => service.calculateSavings());

    expect(err).toBeInstanceOf(ServiceError);
    expect(err).toMatchObject({
      code: "SAVINGS_INPUT_UNAVAILABLE",
      message: "Could not read card AMEX/amex_gold: bank offline",
    });
  });

  it("does not ask for liked tracks that are worth nothing", async () => {
    const { service, likedTracksSince } = createHarness({
      apps: {
        ...SAVINGS_APPS_CONFIG,
        savingsSweep: { ...SAVINGS_APPS_CONFIG.savingsSweep, perLikedTrackMinorUnits: 0 },
      },
    });

    await service.calculateSavings();

    expect(likedTracksSince).not.toHaveBeenCalled();
  });

  it("is not configured without a savings sweep", async () => {
    const { service } = createHarness();

    await expect(service.calculateSavings()).rejects.toMatchObject({ code: "NOT_CONFIGURED" });
    await expect(service.runSavingsSweep()).rejects.toMatchObject({ code: "NOT_CONFIGURED" });
  });
});

describe("savings sweep run", () => {
  it("deposits the amount under the window key", async () => {
    const { service, transfer } = withActivity(createHarness({ apps: SAVINGS_APPS_CONFIG }));

    const result = await service.runSavingsSweep();

    expect(result).toMatchObject({
      outcome: "executed",
      record: { idempotencyKey: FIRST_KEY, status: "committed", amountMinorUnits: 5464 },
      calculation: { totalMinorUnits: 5464 },
    });
    expect(transfer).toHaveBeenCalledWith({
      sourceRef: "acc_current",
      destinationRef: "pot_savings",
      direction: "deposit",
      amountMinorUnits: 5464,
      clientIdempotencyKey: FIRST_KEY,
    });
  });

  it("opens the next window at the committed sweep", async () => {
    const { service, transfer, listTransactions } = withActivity(createHarness({ apps: SAVINGS_APPS_CONFIG }));
    await service.runSavingsSweep();

    const result = await service.runSavingsSweep();

    expect(result).toMatchObject({
      outcome: "executed",
      record: { idempotencyKey: "sweep:pot_savings:1772398800000" },
    });
    expect(listTransactions).toHaveBeenLastCalledWith("acc_current", NOW);
    expect(transfer).toHaveBeenCalledTimes(2);
  });

  it("skips a window whose sweep is still in flight", async () => {
    const { service, transfer } = withActivity(createHarness({ apps: SAVINGS_APPS_CONFIG }));
    service.ledger.reserve({
      idempotencyKey: FIRST_KEY,
      sourceAccountRef: "acc_current",
      destinationPotOrAccountRef: "pot_savings",
      direction: "deposit",
      amountMinorUnits: 300,
      currency: "GBP",
      reason: "Auto-save sweep since 2026-02-28T21:00:00.000Z",
      createdAt: "2026-03-01T20:59:00.000Z",
    });

    const result = await service.runSavingsSweep();

    expect(result).toMatchObject({ outcome: "skipped", reason: "Sweep already reserved" });
    expect(transfer).not.toHaveBeenCalled();
  });

  it("skips when there is nothing to save", async () => {
    const { service, transfer } = createHarness({
      apps: {
        ...SAVINGS_APPS_CONFIG,
        savingsSweep: { potId: "pot_savings", fundingAccountId: "acc_current" },
      },
    });

    const result = await service.runSavingsSweep();

    expect(result).toMatchObject({ outcome: "skipped", reason: "Nothing to save", calculation: { totalMinorUnits: 0 } });
    expect(transfer).not.toHaveBeenCalled();
  });
});
