/**
 * Tests for transfer alerts and notification delivery.
 */

import { describe, it, expect, vi } from "vitest";
import type { Mock } from "vitest";
import type { Notifier } from "@potkeeper/clients";
import type { TransferRecord } from "@potkeeper/types";
import { formatAmount, NotificationService, transferAlert } from "../src/services/notifications.js";
import { NOW, POT_KEY, silentLogger } from "./setup.js";

function record(overrides: Partial<TransferRecord>): TransferRecord {
  return {
    idempotencyKey: POT_KEY,
    status: "committed",
    attempts: 1,
    lastError: null,
    amountMinorUnits: 2345,
    intent: {
      idempotencyKey: POT_KEY,
      sourceAccountRef: "acc_current",
      destinationPotOrAccountRef: "pot_cc",
      direction: "deposit",
      amountMinorUnits: 2345,
      currency: "GBP",
      reason: "Top up credit card pot",
      createdAt: NOW.toISOString(),
    },
    fingerprint: "f".repeat(64),
    reservedAt: NOW.toISOString(),
    updatedAt: NOW.toISOString(),
    ...overrides,
  };
}

function fakeNotifier(): {
  notifier: Notifier;
  notify: Mock<Notifier["notify"]>;
  alert: Mock<Notifier["alert"]>;
} {
  const notify = vi.fn<Notifier["notify"]>().mockResolvedValue(undefined);
  const alert = vi.fn<Notifier["alert"]>().mockResolvedValue(undefined);
  return { notifier: { notify, alert }, notify, alert };
}

describe("formatAmount", () => {
  it("formats minor units with the currency", () => {
    expect(formatAmount(2345, "GBP")).toBe("23.45 GBP");
    expect(formatAmount(5, "GBP")).toBe("0.05 GBP");
  });
});

describe("transferAlert", () => {
  it("describes a failed transfer", () => {
    expect(transferAlert(record({ status: "failed", lastError: "insufficient funds" }))).toEqual({
      notificationId: "potkeeper_transfer_pot_monzo_pot_cc_20260301_0",
      title: "Transfer failed",
      message: "Top up credit card pot (23.45 GBP) was not made: insufficient funds",
    });
  });

  it("asks for review of an abandoned transfer", () => {
    const alert = transferAlert(record({ status: "abandoned", attempts: 3, lastError: "timeout" }));

    expect(alert?.title).toBe("Transfer needs review");
    expect(alert?.message).toBe(
      "Top up credit card pot (23.45 GBP) may or may not have gone through after 3 attempts: timeout. " +
        `Check the bank, then resolve ${POT_KEY}.`,
    );
  });

  it("stays quiet for committed transfers", () => {
    expect(transferAlert(record({}))).toBeNull();
  });
});

describe("NotificationService", () => {
  it("raises an alert for an expired token", async () => {
    const { notifier, alert } = fakeNotifier();
    const service = new NotificationService({ notifier, logger: silentLogger });

    await service.tokenExpired("STARLING_JOINT");

    expect(alert).toHaveBeenCalledWith({
      notificationId: "truelayer_access_token_starling_joint_expired",
      title: "Access token expired",
      message: "TrueLayer access token for STARLING_JOINT has expired!",
    });
  });

  it("resolves when delivery fails", async () => {
    const { notifier, notify } = fakeNotifier();
    notify.mockRejectedValue(new Error("HTTP 502"));
    const service = new NotificationService({ notifier, logger: silentLogger });

    await expect(service.notify({ title: "t", message: "m" })).resolves.toBeUndefined();
  });

  it("does nothing without a notifier", async () => {
    const service = new NotificationService({ logger: silentLogger });

    await expect(service.transferOutcome(record({ status: "failed" }))).resolves.toBeUndefined();
  });
});
