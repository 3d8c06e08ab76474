/**
 * Tests for the PotManager.
 *
 * Covers:
 * - Top-ups and withdrawals against fixed and dynamic targets
 * - Thresholds and funding caps
 * - Snapshot validation
 * - Idempotency across repeated reconciliation
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { TransferLedger } from "@potkeeper/ledger";
import type { Pot, TransferIntent } from "@potkeeper/types";
import { PotManager } from "../src/pot-manager.js";
import { PotManagerError } from "../src/types.js";
import type { ReconcileOptions } from "../src/types.js";
import { NOW, createLedger, silentLogger, snapshot } from "./helpers.js";

const POT: Pot = {
  potId: "pot_cc",
  bankRef: "MONZO",
  purpose: "credit card",
  targetBalanceMinorUnits: 12345,
};

const OPTIONS: ReconcileOptions = { fundingAccountRef: "acc_current" };
const KEY = "pot:MONZO:pot_cc:20260301:0";

describe("PotManager", () => {
  let ledger: TransferLedger;
  let manager: PotManager;

  beforeEach(() => {
    ledger = createLedger();
    manager = new PotManager({ history: ledger, logger: silentLogger, now: () => NOW });
  });

  // ─── Direction ─────────────────────────────────────────────────────────

  describe("transfers", () => {
    it("tops up to the fixed target", () => {
      const intent = manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS);

      expect(intent).toEqual({
        idempotencyKey: KEY,
        sourceAccountRef: "acc_current",
        destinationPotOrAccountRef: "pot_cc",
        direction: "deposit",
        amountMinorUnits: 2345,
        currency: "GBP",
        reason: "Top up credit card pot to 123.45",
        createdAt: "2026-03-01T21:00:00.000Z",
      });
    });

    it("uses the account group balance as a dynamic target", () => {
      const intent = manager.reconcile(POT, snapshot("pot", 10000), snapshot("credit_cards", 52000), OPTIONS);

      expect(intent?.amountMinorUnits).toBe(42000);
    });

    it("withdraws a surplus back to the funding account", () => {
      const intent = manager.reconcile(POT, snapshot("pot", 15000), undefined, OPTIONS);

      expect(intent).toMatchObject({
        sourceAccountRef: "pot_cc",
        destinationPotOrAccountRef: "acc_current",
        direction: "withdraw",
        amountMinorUnits: 2655,
        reason: "Return credit card pot surplus above 123.45",
      });
    });

    it("does not withdraw when withdrawals are disabled", () => {
      const intent = manager.reconcile(POT, snapshot("pot", 15000), undefined, {
        ...OPTIONS,
        allowWithdrawals: false,
      });

      expect(intent).toBeNull();
    });

    it("does nothing without a target", () => {
      const intent = manager.reconcile(
        { ...POT, targetBalanceMinorUnits: null },
        snapshot("pot", 10000),
        undefined,
        OPTIONS,
      );

      expect(intent).toBeNull();
    });

    it("does nothing at the target", () => {
      expect(manager.reconcile(POT, snapshot("pot", 12345), undefined, OPTIONS)).toBeNull();
    });

    it("ignores differences below the threshold", () => {
      const options = { ...OPTIONS, minDeltaMinorUnits: 5000 };

      expect(manager.reconcile(POT, snapshot("pot", 10000), undefined, options)).toBeNull();
      expect(manager.reconcile(POT, snapshot("pot", 7345), undefined, options)?.amountMinorUnits).toBe(5000);
    });
  });

  // ─── Funding ───────────────────────────────────────────────────────────

  describe("funding cap", () => {
    it("caps a top-up at the funding balance above the minimum remainder", () => {
      const intent = manager.reconcile(POT, snapshot("pot", 10000), undefined, {
        ...OPTIONS,
        fundingBalance: snapshot("current_account", 5000),
        minFundingRemainderMinorUnits: 4000,
      });

      expect(intent?.amountMinorUnits).toBe(1000);
    });

    it("proposes nothing when the funding account is at its remainder", () => {
      const intent = manager.reconcile(POT, snapshot("pot", 10000), undefined, {
        ...OPTIONS,
        fundingBalance: snapshot("current_account", 3000),
        minFundingRemainderMinorUnits: 4000,
      });

      expect(intent).toBeNull();
    });

    it("does not cap withdrawals", () => {
      const intent = manager.reconcile(POT, snapshot("pot", 15000), undefined, {
        ...OPTIONS,
        fundingBalance: snapshot("current_account", 0),
      });

      expect(intent?.amountMinorUnits).toBe(2655);
    });
  });

  // ─── Snapshot validation ───────────────────────────────────────────────

  describe("snapshot validation", () => {
    it("ignores stale snapshots", () => {
      expect(
        manager.reconcile(POT, snapshot("pot", 10000, { stale: true }), undefined, OPTIONS),
      ).toBeNull();
      expect(
        manager.reconcile(POT, snapshot("pot", 10000), snapshot("credit_cards", 52000, { stale: true }), OPTIONS),
      ).toBeNull();
    });

    it("ignores snapshots older than the maximum age", () => {
      const old = snapshot("pot", 10000, { observedAt: "2026-03-01T19:59:59.000Z" });

      expect(manager.reconcile(POT, old, undefined, OPTIONS)).toBeNull();
      expect(
        manager.reconcile(POT, old, undefined, { ...OPTIONS, maxSnapshotAgeMs: 2 * 60 * 60 * 1000 }),
      ).not.toBeNull();
    });

    it("treats an unreadable observation time as too old", () => {
      const unreadable = snapshot("pot", 10000, { observedAt: "not a date" });

      expect(manager.reconcile(POT, unreadable, undefined, OPTIONS)).toBeNull();
    });

    it("rejects snapshots in different currencies", () => {
      expect(() =>
        manager.reconcile(POT, snapshot("pot", 10000), snapshot("cards", 100, { currency: "EUR" }), OPTIONS),
      ).toThrow(PotManagerError);
    });
  });

  // ─── Idempotency ───────────────────────────────────────────────────────

  describe("idempotency", () => {
    function executeAndCommit(intent: TransferIntent | null): void {
      if (intent === null) {
        throw new Error("expected an intent");
      }
      ledger.reserve(intent);
      ledger.commit(intent.idempotencyKey, "tx_1");
    }

    it("proposes the same key for the same state", () => {
      const first = manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS);
      const second = manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS);

      expect(second).toEqual(first);
    });

    it("proposes nothing for an unchanged snapshot after the transfer committed", () => {
      executeAndCommit(manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS));

      expect(manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS)).toBeNull();
    });

    it("uses the next sequence number once a fresh balance arrives", () => {
      executeAndCommit(manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS));

      const fresh = snapshot("pot", 12000, { observedAt: "2026-03-01T21:00:30.000Z" });
      const intent = manager.reconcile(POT, fresh, undefined, OPTIONS);

      expect(intent?.idempotencyKey).toBe("pot:MONZO:pot_cc:20260301:1");
      expect(intent?.amountMinorUnits).toBe(345);
    });

    it("reuses the key of a failed transfer", () => {
      const intent = manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS);
      if (intent === null) throw new Error("expected an intent");
      ledger.reserve(intent);
      ledger.fail(KEY, "insufficient_funds");

      expect(manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS)?.idempotencyKey).toBe(KEY);
    });

    it("waits while a transfer is in flight", () => {
      const intent = manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS);
      if (intent === null) throw new Error("expected an intent");
      ledger.reserve(intent);

      expect(manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS)).toBeNull();
    });

    it("leaves a pot with an abandoned transfer alone", () => {
      const intent = manager.reconcile(POT, snapshot("pot", 10000), undefined, OPTIONS);
      if (intent === null) throw new Error("expected an intent");
      ledger.reserve(intent);
      ledger.abandon(KEY, "timeout");

      const fresh = snapshot("pot", 10000, { observedAt: "2026-03-01T21:00:30.000Z" });
      expect(manager.reconcile(POT, fresh, undefined, OPTIONS)).toBeNull();
    });
  });
});
