/**
 * Tests for the Monzo client.
 */

import { describe, it, expect } from "vitest";
import { TransferApiError } from "@potkeeper/mover";
import type { TransferRequest } from "@potkeeper/mover";
import { MonzoClient, MonzoError } from "../src/monzo.js";
import { CredentialError } from "../src/types.js";
import { catchError, mockFetch, requestAt, staticCredentials } from "./helpers.js";
import type { MockReply } from "./helpers.js";

const BASE = "https://api.monzo.test";

const DEPOSIT: TransferRequest = {
  sourceRef: "acc_current",
  destinationRef: "pot_cc",
  direction: "deposit",
  amountMinorUnits: 2345,
  clientIdempotencyKey: "pot:MONZO:pot_cc:20260301:0",
};

function createClient(replies: readonly MockReply[], credentials = staticCredentials()) {
  const fetchFn = mockFetch(replies);
  const client = new MonzoClient({ baseUrl: BASE, fetchFn, credentials });
  return { client, fetchFn, credentials };
}

// =============================================================================
// Transfers
// =============================================================================

describe("MonzoClient.transfer", () => {
  it("deposits into a pot with the ledger key as dedupe id", async () => {
    const { client, fetchFn, credentials } = createClient([{ body: { id: "pot_cc", balance: 12345 } }]);

    const result = await client.transfer(DEPOSIT);

    expect(result).toEqual({});
    const request = requestAt(fetchFn, 0);
    expect(request.method).toBe("PUT");
    expect(request.url).toBe("https://api.monzo.test/pots/pot_cc/deposit");
    expect(request.body).toBe(
      "source_account_id=acc_current&amount=2345&dedupe_id=pot%3AMONZO%3Apot_cc%3A20260301%3A0",
    );
    expect(request.headers.get("authorization")).toBe("Bearer test-secret");
    expect(credentials.accessToken).toHaveBeenCalledWith("monzo", "default");
  });

  it("withdraws from a pot into the destination account", async () => {
    const { client, fetchFn } = createClient([{ body: {} }]);

    await client.transfer({
      sourceRef: "pot_cc",
      destinationRef: "acc_current",
      direction: "withdraw",
      amountMinorUnits: 500,
      clientIdempotencyKey: "k1",
    });

    const request = requestAt(fetchFn, 0);
    expect(request.url).toBe("https://api.monzo.test/pots/pot_cc/withdraw");
    expect(request.body).toBe("destination_account_id=acc_current&amount=500&dedupe_id=k1");
  });

  it("reports a 4xx as a rejection with the API's reason", async () => {
    const { client } = createClient([
      { status: 400, body: { code: "bad_request.insufficient_funds", message: "Insufficient funds" } },
    ]);

    const err = await catchError(() => client.transfer(DEPOSIT));

    expect(err).toBeInstanceOf(TransferApiError);
    expect(err).toMatchObject({
      kind: "rejected",
      status: 400,
      message:
        "HTTP 400 from PUT https://api.monzo.test/pots/pot_cc/deposit: bad_request.insufficient_funds Insufficient funds",
    });
  });

  it("reports 429 as rate limited", async () => {
    const { client } = createClient([{ status: 429, body: {} }]);

    await expect(client.transfer(DEPOSIT)).rejects.toMatchObject({ kind: "rate_limited", status: 429 });
  });

  it("reports 5xx as ambiguous without retrying", async () => {
    const { client, fetchFn } = createClient([{ status: 503, body: {} }]);

    await expect(client.transfer(DEPOSIT)).rejects.toMatchObject({ kind: "ambiguous", status: 503 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("reports network errors as ambiguous", async () => {
    const { client } = createClient([{ error: new TypeError("socket hang up") }]);

    await expect(client.transfer(DEPOSIT)).rejects.toMatchObject({
      kind: "ambiguous",
      message: "socket hang up",
    });
  });

  it("rejects without calling the API when credentials are missing", async () => {
    const credentials = staticCredentials();
    credentials.accessToken.mockRejectedValue(new CredentialError("MISSING_CREDENTIALS", "no file"));
    const { client, fetchFn } = createClient([], credentials);

    await expect(client.transfer(DEPOSIT)).rejects.toMatchObject({ kind: "rejected" });
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

// =============================================================================
// Pots
// =============================================================================

describe("MonzoClient pots", () => {
  const POTS = {
    pots: [
      { id: "pot_cc", name: "Credit Cards", balance: 10000, currency: "GBP", deleted: false },
      { id: "pot_old", name: "Old", balance: 0, currency: "GBP", deleted: true },
      { id: "pot_savings", name: "Savings", balance: 250, currency: "GBP" },
    ],
  };

  it("lists the live pots of an account", async () => {
    const { client, fetchFn } = createClient([{ body: POTS }]);

    const pots = await client.listPots("acc_current");

    expect(pots).toEqual([
      { potId: "pot_cc", name: "Credit Cards", balanceMinorUnits: 10000, currency: "GBP" },
      { potId: "pot_savings", name: "Savings", balanceMinorUnits: 250, currency: "GBP" },
    ]);
    expect(requestAt(fetchFn, 0).url).toBe("https://api.monzo.test/pots?current_account_id=acc_current");
  });

  it("finds a pot by id", async () => {
    const { client } = createClient([{ body: POTS }]);

    expect((await client.getPot("acc_current", "pot_savings")).balanceMinorUnits).toBe(250);
  });

  it("throws when the pot does not exist", async () => {
    const { client } = createClient([{ body: POTS }]);

    const err = await catchError(() => client.getPot("acc_current", "pot_old"));

    expect(err).toBeInstanceOf(MonzoError);
    expect(err).toMatchObject({ code: "POT_NOT_FOUND" });
  });

  it("rejects malformed pot lists", async () => {
    const { client } = createClient([{ body: { pots: [{ id: "pot_cc" }] } }]);

    await expect(client.listPots("acc_current")).rejects.toMatchObject({ code: "INVALID_RESPONSE" });
  });
});

describe("MonzoClient transactions", () => {
  it("lists transactions since a time, leaving out declined ones", async () => {
    const { client, fetchFn } = createClient([
      {
        body: {
          transactions: [
            { id: "tx_1", amount: -1234, description: "CORNER SHOP", created: "2026-03-01T09:00:00.000Z" },
            {
              id: "tx_2",
              amount: -999,
              description: "ONLINE STORE",
              created: "2026-03-01T10:00:00.000Z",
              decline_reason: "INSUFFICIENT_FUNDS",
            },
            { id: "tx_3", amount: 250000, description: "Salary", created: "2026-03-01T11:00:00.000Z" },
          ],
        },
      },
    ]);

    const transactions = await client.listTransactions("acc_current", new Date("2026-02-28T21:00:00.000Z"));

    expect(transactions).toEqual([
      { description: "CORNER SHOP", amountMinorUnits: -1234 },
      { description: "Salary", amountMinorUnits: 250000 },
    ]);
    expect(requestAt(fetchFn, 0).url).toBe(
      "https://api.monzo.test/transactions?account_id=acc_current&since=2026-02-28T21%3A00%3A00.000Z",
    );
  });

  it("rejects malformed transaction responses", async () => {
    const { client } = createClient([{ body: { transactions: [{ id: "tx_1" }] } }]);

    await expect(
      client.listTransactions("acc_current", new Date("2026-02-28T21:00:00.000Z")),
    ).rejects.toMatchObject({ code: "INVALID_RESPONSE" });
  });
});
