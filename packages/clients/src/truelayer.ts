/**
 * TrueLayer Account Source: Balances and card transactions from the
 * TrueLayer Data API v1.
 *
 * Each bank has its own access token, read from the credential provider
 * under `truelayer/<bank>`.
 */

import { AccountSourceError } from "@potkeeper/balances";
import type { AccountSource, MemberBalance } from "@potkeeper/balances";
import type { SavingsTransaction } from "@potkeeper/automation";
import { toMinorUnits } from "@potkeeper/ledger";
import type { AccountMember, BankRef } from "@potkeeper/types";
import { z } from "zod";
import { HttpClient } from "./http-client.js";
import { ApiError, CredentialError } from "./types.js";
import type { CredentialProvider, HttpClientConfig } from "./types.js";

export const TRUELAYER_CREDENTIALS = "truelayer";
export const TRUELAYER_RETRIES = 3;

const BalanceResponseSchema = z.object({
  results: z
    .array(
      z.object({
        current: z.union([z.number(), z.string()]),
        currency: z.string().min(1),
        update_timestamp: z.string().refine((s) => !Number.isNaN(Date.parse(s)), "invalid timestamp"),
      }),
    )
    .min(1),
});

const TransactionsResponseSchema = z.object({
  results: z.array(
    z.object({
      amount: z.union([z.number(), z.string()]),
      description: z.string(),
    }),
  ),
});

export interface TrueLayerAccountSourceOptions extends Omit<HttpClientConfig, "retries"> {
  readonly credentials: CredentialProvider;
}

export function balancePath(member: AccountMember): string {
  const collection = member.kind === "card" ? "cards" : "accounts";
  return `/data/v1/${collection}/${encodeURIComponent(member.id)}/balance`;
}

function toSourceError(err: unknown, bankRef: BankRef, member: AccountMember): AccountSourceError {
  const where = `${bankRef} ${member.kind} ${member.id}`;
  if (err instanceof CredentialError) {
    return new AccountSourceError("unauthorized", `${where}: ${err.message}`);
  }
  if (err instanceof ApiError) {
    switch (err.code) {
      case "UNAUTHORIZED":
        return new AccountSourceError("unauthorized", `${where}: ${err.message}`);
      case "RATE_LIMITED":
        return new AccountSourceError("rate_limited", `${where}: ${err.message}`);
      default:
        return new AccountSourceError("unavailable", `${where}: ${err.message}`);
    }
  }
  return new AccountSourceError(
    "unavailable",
    `${where}: ${err instanceof Error ? err.message : String(err)}`,
  );
}

export class TrueLayerAccountSource implements AccountSource {
  private readonly http: HttpClient;
  private readonly credentials: CredentialProvider;

  constructor(options: TrueLayerAccountSourceOptions) {
    const { credentials, ...httpConfig } = options;
    this.http = new HttpClient({ ...httpConfig, retries: TRUELAYER_RETRIES });
    this.credentials = credentials;
  }

  /**
   * @throws AccountSourceError for every failure
   */
  async fetchBalance(bankRef: BankRef, member: AccountMember): Promise<MemberBalance> {
    try {
      const token = await this.credentials.accessToken(TRUELAYER_CREDENTIALS, bankRef);
      const response = await this.http.get(balancePath(member), { token });

      const parsed = BalanceResponseSchema.safeParse(response.body);
      if (!parsed.success) {
        throw new ApiError("INVALID_RESPONSE", `Unexpected balance response: ${parsed.error.message}`, response.status);
      }

      const [result] = parsed.data.results;
      if (result === undefined) {
        throw new ApiError("INVALID_RESPONSE", "Balance response has no results", response.status);
      }

      return {
        amountMinorUnits: toMinorUnits(result.current),
        currency: result.currency,
        asOf: new Date(result.update_timestamp).toISOString(),
      };
    } catch (err: unknown) {
      throw toSourceError(err, bankRef, member);
    }
  }

  /**
   * Card transactions between two times, signed as the account sees
   * them: card purchases come back positive and are negated.
   *
   * @throws AccountSourceError for every failure
   */
  async cardTransactions(
    bankRef: BankRef,
    cardId: string,
    from: Date,
    to: Date,
  ): Promise<readonly SavingsTransaction[]> {
    const member: AccountMember = { kind: "card", id: cardId };
    try {
      const token = await this.credentials.accessToken(TRUELAYER_CREDENTIALS, bankRef);
      const query = new URLSearchParams({ from: from.toISOString(), to: to.toISOString() });
      const response = await this.http.get(
        `/data/v1/cards/${encodeURIComponent(cardId)}/transactions?${query.toString()}`,
        { token },
      );

      const parsed = TransactionsResponseSchema.safeParse(response.body);
      if (!parsed.success) {
        throw new ApiError(
          "INVALID_RESPONSE",
          `Unexpected transactions response: ${parsed.error.message}`,
          response.status,
        );
      }

      return parsed.data.results.map((tx) => ({
        description: tx.description,
        amountMinorUnits: -toMinorUnits(tx.amount),
      }));
    } catch (err: unknown) {
      throw toSourceError(err, bankRef, member);
    }
  }
}
