/**
 * Monzo Client: Pot transfers, pot balances and account transactions.
 *
 * Transfers are sent once per call; the money mover owns retries, and
 * the ledger key is passed as Monzo's `dedupe_id` so a repeated call
 * under the same key never moves money twice.
 */

import { TransferApiError } from "@potkeeper/mover";
import type { TransferApi, TransferRequest, TransferResult } from "@potkeeper/mover";
import type { SavingsTransaction } from "@potkeeper/automation";
import type { Currency } from "@potkeeper/types";
import { z } from "zod";
import { HttpClient } from "./http-client.js";
import { ApiError, CredentialError } from "./types.js";
import type { CredentialProvider, HttpClientConfig } from "./types.js";

export const MONZO_CREDENTIALS = "monzo";

const PotsResponseSchema = z.object({
  pots: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      balance: z.number().int(),
      currency: z.string(),
      deleted: z.boolean().default(false),
    }),
  ),
});

const TransactionsResponseSchema = z.object({
  transactions: z.array(
    z.object({
      id: z.string(),
      amount: z.number().int(),
      description: z.string(),
      created: z.string(),
      decline_reason: z.string().optional(),
    }),
  ),
});

export interface MonzoPot {
  readonly potId: string;
  readonly name: string;
  readonly balanceMinorUnits: number;
  readonly currency: Currency;
}

export interface MonzoClientOptions extends Omit<HttpClientConfig, "retries"> {
  readonly credentials: CredentialProvider;
  /** Credential file name under `monzo/`. Default: "default" */
  readonly credentialName?: string | undefined;
}

export type MonzoErrorCode = "POT_NOT_FOUND";

export class MonzoError extends Error {
  public readonly code: MonzoErrorCode;

  constructor(code: MonzoErrorCode, message: string) {
    super(message);
    this.name = "MonzoError";
    this.code = code;
  }
}

function toTransferError(err: unknown): TransferApiError {
  if (err instanceof CredentialError) {
    // Nothing was sent
    return new TransferApiError("rejected", err.message);
  }
  if (err instanceof ApiError) {
    switch (err.code) {
      case "RATE_LIMITED":
        return new TransferApiError("rate_limited", err.message, err.statusCode);
      case "UNAUTHORIZED":
      case "CLIENT_ERROR":
        return new TransferApiError("rejected", describeRejection(err), err.statusCode);
      default:
        return new TransferApiError("ambiguous", err.message, err.statusCode);
    }
  }
  return new TransferApiError("ambiguous", err instanceof Error ? err.message : String(err));
}

const RejectionSchema = z.object({ code: z.string().optional(), message: z.string().optional() });

function describeRejection(err: ApiError): string {
  const parsed = RejectionSchema.safeParse(err.details);
  if (!parsed.success) {
    return err.message;
  }
  const parts = [parsed.data.code, parsed.data.message].filter((p): p is string => p !== undefined);
  return parts.length > 0 ? `${err.message}: ${parts.join(" ")}` : err.message;
}

export class MonzoClient implements TransferApi {
  private readonly http: HttpClient;
  private readonly credentials: CredentialProvider;
  private readonly credentialName: string;

  constructor(options: MonzoClientOptions) {
    const { credentials, credentialName, ...httpConfig } = options;
    this.http = new HttpClient({ ...httpConfig, retries: 0 });
    this.credentials = credentials;
    this.credentialName = credentialName ?? "default";
  }

  /**
   * Deposit into or withdraw from a pot.
   *
   * @throws TransferApiError classifying every failure
   */
  async transfer(request: TransferRequest): Promise<TransferResult> {
    const amount = String(request.amountMinorUnits);
    const dedupeId = request.clientIdempotencyKey;
    let path: string;
    let form: Record<string, string>;
    if (request.direction === "deposit") {
      path = `/pots/${encodeURIComponent(request.destinationRef)}/deposit`;
      form = { source_account_id: request.sourceRef, amount, dedupe_id: dedupeId };
    } else {
      path = `/pots/${encodeURIComponent(request.sourceRef)}/withdraw`;
      form = { destination_account_id: request.destinationRef, amount, dedupe_id: dedupeId };
    }

    try {
      const token = await this.credentials.accessToken(MONZO_CREDENTIALS, this.credentialName);
      await this.http.put(path, { token, form });
      return {};
    } catch (err: unknown) {
      throw toTransferError(err);
    }
  }

  /**
   * Pots of a current account, deleted pots excluded.
   *
   * @throws ApiError or CredentialError
   */
  async listPots(currentAccountId: string): Promise<readonly MonzoPot[]> {
    const token = await this.credentials.accessToken(MONZO_CREDENTIALS, this.credentialName);
    const response = await this.http.get(
      `/pots?current_account_id=${encodeURIComponent(currentAccountId)}`,
      { token },
    );

    const parsed = PotsResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new ApiError("INVALID_RESPONSE", `Unexpected pots response: ${parsed.error.message}`, response.status);
    }

    return parsed.data.pots
      .filter((pot) => !pot.deleted)
      .map((pot) => ({
        potId: pot.id,
        name: pot.name,
        balanceMinorUnits: pot.balance,
        currency: pot.currency,
      }));
  }

  /**
   * @throws MonzoError POT_NOT_FOUND if the account has no such pot
   */
  async getPot(currentAccountId: string, potId: string): Promise<MonzoPot> {
    const pot = (await this.listPots(currentAccountId)).find((p) => p.potId === potId);
    if (pot === undefined) {
      throw new MonzoError("POT_NOT_FOUND", `Pot ${potId} not found for account ${currentAccountId}`);
    }
    return pot;
  }

  /**
   * Settled and pending transactions of an account since a time, as the
   * account sees them (spends negative). Declined transactions are left out.
   *
   * @throws ApiError or CredentialError
   */
  async listTransactions(accountId: string, since: Date): Promise<readonly SavingsTransaction[]> {
    const token = await this.credentials.accessToken(MONZO_CREDENTIALS, this.credentialName);
    const query = new URLSearchParams({ account_id: accountId, since: since.toISOString() });
    const response = await this.http.get(`/transactions?${query.toString()}`, { token });

    const parsed = TransactionsResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new ApiError(
        "INVALID_RESPONSE",
        `Unexpected transactions response: ${parsed.error.message}`,
        response.status,
      );
    }

    return parsed.data.transactions
      .filter((tx) => tx.decline_reason === undefined)
      .map((tx) => ({ description: tx.description, amountMinorUnits: tx.amount }));
  }
}
