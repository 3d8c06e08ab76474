/**
 * Money Mover: The only path by which money moves.
 *
 * Reserve → call the transfer API → commit | fail | abandon.
 *
 * Rules:
 * - No API call without a reservation under the intent's key
 * - The ledger key is passed to the API as its deduplication id
 * - A definitive rejection is never retried
 * - Ambiguous outcomes are retried with the same key, then abandoned
 *   for manual reconciliation
 */

import { TransferLedgerError } from "@potkeeper/ledger";
import type { TransferIntent, TransferRecord } from "@potkeeper/types";
import type { Logger } from "pino";
import { backoffDelay, DEFAULT_RETRY_CONFIG, sleep } from "./retry.js";
import type { RetryConfig, SleepFn } from "./retry.js";
import { MoneyMoverError, TransferApiError } from "./types.js";
import type {
  MoneyMoverOptions,
  MoverLedger,
  TransferApi,
  TransferFailureKind,
  TransferRequest,
  TransferResult,
} from "./types.js";

interface ClassifiedFailure {
  readonly kind: TransferFailureKind;
  readonly message: string;
}

type AttemptOutcome =
  | { readonly ok: true; readonly result: TransferResult }
  | { readonly ok: false; readonly failure: ClassifiedFailure };

/**
 * Anything that is not a TransferApiError is treated as ambiguous:
 * the call may have reached the bank.
 */
function classify(err: unknown): ClassifiedFailure {
  if (err instanceof TransferApiError) {
    return { kind: err.kind, message: err.message };
  }
  return {
    kind: "ambiguous",
    message: err instanceof Error ? err.message : String(err),
  };
}

function toRequest(intent: TransferIntent): TransferRequest {
  return {
    sourceRef: intent.sourceAccountRef,
    destinationRef: intent.destinationPotOrAccountRef,
    direction: intent.direction,
    amountMinorUnits: intent.amountMinorUnits,
    clientIdempotencyKey: intent.idempotencyKey,
  };
}

export class MoneyMover {
  private readonly ledger: MoverLedger;
  private readonly api: TransferApi;
  private readonly logger: Logger;
  private readonly retry: RetryConfig;
  private readonly sleepFn: SleepFn;

  constructor(options: MoneyMoverOptions) {
    this.ledger = options.ledger;
    this.api = options.api;
    this.logger = options.logger;
    const retry = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.retry = { ...retry, maxAttempts: Math.max(1, retry.maxAttempts) };
    this.sleepFn = options.sleepFn ?? sleep;
  }

  /**
   * Execute an intent at most once.
   *
   * A key that is already reserved or committed returns the existing
   * record without calling the transfer API.
   */
  async execute(intent: TransferIntent): Promise<TransferRecord> {
    let record: TransferRecord;
    try {
      record = this.ledger.reserve(intent);
    } catch (err: unknown) {
      if (err instanceof TransferLedgerError && err.code === "DUPLICATE_INTENT" && err.record !== undefined) {
        this.logger.info(
          { idempotencyKey: intent.idempotencyKey, status: err.record.status },
          "Transfer already recorded; not calling the transfer API",
        );
        return err.record;
      }
      throw err;
    }

    return this.drive(record);
  }

  /**
   * Re-drive a transfer left reserved (e.g. by a restart) under its
   * original key.
   */
  async resume(idempotencyKey: string): Promise<TransferRecord> {
    const record = this.ledger.get(idempotencyKey);
    if (record === undefined || record.status !== "reserved") {
      throw new MoneyMoverError(
        "NOT_RESERVED",
        `Transfer "${idempotencyKey}" is not reserved (status: ${record?.status ?? "none"})`,
      );
    }

    this.logger.info(
      { idempotencyKey, previousAttempts: record.attempts },
      "Resuming reserved transfer",
    );
    return this.drive(record);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async attempt(request: TransferRequest): Promise<AttemptOutcome> {
    try {
      return { ok: true, result: await this.api.transfer(request) };
    } catch (err: unknown) {
      return { ok: false, failure: classify(err) };
    }
  }

  private async drive(reserved: TransferRecord): Promise<TransferRecord> {
    const key = reserved.idempotencyKey;
    const log = this.logger.child({ idempotencyKey: key });
    const request = toRequest(reserved.intent);

    // Attempts made before a restart or an abandonment have unknown outcomes
    let sawAmbiguous = reserved.attempts > 0;
    let lastError = reserved.lastError ?? "unknown";

    for (let attempt = 0; attempt < this.retry.maxAttempts; attempt++) {
      const outcome = await this.attempt(request);
      if (outcome.ok) {
        const { transferId } = outcome.result;
        const committed = this.ledger.commit(key, transferId);
        log.info(
          { transferId, amountMinorUnits: request.amountMinorUnits, attempts: committed.attempts },
          "Transfer committed",
        );
        return committed;
      }

      const { failure } = outcome;

      if (failure.kind === "rejected") {
        const failed = this.ledger.fail(key, failure.message);
        log.error({ error: failure.message, attempts: failed.attempts }, "Transfer rejected");
        return failed;
      }

      if (failure.kind === "ambiguous") {
        sawAmbiguous = true;
      }
      lastError = failure.message;

      if (attempt === this.retry.maxAttempts - 1) {
        break;
      }

      this.ledger.recordAttempt(key, failure.message);
      const delay = backoffDelay(attempt, this.retry);
      log.warn(
        { kind: failure.kind, error: failure.message, attempt: attempt + 1, delayMs: Math.round(delay) },
        "Transfer attempt inconclusive; retrying",
      );
      await this.sleepFn(delay);
    }

    const message = `Retries exhausted after ${this.retry.maxAttempts} attempts`;

    if (!sawAmbiguous) {
      // Every attempt was refused with 429: the transfer never executed
      const failed = this.ledger.fail(key, `${message}: rate limited`);
      log.error({ attempts: failed.attempts }, "Transfer failed: rate limited on every attempt");
      return failed;
    }

    const abandoned = this.ledger.abandon(key, `${message}: ${lastError}`);
    log.error(
      { attempts: abandoned.attempts, lastError },
      "Transfer abandoned; manual reconciliation required",
    );
    return abandoned;
  }
}
