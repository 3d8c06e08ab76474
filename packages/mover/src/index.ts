/**
 * @potkeeper/mover: Executes transfer intents exactly once.
 *
 * Every transfer is reserved in the ledger before the transfer API is
 * called and recorded as committed, failed or abandoned afterwards.
 *
 * @packageDocumentation
 */

export { MoneyMover } from "./money-mover.js";

export { TransferApiError, MoneyMoverError } from "./types.js";
export type {
  TransferApi,
  TransferRequest,
  TransferResult,
  TransferFailureKind,
  MoverLedger,
  MoneyMoverOptions,
  MoneyMoverErrorCode,
} from "./types.js";

export { backoffDelay, retryTransient, sleep, DEFAULT_RETRY_CONFIG } from "./retry.js";
export type { RetryConfig, RetryTransientOptions, SleepFn } from "./retry.js";
