/**
 * @potkeeper/mover: Backoff schedule and transient-failure retries.
 *
 * The money mover drives its own attempt loop (each attempt is
 * recorded in the ledger) and only borrows the delay schedule. The
 * HTTP clients use `retryTransient` for reads.
 */

export interface RetryConfig {
  /** Attempts including the first one */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  /** Upper bound of the random delay added to each wait */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 200,
};

export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait before retry number `retry` (0 = first retry):
 * `min(base * 2^retry + jitter, max)`.
 */
export function backoffDelay(
  retry: number,
  config: RetryConfig,
  random: () => number = Math.random,
): number {
  const jitter = random() * config.jitterMs;
  return Math.min(config.baseDelayMs * 2 ** retry + jitter, config.maxDelayMs);
}

export interface RetryTransientOptions {
  readonly config: RetryConfig;
  /** Failures outside this predicate are rethrown at once */
  readonly isTransient: (err: unknown) => boolean;
  readonly sleepFn?: SleepFn | undefined;
  readonly onRetry?: ((err: unknown, retry: number, delayMs: number) => void) | undefined;
}

/**
 * Run `fn`, repeating it after transient failures. When the attempts
 * run out the last failure is rethrown as it was.
 */
export async function retryTransient<T>(fn: () => Promise<T>, options: RetryTransientOptions): Promise<T> {
  const { config, isTransient, onRetry } = options;
  const sleepFn = options.sleepFn ?? sleep;

  for (let retry = 0; ; retry++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!isTransient(err) || retry >= config.maxAttempts - 1) {
        throw err;
      }
      const delay = backoffDelay(retry, config);
      onRetry?.(err, retry, delay);
      await sleepFn(delay);
    }
  }
}
