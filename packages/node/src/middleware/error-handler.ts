/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps the codes of domain errors (TransferLedgerError,
 * BalanceAggregatorError, ServiceError, ...) to HTTP status codes.
 */

import type { Context } from "hono";
import type { Logger } from "pino";
import { errorEnvelope } from "../types/error.js";
import type { DomainErrorCode } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 409 | 422 | 500 | 503;

const STATUS_BY_CODE = {
  // Ledger
  DUPLICATE_INTENT: 409,
  INTENT_MISMATCH: 409,
  UNKNOWN_RECORD: 404,
  INVALID_TRANSITION: 409,
  INVALID_INTENT: 400,
  INVALID_AMOUNT: 400,

  // Event store
  CONCURRENCY_CONFLICT: 409,

  // Mover
  NOT_RESERVED: 409,

  // Balances
  UNKNOWN_BANK: 404,

  // Automation
  CURRENCY_MISMATCH: 422,
  INVALID_TRIGGER: 400,

  // Service
  NOT_CONFIGURED: 404,
  NO_PENDING_TOP_UP: 404,
  UNKNOWN_ACTION: 400,
  SAVINGS_INPUT_UNAVAILABLE: 503,
} as const satisfies Partial<Record<DomainErrorCode, ErrorStatus>>;

type MappedCode = keyof typeof STATUS_BY_CODE;

function isMappedCode(code: string): code is MappedCode {
  return Object.hasOwn(STATUS_BY_CODE, code);
}

function mappedCode(err: Error): MappedCode | undefined {
  if ("code" in err && typeof err.code === "string" && isMappedCode(err.code)) {
    return err.code;
  }
  return undefined;
}

export function statusFor(code: string | undefined): ErrorStatus {
  return code !== undefined && isMappedCode(code) ? STATUS_BY_CODE[code] : 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 *
 * Unmapped errors are logged and answered with a generic 500.
 */
export function createErrorHandler(logger: Logger): (err: Error, c: Context) => Response {
  return (err, c) => {
    const code = mappedCode(err);

    if (code === undefined) {
      logger.error({ err, path: c.req.path }, "Unhandled error");
      return c.json(errorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(errorEnvelope(code, err.message), STATUS_BY_CODE[code]);
  };
}
