/**
 * @potkeeper/ledger: Deterministic monetary arithmetic.
 *
 * Amounts travel as integer minor units (pence). Decimal amounts from
 * external APIs are converted through their string form with bigint
 * scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Results must stay within Number.MAX_SAFE_INTEGER
 * - Amounts must be valid decimal strings
 */

import { TransferLedgerError } from "./types.js";

/** Decimal places of the minor unit for the currencies handled here. */
export const DEFAULT_DECIMALS = 2;

// ─── Internal Helpers ────────────────────────────────────────────────────

function toSafeNumber(value: bigint, source: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new TransferLedgerError(
      "INVALID_AMOUNT",
      `Amount ${source} exceeds the safe integer range`,
    );
  }
  return Number(value);
}

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "-50.2" with decimals=2 → -5020n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  // Optional minus, digits, optional decimal point + digits
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new TransferLedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new TransferLedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Convert a major-unit amount into integer minor units.
 *
 * Numbers are accepted because JSON APIs return them, but they are
 * converted through their shortest decimal representation, never
 * multiplied.
 *
 * toMinorUnits("1234.56") → 123456
 * toMinorUnits(12.3)      → 1230
 */
export function toMinorUnits(amount: string | number, decimals = DEFAULT_DECIMALS): number {
  let text: string;
  if (typeof amount === "number") {
    if (!Number.isFinite(amount)) {
      throw new TransferLedgerError("INVALID_AMOUNT", `Invalid amount: ${String(amount)}`);
    }
    text = String(amount);
  } else {
    text = amount;
  }
  return toSafeNumber(parseAmount(text, decimals), `"${text}"`);
}

/**
 * Format integer minor units as a decimal string.
 *
 * 10050 → "100.50"
 * -5 → "-0.05"
 */
export function formatMinorUnits(minorUnits: number, decimals = DEFAULT_DECIMALS): string {
  assertMinorUnits(minorUnits);
  if (decimals === 0) {
    return String(minorUnits);
  }

  const negative = minorUnits < 0;
  const str = String(Math.abs(minorUnits)).padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
  return negative ? `-${result}` : result;
}

/**
 * Sum minor-unit amounts with overflow detection.
 */
export function sumMinorUnits(values: readonly number[]): number {
  let total = 0n;
  for (const value of values) {
    assertMinorUnits(value);
    total += BigInt(value);
  }
  return toSafeNumber(total, "sum");
}

/**
 * Assert a value is an integer amount of minor units.
 */
export function assertMinorUnits(value: number, label = "amount"): void {
  if (!Number.isSafeInteger(value)) {
    throw new TransferLedgerError(
      "INVALID_AMOUNT",
      `${label} must be a safe integer of minor units, got ${String(value)}`,
    );
  }
}
