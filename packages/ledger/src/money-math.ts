/**
 * @clearledger/ledger — Deterministic monetary arithmetic.
 *
 * All balances are bigint values scaled by AMOUNT_DECIMALS.
 * Decimal strings are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be plain non-negative decimal strings ("100", "100.5")
 * - Trailing fractional zeros are insignificant ("1.00000" is 1)
 * - Significant digits beyond AMOUNT_DECIMALS are rejected, never rounded
 */

import { AccountActivityError } from "./types.js";

/** Fractional digits carried by every balance. */
export const AMOUNT_DECIMALS = 28;

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parse a non-negative decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=4 → 1005000n
 * "1.00000" with decimals=4 → 10000n
 *
 * Returns undefined when the string is not a plain decimal or carries
 * more significant fractional digits than `decimals` allows.
 */
export function parseAmount(amount: string, decimals: number = AMOUNT_DECIMALS): bigint | undefined {
  const trimmed = amount.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }

  const [intPart = "0", rawFrac = ""] = trimmed.split(".");
  const fracPart = rawFrac.replace(/0+$/, "");

  if (fracPart.length > decimals) {
    return undefined;
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Convert a scaled bigint back to a decimal string with exactly `decimals` places.
 *
 * 1005000n with decimals=4 → "100.5000"
 * -502500n with decimals=4 → "-50.2500"
 */
export function formatAmount(scaled: bigint, decimals: number = AMOUNT_DECIMALS): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Format a balance for output: trailing zeros are trimmed,
 * but at least one fractional digit is kept.
 *
 * 51 → "51.0", 1.2345 → "1.2345", 0 → "0.0"
 */
export function formatBalance(scaled: bigint): string {
  const fixed = formatAmount(scaled, AMOUNT_DECIMALS);
  return fixed.replace(/(\.\d*?)0+$/, "$1").replace(/\.$/, ".0");
}

/**
 * Amount validity predicate: zero or strictly positive, finite, and
 * representable at the ledger's precision. Negative values, including
 * negative zero, are invalid.
 */
export function isValidAmount(amount: string): boolean {
  return parseAmount(amount) !== undefined;
}

/**
 * Parse a transaction amount, rejecting anything outside the valid domain.
 * Throws AccountActivityError("INVALID_TRANSACTION").
 */
export function parseTransactionAmount(amount: string, kind: "deposit" | "withdrawal"): bigint {
  const scaled = parseAmount(amount);
  if (scaled === undefined) {
    throw new AccountActivityError(
      "INVALID_TRANSACTION",
      `${kind} amount must be a non-negative decimal, got "${amount}"`,
    );
  }
  return scaled;
}
