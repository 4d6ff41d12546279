/**
 * @clearledger/ledger — Types for the account ledger.
 *
 * Rules:
 * - All exported types are readonly
 * - Rejections are thrown as AccountActivityError, never returned as codes
 * - A rejected activity leaves the account untouched
 */

import type { ClientId } from "@clearledger/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/**
 * Error codes for account activity.
 *
 * - INVALID_TRANSACTION: payload out of domain (bad amount)
 * - FAILED_TRANSACTION: well-formed but not executable (insufficient funds,
 *   duplicate transaction id, locked account)
 * - FAILED_DISPUTE_CASE: dispute protocol violation (double dispute)
 */
export type AccountActivityErrorCode =
  | "INVALID_TRANSACTION"
  | "FAILED_TRANSACTION"
  | "FAILED_DISPUTE_CASE";

const MESSAGE_PREFIX: Readonly<Record<AccountActivityErrorCode, string>> = {
  INVALID_TRANSACTION: "invalid transaction",
  FAILED_TRANSACTION: "failed transaction",
  FAILED_DISPUTE_CASE: "failed dispute case",
};

/**
 * Structured rejection from Account.apply().
 */
export class AccountActivityError extends Error {
  public readonly code: AccountActivityErrorCode;
  public readonly reason: string;

  constructor(code: AccountActivityErrorCode, reason: string) {
    super(`${MESSAGE_PREFIX[code]}: ${reason}`);
    this.name = "AccountActivityError";
    this.code = code;
    this.reason = reason;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable view of an account's final state.
 * Balances are decimal strings formatted with formatBalance().
 */
export interface AccountSnapshot {
  readonly clientId: ClientId;
  readonly available: string;
  readonly held: string;
  readonly total: string;
  readonly locked: boolean;
}
