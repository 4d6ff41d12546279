/**
 * @clearledger/ledger — Per-client account ledger.
 *
 * A pure TypeScript state machine with zero runtime dependencies.
 * Enforces the account invariants:
 * - total = available + held after every apply()
 * - Withdrawals never overdraw available funds
 * - Transaction ids are recorded once
 * - A chargeback locks the account for good
 * - All monetary arithmetic uses bigint (no floating point)
 */

// State machine
export { Account } from "./account.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  parseAmount,
  formatAmount,
  formatBalance,
  isValidAmount,
  parseTransactionAmount,
} from "./money-math.js";

// Types
export type { AccountActivityErrorCode, AccountSnapshot } from "./types.js";
export { AccountActivityError } from "./types.js";
