/**
 * @clearledger/types — Shared domain types for the Clearledger stack.
 *
 * These types are used across all Clearledger packages:
 * - Client and transaction identifiers
 * - Deposits, withdrawals and dispute cases
 * - The AccountActivity union and the reader-facing ActivityRecord
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in the ledger
 */

// Identifiers
export type { ClientId, TransactionId } from "./identifiers.js";
export { MAX_CLIENT_ID, MAX_TRANSACTION_ID } from "./identifiers.js";

// Activities
export type {
  Transaction,
  DisputeCase,
  DepositActivity,
  WithdrawalActivity,
  DisputeActivity,
  ResolveActivity,
  ChargebackActivity,
  AccountActivity,
  AccountActivityKind,
  TransactionActivity,
  DisputeCaseActivity,
  ActivityRecord,
} from "./activity.js";

export {
  ACCOUNT_ACTIVITY_KINDS,
  deposit,
  withdrawal,
  dispute,
  resolve,
  chargeback,
  assertNever,
  activityClientId,
  activityTransactionId,
} from "./activity.js";

// Runtime type guards
export {
  isClientId,
  isTransactionId,
  isAccountActivityKind,
  isTransaction,
  isDisputeCase,
  isAccountActivity,
} from "./guards.js";
