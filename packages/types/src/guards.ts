/**
 * Runtime Type Guards
 *
 * Narrowing functions for Clearledger domain types.
 * These enable safe runtime validation at system boundaries
 * (parsed input records, replayed fixtures, external callers).
 */

import type {
  AccountActivity,
  AccountActivityKind,
  DisputeCase,
  Transaction,
} from "./activity.js";
import { ACCOUNT_ACTIVITY_KINDS } from "./activity.js";
import type { ClientId, TransactionId } from "./identifiers.js";
import { MAX_CLIENT_ID, MAX_TRANSACTION_ID } from "./identifiers.js";

// =============================================================================
// Identifier guards
// =============================================================================

export function isClientId(value: unknown): value is ClientId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CLIENT_ID
  );
}

export function isTransactionId(value: unknown): value is TransactionId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_TRANSACTION_ID
  );
}

// =============================================================================
// Activity guards
// =============================================================================

const ACTIVITY_KINDS = new Set<string>(ACCOUNT_ACTIVITY_KINDS);

export function isAccountActivityKind(value: unknown): value is AccountActivityKind {
  return typeof value === "string" && ACTIVITY_KINDS.has(value);
}

export function isTransaction(value: unknown): value is Transaction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isTransactionId(v.id) &&
    isClientId(v.clientId) &&
    typeof v.amount === "string"
  );
}

export function isDisputeCase(value: unknown): value is DisputeCase {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isTransactionId(v.transactionId) && isClientId(v.clientId);
}

export function isAccountActivity(value: unknown): value is AccountActivity {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isAccountActivityKind(v.kind)) return false;

  if (v.kind === "deposit" || v.kind === "withdrawal") {
    return isTransaction(v.transaction);
  }
  return isDisputeCase(v.dispute);
}
