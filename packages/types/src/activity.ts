/**
 * Account Activity Types
 *
 * The five kinds of record that move money in or out of an account,
 * or move it between the available and held balances.
 *
 * Rules:
 * - All types are immutable (readonly)
 * - Amounts are decimal strings, never floating-point numbers
 * - AccountActivity is a closed union: consumers switch on `kind` exhaustively
 */

import type { ClientId, TransactionId } from "./identifiers.js";

// =============================================================================
// Payloads
// =============================================================================

/**
 * A deposit or withdrawal.
 */
export interface Transaction {
  /** Unique transaction identifier */
  readonly id: TransactionId;

  /** Owning client */
  readonly clientId: ClientId;

  /** Decimal string (e.g., "100.0", "1.2345"). Validity is checked by the ledger. */
  readonly amount: string;
}

/**
 * A reference to a prior transaction, used by dispute, resolve and chargeback.
 * Carries no amount: it is recovered from the referenced transaction.
 */
export interface DisputeCase {
  readonly transactionId: TransactionId;
  readonly clientId: ClientId;
}

// =============================================================================
// Activity union
// =============================================================================

export interface DepositActivity {
  readonly kind: "deposit";
  readonly transaction: Transaction;
}

export interface WithdrawalActivity {
  readonly kind: "withdrawal";
  readonly transaction: Transaction;
}

export interface DisputeActivity {
  readonly kind: "dispute";
  readonly dispute: DisputeCase;
}

export interface ResolveActivity {
  readonly kind: "resolve";
  readonly dispute: DisputeCase;
}

export interface ChargebackActivity {
  readonly kind: "chargeback";
  readonly dispute: DisputeCase;
}

/**
 * One activity record. Exactly one variant is active.
 */
export type AccountActivity =
  | DepositActivity
  | WithdrawalActivity
  | DisputeActivity
  | ResolveActivity
  | ChargebackActivity;

export type AccountActivityKind = AccountActivity["kind"];

/** Activity kinds that carry an amount. */
export type TransactionActivity = DepositActivity | WithdrawalActivity;

/** Activity kinds that reference a prior transaction. */
export type DisputeCaseActivity = DisputeActivity | ResolveActivity | ChargebackActivity;

export const ACCOUNT_ACTIVITY_KINDS: readonly AccountActivityKind[] = [
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
] as const;

/**
 * Element type consumed by the aggregator: either a parsed activity
 * or the reader's failure to produce one.
 */
export type ActivityRecord<E extends Error = Error> =
  | { readonly ok: true; readonly activity: AccountActivity }
  | { readonly ok: false; readonly error: E };

// =============================================================================
// Constructors
// =============================================================================

export function deposit(id: TransactionId, clientId: ClientId, amount: string): DepositActivity {
  return { kind: "deposit", transaction: { id, clientId, amount } };
}

export function withdrawal(id: TransactionId, clientId: ClientId, amount: string): WithdrawalActivity {
  return { kind: "withdrawal", transaction: { id, clientId, amount } };
}

export function dispute(transactionId: TransactionId, clientId: ClientId): DisputeActivity {
  return { kind: "dispute", dispute: { transactionId, clientId } };
}

export function resolve(transactionId: TransactionId, clientId: ClientId): ResolveActivity {
  return { kind: "resolve", dispute: { transactionId, clientId } };
}

export function chargeback(transactionId: TransactionId, clientId: ClientId): ChargebackActivity {
  return { kind: "chargeback", dispute: { transactionId, clientId } };
}

// =============================================================================
// Accessors
// =============================================================================

/**
 * Compile-time exhaustiveness check for switches over a closed union.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/**
 * The client whose account the activity applies to.
 */
export function activityClientId(activity: AccountActivity): ClientId {
  switch (activity.kind) {
    case "deposit":
    case "withdrawal":
      return activity.transaction.clientId;
    case "dispute":
    case "resolve":
    case "chargeback":
      return activity.dispute.clientId;
    default:
      return assertNever(activity);
  }
}

/**
 * The transaction the activity creates (deposit/withdrawal) or references
 * (dispute/resolve/chargeback).
 */
export function activityTransactionId(activity: AccountActivity): TransactionId {
  switch (activity.kind) {
    case "deposit":
    case "withdrawal":
      return activity.transaction.id;
    case "dispute":
    case "resolve":
    case "chargeback":
      return activity.dispute.transactionId;
    default:
      return assertNever(activity);
  }
}
