/**
 * @clearledger/processor domain types.
 *
 * Aggregation reporting types:
 * - Skipped records (parse failures and rejected activities)
 * - The result of folding an activity stream into account snapshots
 */

import type { AccountActivityErrorCode, AccountSnapshot } from "@clearledger/ledger";
import type { AccountActivityKind, ClientId, TransactionId } from "@clearledger/types";

// =============================================================================
// Skipped Records
// =============================================================================

/** A record the reader could not turn into an activity. */
export interface ParseFailure {
  readonly reason: "parse";
  /** Zero-based position of the record in the input sequence */
  readonly position: number;
  readonly error: Error;
}

/** A parsed activity the account refused to apply. */
export interface RejectedActivity {
  readonly reason: "rejected";
  readonly position: number;
  readonly kind: AccountActivityKind;
  readonly transactionId: TransactionId;
  readonly clientId: ClientId;
  readonly code: AccountActivityErrorCode;
  readonly error: Error;
}

export type SkippedRecord = ParseFailure | RejectedActivity;

/** Observability sink, called once per skipped record as it happens. */
export type SkipHandler = (record: SkippedRecord) => void;

// =============================================================================
// Aggregation Result
// =============================================================================

export interface AggregationResult {
  /** One snapshot per client ever seen, ordered by client id */
  readonly accounts: readonly AccountSnapshot[];
  /** Everything skipped during this aggregator's lifetime, in input order */
  readonly skipped: readonly SkippedRecord[];
  /** Number of records consumed, including skipped ones */
  readonly processed: number;
}
