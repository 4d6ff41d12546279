/**
 * @clearledger/processor — Ledger aggregation.
 *
 * Folds a stream of (possibly failed) activity records into one
 * account per client and reports what was skipped and why.
 */

export { LedgerAggregator } from "./aggregator.js";
export type { AggregatorConfig } from "./aggregator.js";

export { computeAccountsStateHash } from "./state-hash.js";

export type {
  ParseFailure,
  RejectedActivity,
  SkippedRecord,
  SkipHandler,
  AggregationResult,
} from "./types.js";
