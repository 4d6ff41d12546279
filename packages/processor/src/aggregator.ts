/**
 * LedgerAggregator — folds an activity stream into account snapshots.
 *
 * Routes each activity to the account for its client, creating the
 * account on first sight. Parse failures and rejected activities are
 * reported through the skip handler and never stop the run.
 *
 * Usage:
 *   const aggregator = new LedgerAggregator({ onSkip: (r) => log(r) });
 *   const { accounts, skipped } = aggregator.process(records);
 *
 * Ordering: records are applied strictly in input order, so activities
 * for the same client keep their relative order.
 */

import { Account, AccountActivityError } from "@clearledger/ledger";
import type { AccountSnapshot } from "@clearledger/ledger";
import {
  activityClientId,
  activityTransactionId,
} from "@clearledger/types";
import type { AccountActivity, ActivityRecord, ClientId } from "@clearledger/types";
import type { AggregationResult, SkipHandler, SkippedRecord } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface AggregatorConfig {
  /** Called for every skipped record. Optional — skipped records are also returned. */
  readonly onSkip?: SkipHandler;
}

// =============================================================================
// Aggregator
// =============================================================================

export class LedgerAggregator {
  private readonly _accounts = new Map<ClientId, Account>();
  private readonly _skipped: SkippedRecord[] = [];
  private readonly _onSkip: SkipHandler | undefined;
  private _position = 0;

  constructor(config: AggregatorConfig = {}) {
    this._onSkip = config.onSkip;
  }

  /**
   * Consume a finite sequence of records.
   * Calling again continues the same run with the same accounts.
   */
  process<E extends Error>(records: Iterable<ActivityRecord<E>>): AggregationResult {
    for (const record of records) {
      this._consume(record);
    }
    return this.result();
  }

  /**
   * Consume an async sequence, e.g. a streaming file reader.
   * Errors thrown by the source itself propagate to the caller.
   */
  async processAsync<E extends Error>(
    records: AsyncIterable<ActivityRecord<E>>,
  ): Promise<AggregationResult> {
    for await (const record of records) {
      this._consume(record);
    }
    return this.result();
  }

  /**
   * Snapshots of every account seen so far, ordered by client id.
   */
  accounts(): readonly AccountSnapshot[] {
    return [...this._accounts.values()]
      .sort((a, b) => a.clientId - b.clientId)
      .map((account) => account.snapshot());
  }

  result(): AggregationResult {
    return {
      accounts: this.accounts(),
      skipped: [...this._skipped],
      processed: this._position,
    };
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _consume<E extends Error>(record: ActivityRecord<E>): void {
    const position = this._position;
    this._position += 1;

    if (!record.ok) {
      this._skip({ reason: "parse", position, error: record.error });
      return;
    }

    this._apply(record.activity, position);
  }

  private _apply(activity: AccountActivity, position: number): void {
    const clientId = activityClientId(activity);
    const account = this._accountFor(clientId);

    try {
      account.apply(activity);
    } catch (err) {
      if (!(err instanceof AccountActivityError)) {
        throw err;
      }
      this._skip({
        reason: "rejected",
        position,
        kind: activity.kind,
        transactionId: activityTransactionId(activity),
        clientId,
        code: err.code,
        error: err,
      });
    }
  }

  /** Get-or-create: a new client starts with zero balances. */
  private _accountFor(clientId: ClientId): Account {
    let account = this._accounts.get(clientId);
    if (account === undefined) {
      account = new Account(clientId);
      this._accounts.set(clientId, account);
    }
    return account;
  }

  private _skip(record: SkippedRecord): void {
    this._skipped.push(record);
    this._onSkip?.(record);
  }
}
