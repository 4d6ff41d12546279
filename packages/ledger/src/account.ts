/**
 * @clearledger/ledger — Client account state machine.
 *
 * An account owns one client's balances and dispute bookkeeping.
 * The only way to change it is apply(); every other member is a query.
 *
 * Balances:
 * - available — funds the client may withdraw
 * - held — funds frozen by an open dispute
 * - total — available + held
 *
 * Rules:
 * - Every transaction id is recorded once; the first successful use wins
 * - Checks run before any mutation, so a rejected activity changes nothing
 * - Dispute activity for unknown transactions is accepted as a no-op
 * - A chargeback locks the account; a locked account rejects everything
 */

import type {
  AccountActivity,
  ClientId,
  DisputeCase,
  Transaction,
  TransactionId,
} from "@clearledger/types";
import { assertNever } from "@clearledger/types";
import { formatBalance, parseTransactionAmount } from "./money-math.js";
import type { AccountSnapshot } from "./types.js";
import { AccountActivityError } from "./types.js";

export class Account {
  readonly clientId: ClientId;

  private _available = 0n;
  private _held = 0n;
  private _total = 0n;
  private _locked = false;

  /** Recorded deposits and withdrawals, id → scaled amount. Append-only. */
  private readonly _transactionRecord = new Map<TransactionId, bigint>();

  /** Transaction ids currently under dispute. */
  private readonly _disputeCases = new Set<TransactionId>();

  constructor(clientId: ClientId) {
    this.clientId = clientId;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get available(): string {
    return formatBalance(this._available);
  }

  get held(): string {
    return formatBalance(this._held);
  }

  get total(): string {
    return formatBalance(this._total);
  }

  get locked(): boolean {
    return this._locked;
  }

  hasTransaction(id: TransactionId): boolean {
    return this._transactionRecord.has(id);
  }

  isDisputed(id: TransactionId): boolean {
    return this._disputeCases.has(id);
  }

  snapshot(): AccountSnapshot {
    return {
      clientId: this.clientId,
      available: this.available,
      held: this.held,
      total: this.total,
      locked: this._locked,
    };
  }

  // ─── The Only Write Operation ────────────────────────────────────────

  /**
   * Apply one activity to the account.
   *
   * Throws AccountActivityError when the activity is rejected;
   * the account is then exactly as it was before the call.
   */
  apply(activity: AccountActivity): void {
    if (this._locked) {
      throw new AccountActivityError("FAILED_TRANSACTION", "account locked");
    }

    switch (activity.kind) {
      case "deposit":
        this._deposit(activity.transaction);
        return;
      case "withdrawal":
        this._withdraw(activity.transaction);
        return;
      case "dispute":
        this._initiateDispute(activity.dispute);
        return;
      case "resolve":
        this._resolveDispute(activity.dispute);
        return;
      case "chargeback":
        this._issueChargeback(activity.dispute);
        return;
      default:
        assertNever(activity);
    }
  }

  // ─── Transactions ────────────────────────────────────────────────────

  private _deposit(transaction: Transaction): void {
    const amount = parseTransactionAmount(transaction.amount, "deposit");
    this._assertNotRecorded(transaction.id);

    this._transactionRecord.set(transaction.id, amount);
    this._available += amount;
    this._total += amount;
  }

  private _withdraw(transaction: Transaction): void {
    const amount = parseTransactionAmount(transaction.amount, "withdrawal");
    this._assertNotRecorded(transaction.id);

    if (amount > this._available) {
      throw new AccountActivityError(
        "FAILED_TRANSACTION",
        "withdrawal failed because of insufficient funds",
      );
    }

    this._transactionRecord.set(transaction.id, amount);
    this._available -= amount;
    this._total -= amount;
  }

  private _assertNotRecorded(id: TransactionId): void {
    if (this._transactionRecord.has(id)) {
      throw new AccountActivityError(
        "FAILED_TRANSACTION",
        `transaction ${String(id)} already recorded`,
      );
    }
  }

  // ─── Dispute Cases ───────────────────────────────────────────────────

  private _initiateDispute(dispute: DisputeCase): void {
    if (this._disputeCases.has(dispute.transactionId)) {
      throw new AccountActivityError(
        "FAILED_DISPUTE_CASE",
        `transaction ${String(dispute.transactionId)} already disputed`,
      );
    }

    const amount = this._transactionRecord.get(dispute.transactionId);
    if (amount === undefined) {
      return;
    }

    this._disputeCases.add(dispute.transactionId);
    this._available -= amount;
    this._held += amount;
  }

  private _resolveDispute(dispute: DisputeCase): void {
    const amount = this._disputedAmount(dispute.transactionId);
    if (amount === undefined) {
      return;
    }

    this._disputeCases.delete(dispute.transactionId);
    this._held -= amount;
    this._available += amount;
  }

  private _issueChargeback(dispute: DisputeCase): void {
    const amount = this._disputedAmount(dispute.transactionId);
    if (amount === undefined) {
      return;
    }

    this._disputeCases.delete(dispute.transactionId);
    this._held -= amount;
    this._total -= amount;
    this._locked = true;
  }

  /** Amount of a transaction that is currently under dispute, if any. */
  private _disputedAmount(id: TransactionId): bigint | undefined {
    if (!this._disputeCases.has(id)) {
      return undefined;
    }
    return this._transactionRecord.get(id);
  }
}
