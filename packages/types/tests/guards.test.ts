/**
 * Runtime type guard tests for @clearledger/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isClientId,
  isTransactionId,
  isAccountActivityKind,
  isTransaction,
  isDisputeCase,
  isAccountActivity,
} from "../src/guards.js";
import { deposit, dispute, chargeback } from "../src/activity.js";

// =============================================================================
// Identifier guards
// =============================================================================

describe("isClientId", () => {
  it("accepts the u16 range", () => {
    expect(isClientId(0)).toBe(true);
    expect(isClientId(1)).toBe(true);
    expect(isClientId(65535)).toBe(true);
  });

  it("rejects values outside the u16 range", () => {
    expect(isClientId(-1)).toBe(false);
    expect(isClientId(65536)).toBe(false);
  });

  it("rejects non-integers and non-numbers", () => {
    expect(isClientId(1.5)).toBe(false);
    expect(isClientId(Number.NaN)).toBe(false);
    expect(isClientId("1")).toBe(false);
    expect(isClientId(null)).toBe(false);
  });
});

describe("isTransactionId", () => {
  it("accepts the u32 range", () => {
    expect(isTransactionId(0)).toBe(true);
    expect(isTransactionId(4294967295)).toBe(true);
  });

  it("rejects values outside the u32 range", () => {
    expect(isTransactionId(-1)).toBe(false);
    expect(isTransactionId(4294967296)).toBe(false);
  });

  it("rejects non-integers", () => {
    expect(isTransactionId(2.25)).toBe(false);
    expect(isTransactionId(Number.POSITIVE_INFINITY)).toBe(false);
  });
});

// =============================================================================
// Activity guards
// =============================================================================

describe("isAccountActivityKind", () => {
  it("accepts all five kinds", () => {
    for (const kind of ["deposit", "withdrawal", "dispute", "resolve", "chargeback"]) {
      expect(isAccountActivityKind(kind)).toBe(true);
    }
  });

  it("rejects unknown kinds", () => {
    expect(isAccountActivityKind("transfer")).toBe(false);
    expect(isAccountActivityKind("Deposit")).toBe(false);
    expect(isAccountActivityKind(1)).toBe(false);
  });
});

describe("isTransaction", () => {
  it("accepts a well-formed transaction", () => {
    expect(isTransaction({ id: 1, clientId: 2, amount: "10.5" })).toBe(true);
  });

  it("rejects a numeric amount (must be string)", () => {
    expect(isTransaction({ id: 1, clientId: 2, amount: 10.5 })).toBe(false);
  });

  it("rejects an out-of-range client", () => {
    expect(isTransaction({ id: 1, clientId: 70000, amount: "1" })).toBe(false);
  });

  it("rejects null", () => {
    expect(isTransaction(null)).toBe(false);
  });
});

describe("isDisputeCase", () => {
  it("accepts a well-formed dispute case", () => {
    expect(isDisputeCase({ transactionId: 9, clientId: 3 })).toBe(true);
  });

  it("rejects a missing transaction id", () => {
    expect(isDisputeCase({ clientId: 3 })).toBe(false);
  });
});

describe("isAccountActivity", () => {
  it("accepts constructed activities", () => {
    expect(isAccountActivity(deposit(1, 1, "100.0"))).toBe(true);
    expect(isAccountActivity(dispute(1, 1))).toBe(true);
    expect(isAccountActivity(chargeback(1, 1))).toBe(true);
  });

  it("rejects a deposit carrying a dispute payload", () => {
    expect(
      isAccountActivity({ kind: "deposit", dispute: { transactionId: 1, clientId: 1 } }),
    ).toBe(false);
  });

  it("rejects an unknown kind", () => {
    expect(
      isAccountActivity({ kind: "transfer", transaction: { id: 1, clientId: 1, amount: "1" } }),
    ).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isAccountActivity("deposit")).toBe(false);
    expect(isAccountActivity(undefined)).toBe(false);
  });
});
