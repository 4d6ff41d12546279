/**
 * @clearledger/processor — Account state hash.
 *
 * Produces a single content-addressed hash over a set of account snapshots.
 *
 * Algorithm:
 * 1. Sort snapshots by client id
 * 2. Canonicalize the sorted list (RFC 8785 / JCS)
 * 3. SHA-256 the canonical form
 *
 * Replaying the same activity stream always yields the same hash;
 * any change to any balance or lock flag yields a different one.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { AccountSnapshot } from "@clearledger/ledger";

export function computeAccountsStateHash(snapshots: readonly AccountSnapshot[]): string {
  const ordered = [...snapshots].sort((a, b) => a.clientId - b.clientId);
  const canonical = canonicalize(ordered);
  return createHash("sha256").update(canonical).digest("hex");
}
