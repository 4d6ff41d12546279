/**
 * @clearledger/csv — Account writer.
 *
 * One header line, then one line per snapshot in the order given:
 *   client,available,held,total,locked
 *   1,51.0,0.0,51.0,false
 */

import type { Writable } from "node:stream";
import type { AccountSnapshot } from "@clearledger/ledger";
import { ACCOUNT_COLUMNS } from "./types.js";

export function formatAccountRow(snapshot: AccountSnapshot): string {
  return [
    String(snapshot.clientId),
    snapshot.available,
    snapshot.held,
    snapshot.total,
    snapshot.locked ? "true" : "false",
  ].join(",");
}

export function formatAccountsCsv(snapshots: readonly AccountSnapshot[]): string {
  const lines = [ACCOUNT_COLUMNS.join(","), ...snapshots.map(formatAccountRow)];
  return `${lines.join("\n")}\n`;
}

/**
 * Write the account CSV and resolve once the chunk has been handed off.
 */
export function writeAccounts(
  output: Writable,
  snapshots: readonly AccountSnapshot[],
): Promise<void> {
  const text = formatAccountsCsv(snapshots);
  return new Promise((resolve, reject) => {
    output.write(text, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
