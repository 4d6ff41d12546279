/**
 * Record validation schemas.
 *
 * A raw record is a map of trimmed header names to trimmed field values.
 * Deposits and withdrawals need an amount; dispute cases ignore it.
 * The amount is only checked for presence here: whether it is a valid
 * quantity is the ledger's call.
 */

import { z } from "zod";
import {
  MAX_CLIENT_ID,
  MAX_TRANSACTION_ID,
  assertNever,
  chargeback,
  deposit,
  dispute,
  resolve,
  withdrawal,
} from "@clearledger/types";
import type { AccountActivity } from "@clearledger/types";

function unsignedId(max: number) {
  return z
    .string()
    .regex(/^\d+$/, "must be an unsigned integer")
    .transform(Number)
    .pipe(z.number().int().max(max, `must not exceed ${String(max)}`));
}

const clientField = unsignedId(MAX_CLIENT_ID);
const txField = unsignedId(MAX_TRANSACTION_ID);

const TransactionRecordSchema = z.object({
  type: z.enum(["deposit", "withdrawal"]),
  client: clientField,
  tx: txField,
  amount: z.string({ required_error: "is required" }).min(1, "is required"),
});

const DisputeRecordSchema = z.object({
  type: z.enum(["dispute", "resolve", "chargeback"]),
  client: clientField,
  tx: txField,
  amount: z.string().optional(),
});

export const ActivityRecordSchema = z.discriminatedUnion("type", [
  TransactionRecordSchema,
  DisputeRecordSchema,
]);

export type ParsedActivityRecord = z.infer<typeof ActivityRecordSchema>;

export function toActivity(record: ParsedActivityRecord): AccountActivity {
  switch (record.type) {
    case "deposit":
      return deposit(record.tx, record.client, record.amount);
    case "withdrawal":
      return withdrawal(record.tx, record.client, record.amount);
    case "dispute":
      return dispute(record.tx, record.client);
    case "resolve":
      return resolve(record.tx, record.client);
    case "chargeback":
      return chargeback(record.tx, record.client);
    default:
      return assertNever(record);
  }
}

/** First issue of a failed parse, as "field: message". */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) {
    return "invalid record";
  }
  const field = issue.path.join(".");
  return field === "" ? issue.message : `${field}: ${issue.message}`;
}
