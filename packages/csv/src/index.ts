/**
 * @clearledger/csv — Delimited-text adapter.
 *
 * Reads activity records from CSV and writes account snapshots back out.
 */

export { ActivityRowParser, parseActivities, readActivities } from "./reader.js";
export { formatAccountRow, formatAccountsCsv, writeAccounts } from "./writer.js";
export { ActivityRecordSchema } from "./schema.js";
export type { ParsedActivityRecord } from "./schema.js";

export type { CsvFormatErrorCode, ActivityColumn } from "./types.js";
export {
  CsvFormatError,
  ACTIVITY_COLUMNS,
  REQUIRED_COLUMNS,
  ACCOUNT_COLUMNS,
} from "./types.js";
