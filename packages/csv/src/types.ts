/**
 * @clearledger/csv — Adapter types.
 */

// ─── Error Types ─────────────────────────────────────────────────────────

/**
 * Error codes for the CSV adapter.
 *
 * - MISSING_HEADER: the header line lacks a required column (fatal to the run)
 * - INVALID_RECORD: one record could not be turned into an activity (skipped)
 * - MALFORMED_CSV: the text is not parseable CSV, e.g. an unclosed quote (fatal)
 */
export type CsvFormatErrorCode = "MISSING_HEADER" | "INVALID_RECORD" | "MALFORMED_CSV";

export class CsvFormatError extends Error {
  public readonly code: CsvFormatErrorCode;
  /** 1-based line number in the input, when known */
  public readonly line: number | undefined;

  constructor(code: CsvFormatErrorCode, message: string, line?: number) {
    super(line === undefined ? message : `line ${String(line)}: ${message}`);
    this.name = "CsvFormatError";
    this.code = code;
    this.line = line;
  }
}

// ─── Layout ──────────────────────────────────────────────────────────────

/** Column names the reader understands. */
export const ACTIVITY_COLUMNS = ["type", "client", "tx", "amount"] as const;

export type ActivityColumn = (typeof ACTIVITY_COLUMNS)[number];

/** Header columns that must be present. */
export const REQUIRED_COLUMNS: readonly ActivityColumn[] = ["type", "client", "tx"];

/** Output header, in field order. */
export const ACCOUNT_COLUMNS = ["client", "available", "held", "total", "locked"] as const;
