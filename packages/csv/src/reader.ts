/**
 * @clearledger/csv — Activity reader.
 *
 * Turns CSV text into a sequence of ActivityRecord values. Tokenizing
 * (RFC 4180 quoting, CRLF, BOM) is done by csv-parse; this module owns the
 * header check and the per-row validation.
 *
 * Format:
 * - The first non-blank row is the header; it must name type, client and tx
 * - Every field and header name is trimmed
 * - Rows may be shorter than the header (dispute cases carry no amount)
 * - Blank lines are skipped
 *
 * A bad header throws CsvFormatError("MISSING_HEADER") and text csv-parse
 * cannot tokenize throws CsvFormatError("MALFORMED_CSV"). A bad row is
 * yielded as { ok: false } so the aggregator can skip it and carry on.
 */

import { CsvError, parse } from "csv-parse";
import type { Options } from "csv-parse";
import { parse as parseSync } from "csv-parse/sync";
import type { Readable } from "node:stream";
import type { ActivityRecord } from "@clearledger/types";
import { ActivityRecordSchema, describeIssue, toActivity } from "./schema.js";
import { CsvFormatError, REQUIRED_COLUMNS } from "./types.js";

const PARSE_OPTIONS: Options = {
  bom: true,
  info: true,
  trim: true,
  relax_quotes: true,
  relax_column_count: true,
  skip_empty_lines: true,
};

/** One tokenized row as emitted by csv-parse with `info: true`. */
interface TokenizedRow {
  readonly record: readonly string[];
  readonly info: { readonly lines: number };
}

function isTokenizedRow(value: unknown): value is TokenizedRow {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  const record = v["record"];
  if (!Array.isArray(record)) return false;
  if (!record.every((field: unknown) => typeof field === "string")) return false;
  const info = v["info"];
  if (typeof info !== "object" || info === null) return false;
  return typeof (info as Record<string, unknown>)["lines"] === "number";
}

function malformed(err: CsvError): CsvFormatError {
  const line: unknown = err["lines"];
  return new CsvFormatError(
    "MALFORMED_CSV",
    err.message,
    typeof line === "number" ? line : undefined,
  );
}

/**
 * Incremental row parser. Holds the header once it has been seen.
 */
export class ActivityRowParser {
  private _header: readonly string[] | undefined;

  /**
   * Feed the next tokenized row and the 1-based line it ends on.
   * Returns undefined for the header row and for blank rows.
   */
  push(fields: readonly string[], line: number): ActivityRecord<CsvFormatError> | undefined {
    if (fields.every((field) => field === "")) {
      return undefined;
    }

    if (this._header === undefined) {
      this._header = this._parseHeader(fields, line);
      return undefined;
    }

    return this._parseRecord(this._header, fields, line);
  }

  private _parseHeader(fields: readonly string[], line: number): readonly string[] {
    const missing = REQUIRED_COLUMNS.filter((column) => !fields.includes(column));
    if (missing.length > 0) {
      throw new CsvFormatError(
        "MISSING_HEADER",
        `header is missing column(s): ${missing.join(", ")}`,
        line,
      );
    }
    return [...fields];
  }

  private _parseRecord(
    header: readonly string[],
    fields: readonly string[],
    line: number,
  ): ActivityRecord<CsvFormatError> {
    if (fields.length > header.length) {
      return {
        ok: false,
        error: new CsvFormatError(
          "INVALID_RECORD",
          `record has ${String(fields.length)} fields, header has ${String(header.length)}`,
          line,
        ),
      };
    }

    const raw: Record<string, string> = {};
    fields.forEach((value, index) => {
      const column = header[index];
      if (column !== undefined && !(column in raw)) {
        raw[column] = value;
      }
    });

    const parsed = ActivityRecordSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        ok: false,
        error: new CsvFormatError("INVALID_RECORD", describeIssue(parsed.error), line),
      };
    }

    return { ok: true, activity: toActivity(parsed.data) };
  }
}

/**
 * Parse a complete CSV document held in memory.
 */
export function parseActivities(text: string): ActivityRecord<CsvFormatError>[] {
  let rows: unknown;
  try {
    rows = parseSync(text, PARSE_OPTIONS);
  } catch (err) {
    if (err instanceof CsvError) {
      throw malformed(err);
    }
    throw err;
  }

  const parser = new ActivityRowParser();
  const records: ActivityRecord<CsvFormatError>[] = [];
  if (!Array.isArray(rows)) {
    return records;
  }

  for (const row of rows) {
    if (!isTokenizedRow(row)) continue;
    const record = parser.push(row.record, row.info.lines);
    if (record !== undefined) {
      records.push(record);
    }
  }

  return records;
}

/**
 * Stream activity records from a readable source, one row at a time.
 * Stream errors and header errors are thrown from the iterator.
 */
export async function* readActivities(
  input: Readable,
): AsyncGenerator<ActivityRecord<CsvFormatError>> {
  const tokenizer = parse(PARSE_OPTIONS);
  input.once("error", (err) => tokenizer.destroy(err));
  input.pipe(tokenizer);

  const rows: AsyncIterable<unknown> = tokenizer;
  const parser = new ActivityRowParser();

  try {
    for await (const row of rows) {
      if (!isTokenizedRow(row)) continue;
      const record = parser.push(row.record, row.info.lines);
      if (record !== undefined) {
        yield record;
      }
    }
  } catch (err) {
    if (err instanceof CsvError) {
      throw malformed(err);
    }
    throw err;
  } finally {
    input.unpipe(tokenizer);
    tokenizer.destroy();
  }
}
