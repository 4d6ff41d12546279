/**
 * Tests for logger.ts — skipped-record log lines.
 */

import { describe, it, expect } from "vitest";
import { AccountActivityError } from "@clearledger/ledger";
import { CsvFormatError } from "@clearledger/csv";
import { createLogger, logSkippedRecord } from "../src/logger.js";

function memoryLogger(level: "error" | "warn" | "silent") {
  const lines: string[] = [];
  const logger = createLogger(
    { LOG_LEVEL: level, NODE_ENV: "test" },
    {
      write(msg: string) {
        lines.push(msg);
      },
    },
  );
  return {
    logger,
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe("logSkippedRecord", () => {
  it("logs parse failures at error with the line number", () => {
    const { logger, entries } = memoryLogger("error");

    logSkippedRecord(logger, {
      reason: "parse",
      position: 3,
      error: new CsvFormatError("INVALID_RECORD", "tx: must be an unsigned integer", 5),
    });

    expect(entries()).toHaveLength(1);
    expect(entries()[0]).toMatchObject({
      level: 50,
      position: 3,
      line: 5,
      msg: "error parsing account activity",
      err: { message: "line 5: tx: must be an unsigned integer" },
    });
  });

  it("omits the line for errors that carry none", () => {
    const { logger, entries } = memoryLogger("error");

    logSkippedRecord(logger, { reason: "parse", position: 0, error: new Error("bad input") });

    expect(entries()[0]).not.toHaveProperty("line");
  });

  it("logs rejections at warn with ids and code", () => {
    const { logger, entries } = memoryLogger("warn");

    logSkippedRecord(logger, {
      reason: "rejected",
      position: 1,
      kind: "deposit",
      transactionId: 9,
      clientId: 4,
      code: "FAILED_TRANSACTION",
      error: new AccountActivityError("FAILED_TRANSACTION", "account locked"),
    });

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 40,
        position: 1,
        kind: "deposit",
        transactionId: 9,
        clientId: 4,
        code: "FAILED_TRANSACTION",
        msg: "error processing account activity: failed transaction: account locked",
      }),
    ]);
  });

  it("drops rejections below the configured level", () => {
    const { logger, entries } = memoryLogger("error");

    logSkippedRecord(logger, {
      reason: "rejected",
      position: 0,
      kind: "withdrawal",
      transactionId: 1,
      clientId: 1,
      code: "INVALID_TRANSACTION",
      error: new AccountActivityError("INVALID_TRANSACTION", "bad amount"),
    });

    expect(entries()).toEqual([]);
  });

  it("writes nothing when silent", () => {
    const { logger, entries } = memoryLogger("silent");

    logSkippedRecord(logger, { reason: "parse", position: 0, error: new Error("bad input") });

    expect(entries()).toEqual([]);
  });
});
