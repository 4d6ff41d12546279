/**
 * Structured logging.
 *
 * pino, JSON lines on stderr so stdout carries only the account CSV.
 * Skipped records from the aggregator become one log line each.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { SkippedRecord } from "@clearledger/processor";
import { CsvFormatError } from "@clearledger/csv";
import type { AppConfig } from "./config.js";

const STDERR_FD = 2;

/**
 * Create the process logger.
 * An explicit destination wins over the development pretty-printer.
 */
export function createLogger(config: AppConfig, destination?: DestinationStream): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }

  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR_FD } },
    });
  }

  return pino({ level: config.LOG_LEVEL }, pino.destination(STDERR_FD));
}

/**
 * Log one skipped record: parse failures at error, rejections at warn.
 */
export function logSkippedRecord(logger: Logger, record: SkippedRecord): void {
  switch (record.reason) {
    case "parse": {
      const line = record.error instanceof CsvFormatError ? record.error.line : undefined;
      logger.error(
        { position: record.position, line, err: record.error },
        "error parsing account activity",
      );
      return;
    }
    case "rejected":
      logger.warn(
        {
          position: record.position,
          kind: record.kind,
          transactionId: record.transactionId,
          clientId: record.clientId,
          code: record.code,
        },
        `error processing account activity: ${record.error.message}`,
      );
      return;
  }
}
