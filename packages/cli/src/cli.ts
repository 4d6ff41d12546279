/**
 * @clearledger/cli — Command.
 *
 *   clearledger <path> [--silent] [--state-hash]
 *
 * Streams the activity CSV at <path> through a LedgerAggregator and
 * writes the resulting accounts as CSV to stdout. Diagnostics go to the
 * logger, never to stdout.
 *
 * Exit codes:
 *   0  input was read (skipped records do not change this)
 *   1  input could not be opened or parsed as CSV, header is missing,
 *      or config is invalid
 */

import { open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import type { Writable } from "node:stream";
import { Command, CommanderError } from "commander";
import type { DestinationStream, Logger } from "pino";
import { ZodError } from "zod";
import { CsvFormatError, readActivities, writeAccounts } from "@clearledger/csv";
import { LedgerAggregator, computeAccountsStateHash } from "@clearledger/processor";
import type { AggregationResult } from "@clearledger/processor";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger, logSkippedRecord } from "./logger.js";

// =============================================================================
// Types
// =============================================================================

export interface CliIo {
  readonly stdout: Writable;
  readonly stderr: Writable;
  readonly env: Record<string, string | undefined>;
  /** Log sink override. Defaults to stderr (fd 2). */
  readonly logDestination?: DestinationStream;
}

export interface CliOptions {
  readonly silent?: boolean;
  readonly stateHash?: boolean;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

// =============================================================================
// Entry
// =============================================================================

/**
 * Run the command against the given arguments (without node and script path).
 * Resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(io.env);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      io.stderr.write(`invalid configuration: ${issues.join("; ")}\n`);
      return EXIT_FAILURE;
    }
    throw err;
  }

  const logger = createLogger(config, io.logDestination);
  let exitCode = EXIT_OK;

  const program = new Command()
    .name("clearledger")
    .description("Replay account activity from a CSV file and print the resulting accounts")
    .argument("<path>", "activity CSV file")
    .option("--silent", "do not write accounts to stdout")
    .option("--state-hash", "print a SHA-256 hash of the final account state to stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .action(async (path: string, options: CliOptions) => {
      exitCode = await processFile(path, options, io, logger);
    });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  return exitCode;
}

// =============================================================================
// Processing
// =============================================================================

async function processFile(
  path: string,
  options: CliOptions,
  io: CliIo,
  logger: Logger,
): Promise<number> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err) {
    logger.error({ err, path }, "cannot open activity file");
    return EXIT_FAILURE;
  }

  const aggregator = new LedgerAggregator({
    onSkip: (record) => logSkippedRecord(logger, record),
  });
  const input = handle.createReadStream({ encoding: "utf8", autoClose: false });

  let result: AggregationResult;
  try {
    result = await aggregator.processAsync(readActivities(input));
  } catch (err) {
    if (err instanceof CsvFormatError) {
      logger.error({ err, path, line: err.line, code: err.code }, "cannot read activity file");
      return EXIT_FAILURE;
    }
    throw err;
  } finally {
    input.destroy();
    await handle.close();
  }

  if (options.silent !== true) {
    await writeAccounts(io.stdout, result.accounts);
  }

  if (options.stateHash === true) {
    io.stderr.write(`state hash: ${computeAccountsStateHash(result.accounts)}\n`);
  }

  logger.info(
    {
      path,
      processed: result.processed,
      skipped: result.skipped.length,
      accounts: result.accounts.length,
    },
    "activity file processed",
  );

  return EXIT_OK;
}
