/**
 * @clearledger/cli — Command-line front end.
 */

export { runCli, EXIT_OK, EXIT_FAILURE } from "./cli.js";
export type { CliIo, CliOptions } from "./cli.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, logSkippedRecord } from "./logger.js";
