/**
 * odata-literal - OData primitive literals and qualified names as typed values
 *
 * Re-exports the grammar and parser packages, plus configuration, logging and
 * the CLI entry point.
 *
 * @example
 * ```typescript
 * import { config, parseLiteral } from "odata-literal";
 *
 * const outcome = parseLiteral("2024-02-29", config.literalOptions());
 * ```
 *
 * @packageDocumentation
 */

export * from "@odata-literal/grammar";
export {
  parseComplete,
  rankedChoice,
  type Alternative,
  type Checked,
  type FailureKind,
  type ParseErrorKind,
  type ParseResult,
  type Parser,
} from "@odata-literal/parser";

export {
  config,
  defineConfig,
  type DurationKeyword,
  type OdataLiteralConfig,
  type OutputFormat,
  type UserConfig,
} from "./core/config.js";
export { createLogger, type LogSink, type Logger, type LoggerOptions } from "./core/logger.js";
export { UsageError, parseArgs, runCli, type CliIO, type CliOptions, type Command } from "./cli/index.js";
