/**
 * odata-literal CLI -- parse OData literal and name tokens
 *
 * Usage:
 *   odata-literal [token] <token...> [--json] [--require-duration-keyword] [--verbose]
 *   odata-literal literal <token...>
 *   odata-literal name <token...>
 */

import {
  formatLiteral,
  formatName,
  literalToJSON,
  nameToJSON,
  parseLiteral,
  parseName,
  parseToken,
  type JSONValue,
  type LiteralOptions,
  type Outcome,
  type Token,
} from "@odata-literal/grammar";
import { config } from "../core/config.js";
import { createLogger, type LogSink } from "../core/logger.js";

export type Command = "literal" | "name" | "token";

const COMMANDS: readonly Command[] = ["literal", "name", "token"];

export interface CliOptions {
  command: Command;
  tokens: string[];
  json: boolean;
  requireDurationKeyword: boolean;
  verbose: boolean;
  help: boolean;
}

/** Line-oriented output streams. */
export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/** Bad command-line arguments. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Flags not given on the command line are `false`; `runCli` fills them in
 * from the configuration. Tokens may start with `-` (`-5`, `-INF`), so only
 * the listed flags are options; `--` ends option parsing.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const first = args[0];
  const command = COMMANDS.find((c) => c === first);
  const rest = command ? args.slice(1) : args;

  const options: CliOptions = {
    command: command ?? "token",
    tokens: [],
    json: false,
    requireDurationKeyword: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "--") {
      options.tokens.push(...rest.slice(i + 1));
      break;
    } else if (arg === "--json") {
      options.json = true;
    } else if (arg === "--require-duration-keyword") {
      options.requireDurationKeyword = true;
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg.startsWith("--")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      options.tokens.push(arg);
    }
  }

  if (!options.help && options.tokens.length === 0) {
    throw new UsageError("No tokens given");
  }
  return options;
}

export function printHelp(io: CliIO = consoleIO): void {
  io.stdout(`
odata-literal - Parse OData primitive literals and qualified names

USAGE:
  odata-literal [command] [options] <token...>

COMMANDS:
  token    A literal if the whole token is one, otherwise a name (default)
  literal  Primitive literals only
  name     Identifiers and dotted names only

OPTIONS:
  --json                       Print one JSON object per token
  --require-duration-keyword   Read '...' as a string, never as a duration
  -v, --verbose                Enable verbose logging
  -h, --help                   Show this help message
  --                           Treat every later argument as a token

EXAMPLES:
  odata-literal 42 "'it''s'" 2023-01-01T12:00Z
  odata-literal literal --json "duration'P1DT2H'"
  odata-literal name Sales.Orders
`);
}

interface Rendered {
  kind: string;
  text: string;
  json: JSONValue;
}

function renderToken(token: Token): Rendered {
  if (token.kind === "name") {
    return {
      kind: token.name.kind,
      text: formatName(token.name),
      json: { ...nameToJSON(token.name) },
    };
  }
  return {
    kind: token.literal.kind,
    text: formatLiteral(token.literal),
    json: { ...literalToJSON(token.literal) },
  };
}

function parseWith(command: Command, text: string, options: LiteralOptions): Outcome<Token> {
  switch (command) {
    case "token":
      return parseToken(text, options);
    case "literal": {
      const outcome = parseLiteral(text, options);
      return outcome.ok
        ? { ...outcome, value: { kind: "literal", literal: outcome.value } }
        : outcome;
    }
    case "name": {
      const outcome = parseName(text);
      return outcome.ok ? { ...outcome, value: { kind: "name", name: outcome.value } } : outcome;
    }
  }
}

/**
 * Run the CLI against `args` (without the node and script paths).
 *
 * @returns The exit code: 0 when every token parsed, 1 when any failed, 2 on
 * a usage error.
 */
export function runCli(args: readonly string[], io: CliIO = consoleIO): number {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(`error: ${error.message}`);
    io.stderr("Run with --help for usage.");
    return 2;
  }

  if (options.help) {
    printHelp(io);
    return 0;
  }

  const settings = config.getAll();
  const json = options.json || settings.output.format === "json";
  const literalOptions: LiteralOptions = {
    requireDurationKeyword:
      options.requireDurationKeyword || settings.duration.keyword === "required",
  };

  const sink: LogSink = { log: io.stderr, warn: io.stderr, error: io.stderr };
  const log = createLogger("cli", { verbose: options.verbose || settings.debug, sink });
  const configFile = config.getConfigFilePath();
  log.debug(configFile ? `Using config: ${configFile}` : "No config file found");
  log.debug(`Parsing ${options.tokens.length} token(s) as ${options.command}`);

  let failures = 0;
  for (const text of options.tokens) {
    const outcome = parseWith(options.command, text, literalOptions);
    if (!outcome.ok) {
      failures++;
      io.stderr(`error: ${outcome.error.message}`);
      continue;
    }
    const rendered = renderToken(outcome.value);
    log.debug(`${JSON.stringify(text)} matched ${outcome.alternative}`);
    io.stdout(
      json
        ? JSON.stringify({ input: text, alternative: outcome.alternative, value: rendered.json })
        : `${rendered.kind} ${rendered.text}`
    );
  }

  return failures > 0 ? 1 : 0;
}
