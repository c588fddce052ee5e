import { describe, it, expect } from "vitest";
import { createLogger, type LogSink } from "../src/core/logger.js";

function recordingSink(): { sink: LogSink; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    sink: {
      log: (line) => lines.push(`log ${line}`),
      warn: (line) => lines.push(`warn ${line}`),
      error: (line) => lines.push(`error ${line}`),
    },
  };
}

describe("createLogger", () => {
  it("prefixes every line with its scope", () => {
    const { sink, lines } = recordingSink();
    const log = createLogger("cli", { sink });
    log.info("ready");
    log.warn("careful");
    log.error("failed");
    expect(lines).toEqual([
      "log [odata-literal:cli] ready",
      "warn [odata-literal:cli] careful",
      "error [odata-literal:cli] failed",
    ]);
  });

  it("drops debug lines unless verbose", () => {
    const quiet = recordingSink();
    createLogger("cli", { sink: quiet.sink }).debug("hidden");
    expect(quiet.lines).toEqual([]);

    const verbose = recordingSink();
    const log = createLogger("cli", { verbose: true, sink: verbose.sink });
    log.debug("shown");
    expect(log.verbose).toBe(true);
    expect(verbose.lines).toEqual(["log [odata-literal:cli] shown"]);
  });
});
