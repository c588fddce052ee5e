import { describe, it, expect } from "vitest";
import {
  ParseError,
  createLiteralParser,
  parseLiteral,
  parseLiteralOrThrow,
  primitiveLiteral,
  type Literal,
  type LiteralOptions,
} from "../index.js";

function parsed(text: string, options?: LiteralOptions): { value: Literal; alternative: string } {
  const outcome = parseLiteral(text, options);
  if (!outcome.ok) throw outcome.error;
  return outcome;
}

function rejected(text: string, options?: LiteralOptions): ParseError {
  const outcome = parseLiteral(text, options);
  if (outcome.ok) throw new Error(`${text} parsed as ${outcome.alternative}`);
  return outcome.error;
}

const DAY = 86_400_000_000_000n;

describe("dispatch", () => {
  it.each([
    ["null", "null"],
    ["true", "boolean"],
    ["FaLsE", "boolean"],
    ["'text'", "string"],
    ["'P1D'", "duration"],
    ["duration'P1D'", "duration"],
    ["2023-01-01T12:00Z", "datetime"],
    ["2023-01-01", "date"],
    ["12:00", "time"],
    ["01234567-89ab-cdef-0123-456789ABCDEF", "guid"],
    ["1.5", "float"],
    ["NaN", "float"],
    ["42", "integer"],
    ["binary'AQID'", "binary"],
  ])("%s is matched by %s", (text, alternative) => {
    expect(parsed(text).alternative).toBe(alternative);
  });

  it("keeps null case-sensitive", () => {
    expect(rejected("NULL").kind).toBe("syntax");
  });

  it("parses integers as integers, never floats", () => {
    expect(parsed("123").value).toEqual({ kind: "integer", value: 123n });
    expect(parsed("+5").value).toEqual({ kind: "integer", value: 5n });
    expect(parsed("007").value).toEqual({ kind: "integer", value: 7n });
  });

  it("parses fractions and exponents as floats", () => {
    expect(parsed("123.0").value).toEqual({ kind: "float", value: 123 });
    expect(parsed("1e5").value).toEqual({ kind: "float", value: 100000 });
    expect(parsed("-2.5E-1").value).toEqual({ kind: "float", value: -0.25 });
  });

  it("parses the special floats", () => {
    const nan = parsed("NaN").value;
    expect(nan.kind === "float" && Number.isNaN(nan.value)).toBe(true);
    expect(parsed("INF").value).toEqual({ kind: "float", value: Number.POSITIVE_INFINITY });
    expect(parsed("-INF").value).toEqual({ kind: "float", value: Number.NEGATIVE_INFINITY });
  });

  it("accepts the largest 64-bit integer", () => {
    expect(parsed("9223372036854775807").value).toEqual({
      kind: "integer",
      value: 9223372036854775807n,
    });
    expect(parsed("-9223372036854775808").value).toEqual({
      kind: "integer",
      value: -9223372036854775808n,
    });
  });

  it("keeps GUIDs as written", () => {
    expect(parsed("01234567-89ab-cdef-0123-456789ABCDEF").value).toEqual({
      kind: "guid",
      value: "01234567-89ab-cdef-0123-456789ABCDEF",
    });
  });
});

describe("durations", () => {
  it("reads the keyword and bare forms alike", () => {
    expect(parsed("duration'P1D'").value).toEqual({ kind: "duration", value: { nanoseconds: DAY } });
    expect(parsed("'P1D'").value).toEqual({ kind: "duration", value: { nanoseconds: DAY } });
  });

  it("reads negative and fractional durations", () => {
    expect(parsed("duration'-P1D'").value).toEqual({ kind: "duration", value: { nanoseconds: -DAY } });
    expect(parsed("duration'PT1.2S'").value).toEqual({
      kind: "duration",
      value: { nanoseconds: 1_200_000_000n },
    });
  });

  it("ignores the case of the keyword and designators", () => {
    expect(parsed("DURATION'p1dt2h'").value).toEqual({
      kind: "duration",
      value: { nanoseconds: DAY + 7_200_000_000_000n },
    });
  });

  it("reads a quoted P with no components as a zero duration", () => {
    expect(parsed("'p'").value).toEqual({ kind: "duration", value: { nanoseconds: 0n } });
  });

  it("leaves duration-shaped strings alone when the keyword is required", () => {
    const options = { requireDurationKeyword: true };
    expect(parsed("'P1D'", options)).toEqual({
      value: { kind: "string", value: "P1D" },
      alternative: "string",
      ok: true,
    });
    expect(parsed("duration'P1D'", options).value).toEqual({
      kind: "duration",
      value: { nanoseconds: DAY },
    });
  });
});

describe("errors", () => {
  it("reports integer overflow as a domain error", () => {
    const e = rejected("9223372036854775808");
    expect(e.kind).toBe("domain");
    expect(e.pos).toBe(0);
    expect(e.alternative).toBe("integer");
    expect(e.expected).toBe("an integer between -9223372036854775808 and 9223372036854775807");
  });

  it("reports an impossible date at the day", () => {
    const e = rejected("2023-02-29");
    expect(e.kind).toBe("domain");
    expect(e.pos).toBe(8);
    expect(e.alternative).toBe("date");
    expect(e.expected).toBe("a day between 01 and 28 for 2023-02");
  });

  it("reports an out-of-range offset minute", () => {
    const e = rejected("2023-01-01T00:00+02:60");
    expect(e.kind).toBe("domain");
    expect(e.pos).toBe(20);
    expect(e.alternative).toBe("datetime");
    expect(e.expected).toBe("offset minute between 00 and 59");
  });

  it("reports a bad GUID group once the first group is read", () => {
    const e = rejected("01234567-89ab-cdef-0123-456789");
    expect(e.kind).toBe("domain");
    expect(e.pos).toBe(24);
    expect(e.alternative).toBe("guid");
    expect(e.expected).toBe("12 hex digits");
  });

  it("reports trailing input after a partial match", () => {
    const e = rejected("nullx");
    expect(e.kind).toBe("trailing-input");
    expect(e.pos).toBe(4);
    expect(e.alternative).toBe("null");
    expect(e.expected).toBe("end of input");
  });

  it.each(["1.", "1.e5"])("attributes %s to the integer with trailing input", (text) => {
    const e = rejected(text);
    expect(e.kind).toBe("trailing-input");
    expect(e.pos).toBe(1);
    expect(e.alternative).toBe("integer");
  });

  it("stops at the first partial match", () => {
    const e = rejected("1.5e");
    expect(e.kind).toBe("trailing-input");
    expect(e.pos).toBe(3);
    expect(e.alternative).toBe("float");
  });

  it("lists every alternative when nothing matches", () => {
    const e = rejected("@");
    expect(e.kind).toBe("syntax");
    expect(e.pos).toBe(0);
    expect(e.expected).toBe(
      '"null" or duration or boolean or string or datetime or date or time or GUID or float or integer or binary'
    );
    expect(e.message.split("\n")[0]).toBe(
      'Parse error at line 1, col 1: expected "null" or duration or boolean or string or datetime or date or time or GUID or float or integer or binary'
    );
  });

  it("reports an unterminated string at the end of input", () => {
    const e = rejected("'unterminated");
    expect(e.kind).toBe("syntax");
    expect(e.pos).toBe(13);
    expect(e.alternative).toBe("string");
    expect(e.expected).toBe(`"'"`);
  });

  it("rejects empty input", () => {
    const e = rejected("");
    expect(e.kind).toBe("syntax");
    expect(e.pos).toBe(0);
  });

  it("throws from the OrThrow variant", () => {
    expect(() => parseLiteralOrThrow("@")).toThrow(ParseError);
    expect(parseLiteralOrThrow("true")).toEqual({ kind: "boolean", value: true });
  });
});

describe("createLiteralParser", () => {
  it("parses a literal embedded in a longer input", () => {
    expect(primitiveLiteral.parse("x eq 42", 5)).toEqual({
      ok: true,
      value: { kind: "integer", value: 42n },
      pos: 7,
    });
  });

  it("honours options", () => {
    const strict = createLiteralParser({ requireDurationKeyword: true });
    expect(strict.parseAll("'P1D'")).toEqual({ kind: "string", value: "P1D" });
  });
});
