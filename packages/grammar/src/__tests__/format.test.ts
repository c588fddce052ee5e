import { describe, it, expect } from "vitest";
import {
  binaryLiteral,
  dateTimeOffsetLiteral,
  durationLiteral,
  floatLiteral,
  formatDuration,
  formatFloat,
  formatLiteral,
  formatName,
  formatOffset,
  integerLiteral,
  literalEquals,
  literalToJSON,
  nameToJSON,
  parseLiteralOrThrow,
  parseNameOrThrow,
  timeLiteral,
} from "../index.js";

describe("formatLiteral", () => {
  it.each([
    ["null", "null"],
    ["TRUE", "true"],
    ["'g''day sir'", "'g''day sir'"],
    ["1.0", "1.0"],
    ["-0.0", "-0.0"],
    ["1e21", "1e+21"],
    ["1.5E3", "1500.0"],
    ["-INF", "-INF"],
    ["007", "7"],
    ["01234567-89ab-cdef-0123-456789ABCDEF", "01234567-89ab-cdef-0123-456789ABCDEF"],
    ["-0001-01-01", "-0001-01-01"],
    ["12:30", "12:30:00"],
    ["01:02:03.100", "01:02:03.1"],
    ["2023-01-01T00:00:00-05:30", "2023-01-01T00:00:00-05:30"],
    ["2023-01-01T12:30+00:00", "2023-01-01T12:30:00Z"],
    ["'P1D'", "duration'P1D'"],
    ["duration'-P1D'", "duration'-P1D'"],
    ["duration'PT90M'", "duration'PT1H30M'"],
    ["duration'P1DT2H3M4.5S'", "duration'P1DT2H3M4.5S'"],
    ["duration'PT0S'", "duration'PT0S'"],
    ["binary'aGk='", "binary'aGk'"],
    ["binary'-_8B'", "binary'-_8B'"],
  ])("renders %s as %s", (text, canonical) => {
    expect(formatLiteral(parseLiteralOrThrow(text))).toBe(canonical);
  });

  it.each([
    integerLiteral(-9223372036854775808n),
    floatLiteral(0.1),
    floatLiteral(-1.5e-7),
    floatLiteral(Number.POSITIVE_INFINITY),
    timeLiteral({ hour: 24, minute: 0, second: 0, nanosecond: 1 }),
    dateTimeOffsetLiteral({
      date: { year: 0, month: 2, day: 29 },
      time: { hour: 23, minute: 59, second: 59, nanosecond: 999999999 },
      offsetMinutes: 840,
    }),
    durationLiteral(-1n),
    durationLiteral(123_456_789_000_000_001n),
    binaryLiteral(new Uint8Array([0, 255, 128, 7])),
  ])("round-trips %o", (literal) => {
    expect(literalEquals(parseLiteralOrThrow(formatLiteral(literal)), literal)).toBe(true);
  });

  it("round-trips NaN as NaN", () => {
    const reparsed = parseLiteralOrThrow(formatLiteral(floatLiteral(Number.NaN)));
    expect(reparsed.kind === "float" && Number.isNaN(reparsed.value)).toBe(true);
  });
});

describe("component formatters", () => {
  it("formats floats that read back as floats", () => {
    expect(formatFloat(3)).toBe("3.0");
    expect(formatFloat(0.25)).toBe("0.25");
    expect(formatFloat(Number.NaN)).toBe("NaN");
  });

  it("formats offsets", () => {
    expect(formatOffset(0)).toBe("Z");
    expect(formatOffset(-330)).toBe("-05:30");
    expect(formatOffset(60)).toBe("+01:00");
  });

  it("formats sub-second durations", () => {
    expect(formatDuration(1n)).toBe("duration'PT0.000000001S'");
    expect(formatDuration(-1_500_000_000n)).toBe("duration'-PT1.5S'");
  });

  it("formats names", () => {
    expect(formatName(parseNameOrThrow("Sales.Orders"))).toBe("Sales.Orders");
    expect(formatName(parseNameOrThrow("Orders"))).toBe("Orders");
  });
});

describe("literalToJSON", () => {
  it("writes bigints as decimal strings", () => {
    expect(literalToJSON(parseLiteralOrThrow("9223372036854775807"))).toEqual({
      kind: "integer",
      value: "9223372036854775807",
    });
    expect(literalToJSON(parseLiteralOrThrow("'P1D'"))).toEqual({
      kind: "duration",
      value: "86400000000000",
    });
  });

  it("spells out non-finite floats", () => {
    expect(literalToJSON(floatLiteral(Number.NEGATIVE_INFINITY))).toEqual({
      kind: "float",
      value: "-INF",
    });
    expect(literalToJSON(floatLiteral(2.5))).toEqual({ kind: "float", value: 2.5 });
  });

  it("writes temporal values as plain objects", () => {
    expect(literalToJSON(parseLiteralOrThrow("2023-01-02T03:04Z"))).toEqual({
      kind: "dateTimeOffset",
      value: {
        date: { year: 2023, month: 1, day: 2 },
        time: { hour: 3, minute: 4, second: 0, nanosecond: 0 },
        offsetMinutes: 0,
      },
    });
  });

  it("writes bytes as unpadded base64url", () => {
    expect(literalToJSON(binaryLiteral(new Uint8Array([251, 255, 1])))).toEqual({
      kind: "binary",
      value: "-_8B",
    });
  });

  it("produces values JSON.stringify accepts", () => {
    expect(JSON.stringify(literalToJSON(parseLiteralOrThrow("null")))).toBe(
      '{"kind":"null","value":null}'
    );
  });
});

describe("nameToJSON", () => {
  it("lists segments for both name kinds", () => {
    expect(nameToJSON(parseNameOrThrow("a"))).toEqual({ kind: "identifier", segments: ["a"] });
    expect(nameToJSON(parseNameOrThrow("a.b"))).toEqual({ kind: "qualified", segments: ["a", "b"] });
  });
});
