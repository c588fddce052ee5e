import { describe, it, expect } from "vitest";
import { ParseError, identifier, parseName, parseNameOrThrow, parseToken } from "../index.js";

describe("parseName", () => {
  it("reads a single identifier", () => {
    expect(parseName("a")).toEqual({
      ok: true,
      value: { kind: "identifier", name: "a" },
      alternative: "name",
    });
  });

  it("reads a dotted name", () => {
    expect(parseNameOrThrow("a.b.c")).toEqual({ kind: "qualified", segments: ["a", "b", "c"] });
  });

  it("accepts underscores, digits and Unicode letters", () => {
    expect(parseNameOrThrow("_Ünïcode2.x_1")).toEqual({
      kind: "qualified",
      segments: ["_Ünïcode2", "x_1"],
    });
  });

  it("rejects a leading digit", () => {
    const outcome = parseName("1abc");
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("syntax");
    expect(outcome.error.pos).toBe(0);
    expect(outcome.error.expected).toBe("name");
  });

  it("leaves a trailing dot as trailing input", () => {
    const outcome = parseName("a.");
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("trailing-input");
    expect(outcome.error.pos).toBe(1);
  });

  it("stops before an empty segment", () => {
    expect(() => parseNameOrThrow("a..b")).toThrow(ParseError);
  });

  it("reads astral letters as one character", () => {
    expect(identifier.parse("𝒳y")).toEqual({ ok: true, value: "𝒳y", pos: 3 });
  });
});

describe("parseToken", () => {
  it("prefers a literal", () => {
    expect(parseToken("true")).toEqual({
      ok: true,
      value: { kind: "literal", literal: { kind: "boolean", value: true } },
      alternative: "boolean",
    });
  });

  it("falls back to a name when no literal covers the token", () => {
    expect(parseToken("nullable")).toEqual({
      ok: true,
      value: { kind: "name", name: { kind: "identifier", name: "nullable" } },
      alternative: "name",
    });
    expect(parseToken("Edm.String")).toEqual({
      ok: true,
      value: { kind: "name", name: { kind: "qualified", segments: ["Edm", "String"] } },
      alternative: "name",
    });
  });

  it("keeps a literal's domain error", () => {
    const outcome = parseToken("2023-02-29");
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("domain");
    expect(outcome.error.alternative).toBe("date");
  });

  it("reports the name error when the name got further", () => {
    const outcome = parseToken("x y");
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("trailing-input");
    expect(outcome.error.pos).toBe(1);
    expect(outcome.error.alternative).toBe("name");
  });

  it("reports the literal error otherwise", () => {
    const outcome = parseToken("@");
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.pos).toBe(0);
    expect(outcome.error.alternative).toBe("null");
  });

  it("passes literal options through", () => {
    const outcome = parseToken("'P1D'", { requireDurationKeyword: true });
    expect(outcome.ok && outcome.value).toEqual({
      kind: "literal",
      literal: { kind: "string", value: "P1D" },
    });
  });
});
