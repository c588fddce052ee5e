/**
 * JSON-safe projections of literals and names.
 */

import type { CalendarDate, Literal, LiteralKind, Name, TimeOfDay } from "./ast.js";
import { formatFloat } from "./format.js";

export type JSONValue =
  | null
  | boolean
  | number
  | string
  | JSONValue[]
  | { [key: string]: JSONValue };

export interface LiteralJSON {
  kind: LiteralKind;
  value: JSONValue;
}

/**
 * Bigints (integers, duration nanoseconds) become decimal strings, bytes
 * become unpadded base64url and non-finite floats their literal spelling.
 */
export function literalToJSON(literal: Literal): LiteralJSON {
  switch (literal.kind) {
    case "null":
      return { kind: literal.kind, value: null };
    case "boolean":
    case "string":
    case "guid":
      return { kind: literal.kind, value: literal.value };
    case "integer":
      return { kind: literal.kind, value: literal.value.toString() };
    case "float":
      return {
        kind: literal.kind,
        value: Number.isFinite(literal.value) ? literal.value : formatFloat(literal.value),
      };
    case "date":
      return { kind: literal.kind, value: dateToJSON(literal.value) };
    case "time":
      return { kind: literal.kind, value: timeToJSON(literal.value) };
    case "dateTimeOffset":
      return {
        kind: literal.kind,
        value: {
          date: dateToJSON(literal.value.date),
          time: timeToJSON(literal.value.time),
          offsetMinutes: literal.value.offsetMinutes,
        },
      };
    case "duration":
      return { kind: literal.kind, value: literal.value.nanoseconds.toString() };
    case "binary":
      return { kind: literal.kind, value: Buffer.from(literal.value).toString("base64url") };
  }
}

export function nameToJSON(name: Name): { kind: Name["kind"]; segments: string[] } {
  return {
    kind: name.kind,
    segments: name.kind === "identifier" ? [name.name] : [...name.segments],
  };
}

function dateToJSON({ year, month, day }: CalendarDate): JSONValue {
  return { year, month, day };
}

function timeToJSON({ hour, minute, second, nanosecond }: TimeOfDay): JSONValue {
  return { hour, minute, second, nanosecond };
}
