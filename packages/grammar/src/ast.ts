/**
 * Values produced by the OData literal and name parsers.
 *
 * Every value is frozen on construction and owns its payload; nothing points
 * back into the parsed text.
 */

/** A proleptic Gregorian calendar date. `year` may be zero or negative. */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/** A time of day. `hour` ranges over 0–24. */
export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly nanosecond: number;
}

export interface DateTimeOffset {
  readonly date: CalendarDate;
  readonly time: TimeOfDay;
  /** Signed offset from UTC in minutes; 0 is UTC. */
  readonly offsetMinutes: number;
}

/** A signed elapsed time. */
export interface Duration {
  readonly nanoseconds: bigint;
}

export type Literal =
  | { readonly kind: "null" }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "integer"; readonly value: bigint }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "guid"; readonly value: string }
  | { readonly kind: "date"; readonly value: CalendarDate }
  | { readonly kind: "time"; readonly value: TimeOfDay }
  | { readonly kind: "dateTimeOffset"; readonly value: DateTimeOffset }
  | { readonly kind: "duration"; readonly value: Duration }
  | { readonly kind: "binary"; readonly value: Uint8Array };

export type LiteralKind = Literal["kind"];

export type Name =
  | { readonly kind: "identifier"; readonly name: string }
  | { readonly kind: "qualified"; readonly segments: readonly string[] };

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function nullLiteral(): Literal {
  return frozen({ kind: "null" });
}

export function booleanLiteral(value: boolean): Literal {
  return frozen({ kind: "boolean", value });
}

/** @throws RangeError when `value` does not fit in a signed 64-bit integer. */
export function integerLiteral(value: bigint): Literal {
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new RangeError(`${value} is outside the signed 64-bit range`);
  }
  return frozen({ kind: "integer", value });
}

export function floatLiteral(value: number): Literal {
  return frozen({ kind: "float", value });
}

export function stringLiteral(value: string): Literal {
  return frozen({ kind: "string", value });
}

export function guidLiteral(value: string): Literal {
  return frozen({ kind: "guid", value });
}

export function dateLiteral(date: CalendarDate): Literal {
  return frozen({ kind: "date", value: freezeDate(date) });
}

export function timeLiteral(time: TimeOfDay): Literal {
  return frozen({ kind: "time", value: freezeTime(time) });
}

export function dateTimeOffsetLiteral(value: DateTimeOffset): Literal {
  return frozen({
    kind: "dateTimeOffset",
    value: Object.freeze({
      date: freezeDate(value.date),
      time: freezeTime(value.time),
      offsetMinutes: value.offsetMinutes,
    }),
  });
}

export function durationLiteral(nanoseconds: bigint): Literal {
  return frozen({ kind: "duration", value: Object.freeze({ nanoseconds }) });
}

/** Copies `bytes`; typed arrays cannot be frozen, so the copy is the value's own. */
export function binaryLiteral(bytes: Uint8Array): Literal {
  return frozen({ kind: "binary", value: Uint8Array.from(bytes) });
}

export function identifierName(name: string): Name {
  return Object.freeze<Name>({ kind: "identifier", name });
}

/** Builds a name from its segments; a single segment is an identifier. */
export function qualifiedName(segments: readonly string[]): Name {
  if (segments.length === 0) {
    throw new RangeError("a qualified name needs at least one segment");
  }
  if (segments.length === 1) return identifierName(segments[0]);
  return Object.freeze<Name>({ kind: "qualified", segments: Object.freeze([...segments]) });
}

function frozen(literal: Literal): Literal {
  return Object.freeze(literal);
}

function freezeDate({ year, month, day }: CalendarDate): CalendarDate {
  return Object.freeze({ year, month, day });
}

function freezeTime({ hour, minute, second, nanosecond }: TimeOfDay): TimeOfDay {
  return Object.freeze({ hour, minute, second, nanosecond });
}

// ---------------------------------------------------------------------------
// Equality
// ---------------------------------------------------------------------------

/** Payload equality. NaN is not equal to itself. */
export function literalEquals(a: Literal, b: Literal): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "boolean":
      return b.kind === "boolean" && b.value === a.value;
    case "integer":
      return b.kind === "integer" && b.value === a.value;
    case "float":
      return b.kind === "float" && b.value === a.value;
    case "string":
      return b.kind === "string" && b.value === a.value;
    case "guid":
      return b.kind === "guid" && b.value === a.value;
    case "date":
      return b.kind === "date" && datesEqual(a.value, b.value);
    case "time":
      return b.kind === "time" && timesEqual(a.value, b.value);
    case "dateTimeOffset":
      return (
        b.kind === "dateTimeOffset" &&
        datesEqual(a.value.date, b.value.date) &&
        timesEqual(a.value.time, b.value.time) &&
        a.value.offsetMinutes === b.value.offsetMinutes
      );
    case "duration":
      return b.kind === "duration" && a.value.nanoseconds === b.value.nanoseconds;
    case "binary":
      return b.kind === "binary" && bytesEqual(a.value, b.value);
  }
}

export function nameEquals(a: Name, b: Name): boolean {
  if (a.kind === "identifier") return b.kind === "identifier" && a.name === b.name;
  return (
    b.kind === "qualified" &&
    a.segments.length === b.segments.length &&
    a.segments.every((s, i) => s === b.segments[i])
  );
}

function datesEqual(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

function timesEqual(a: TimeOfDay, b: TimeOfDay): boolean {
  return (
    a.hour === b.hour &&
    a.minute === b.minute &&
    a.second === b.second &&
    a.nanosecond === b.nanosecond
  );
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}
