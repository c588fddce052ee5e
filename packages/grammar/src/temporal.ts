/**
 * Date, time, date-time-with-offset and duration parsers.
 *
 * Years take an optional minus sign and exactly four digits. Month, day, hour,
 * minute and second take exactly two digits and are range-checked; a value out
 * of range is a domain failure at that component, as is a day the month does
 * not have.
 */

import {
  alt,
  between,
  char,
  label,
  literalNoCase,
  map,
  oneOf,
  optional,
  preceded,
  seq,
  seq3,
  takeWhile1,
  takeWhileMN,
  terminated,
  spanned,
  tryMap,
  type Checked,
  type Parser,
  type Spanned,
} from "@odata-literal/parser";
import {
  dateLiteral,
  dateTimeOffsetLiteral,
  durationLiteral,
  timeLiteral,
  type CalendarDate,
  type Literal,
  type TimeOfDay,
} from "./ast.js";
import { isDigit } from "./chars.js";

export const NANOS_PER_SECOND = 1_000_000_000n;
export const NANOS_PER_MINUTE = 60n * NANOS_PER_SECOND;
export const NANOS_PER_HOUR = 60n * NANOS_PER_MINUTE;
export const NANOS_PER_DAY = 24n * NANOS_PER_HOUR;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Days in `month` (1–12) of `year` in the proleptic Gregorian calendar. */
export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1];
}

export function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

/** `2023`, `-0001`. */
export function formatYear(year: number): string {
  return year < 0 ? `-${pad(-year, 4)}` : pad(year, 4);
}

/** Right-pad fraction digits to nanoseconds, dropping digits past the ninth. */
function toNanos(digits: string): string {
  return digits.padEnd(9, "0").slice(0, 9);
}

type Field = Spanned<number>;

const field = (what: string): Parser<Field> =>
  spanned(map(takeWhileMN(isDigit, 2, 2, `two-digit ${what}`), Number));

/** Reject `f` unless it lies in [min, max]. */
function outOfRange(f: Field, min: number, max: number, what: string): Checked<never> | undefined {
  if (f.value >= min && f.value <= max) return undefined;
  return { ok: false, expected: `${what} between ${pad(min, 2)} and ${pad(max, 2)}`, pos: f.start };
}

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

export const year: Parser<number> = map(
  seq(optional(char("-")), takeWhileMN(isDigit, 4, 4, "four-digit year")),
  ([sign, digits]) => {
    const n = Number(digits);
    return sign !== null && n !== 0 ? -n : n;
  }
);

/** 1–12 digits after the decimal point, as nanoseconds (truncated, never rounded). */
export const fractionalSeconds: Parser<number> = map(
  takeWhileMN(isDigit, 1, 12, "fractional seconds"),
  (digits) => Number(toNanos(digits))
);

// The shapes are recognised first and range-checked afterwards, so a token
// that merely starts like a date or time is a syntax mismatch, not an invalid
// date or time.

type DateFields = [number, Field, Field];
type TimeFields = [Field, Field, [Field, number | null] | null];
type OffsetFields = "Z" | [string, Field, Field];

const dateFields: Parser<DateFields> = seq3(
  year,
  preceded(char("-"), field("month")),
  preceded(char("-"), field("day"))
);

const timeFields: Parser<TimeFields> = seq3(
  field("hour"),
  preceded(char(":"), field("minute")),
  optional(preceded(char(":"), seq(field("second"), optional(preceded(char("."), fractionalSeconds)))))
);

const offsetFields: Parser<OffsetFields> = alt(
  map(literalNoCase("Z"), (): "Z" => "Z"),
  seq3(oneOf("+-"), field("hour"), preceded(char(":"), field("minute")))
);

function validateDate([y, m, d]: DateFields): Checked<CalendarDate> {
  const invalid = outOfRange(m, 1, 12, "month") ?? outOfRange(d, 1, 31, "day");
  if (invalid) return invalid;
  const last = daysInMonth(y, m.value);
  if (d.value > last) {
    return {
      ok: false,
      expected: `a day between 01 and ${last} for ${formatYear(y)}-${pad(m.value, 2)}`,
      pos: d.start,
    };
  }
  return { ok: true, value: { year: y, month: m.value, day: d.value } };
}

function validateTime([h, m, s]: TimeFields): Checked<TimeOfDay> {
  const invalid =
    outOfRange(h, 0, 24, "hour") ??
    outOfRange(m, 0, 59, "minute") ??
    (s ? outOfRange(s[0], 0, 59, "second") : undefined);
  if (invalid) return invalid;
  return {
    ok: true,
    value: { hour: h.value, minute: m.value, second: s?.[0].value ?? 0, nanosecond: s?.[1] ?? 0 },
  };
}

/** Signed minutes east of UTC. */
function validateOffset(offset: OffsetFields | null): Checked<number> {
  if (offset === null || offset === "Z") return { ok: true, value: 0 };
  const [sign, h, m] = offset;
  const invalid = outOfRange(h, 0, 24, "offset hour") ?? outOfRange(m, 0, 59, "offset minute");
  if (invalid) return invalid;
  const minutes = h.value * 60 + m.value;
  return { ok: true, value: sign === "-" && minutes !== 0 ? -minutes : minutes };
}

// ---------------------------------------------------------------------------
// Dates and times
// ---------------------------------------------------------------------------

export const calendarDate: Parser<CalendarDate> = tryMap(dateFields, validateDate);

export const timeOfDay: Parser<TimeOfDay> = tryMap(timeFields, validateTime);

/** `Z`/`z` or `±hh:mm`, in signed minutes. */
export const utcOffset: Parser<number> = tryMap(offsetFields, validateOffset);

export const date: Parser<Literal> = label(map(calendarDate, dateLiteral), "date");

export const time: Parser<Literal> = label(map(timeOfDay, timeLiteral), "time");

/** Date `T` time, then an optional offset defaulting to UTC. */
export const dateTimeOffset: Parser<Literal> = label(
  tryMap(
    seq3(dateFields, preceded(literalNoCase("T"), timeFields), optional(offsetFields)),
    ([d, t, o]): Checked<Literal> => {
      const checkedDate = validateDate(d);
      if (!checkedDate.ok) return checkedDate;
      const checkedTime = validateTime(t);
      if (!checkedTime.ok) return checkedTime;
      const checkedOffset = validateOffset(o);
      if (!checkedOffset.ok) return checkedOffset;
      return {
        ok: true,
        value: dateTimeOffsetLiteral({
          date: checkedDate.value,
          time: checkedTime.value,
          offsetMinutes: checkedOffset.value,
        }),
      };
    }
  ),
  "datetime"
);

// ---------------------------------------------------------------------------
// Durations
// ---------------------------------------------------------------------------

const digits = takeWhile1(isDigit, "digits");

function component(unit: string, nanosPerUnit: bigint): Parser<bigint> {
  return map(terminated(digits, literalNoCase(unit)), (n) => BigInt(n) * nanosPerUnit);
}

const seconds: Parser<bigint> = map(
  terminated(seq(digits, optional(preceded(char("."), digits))), literalNoCase("S")),
  ([whole, fraction]) => BigInt(whole) * NANOS_PER_SECOND + BigInt(toNanos(fraction ?? ""))
);

const timeComponents = preceded(
  literalNoCase("T"),
  seq3(
    optional(component("H", NANOS_PER_HOUR)),
    optional(component("M", NANOS_PER_MINUTE)),
    optional(seconds)
  )
);

/** `[±]P[nD][T[nH][nM][n[.f]S]]` in nanoseconds. Missing components are zero. */
export const durationValue: Parser<bigint> = map(
  seq3(
    optional(oneOf("+-")),
    preceded(literalNoCase("P"), optional(component("D", NANOS_PER_DAY))),
    optional(timeComponents)
  ),
  ([sign, days, timePart]) => {
    let total = days ?? 0n;
    if (timePart) {
      const [h, m, s] = timePart;
      total += (h ?? 0n) + (m ?? 0n) + (s ?? 0n);
    }
    return sign === "-" ? -total : total;
  }
);

const quotedDuration = between(char("'"), durationValue, char("'"));

/**
 * `duration'…'`, or the bare `'…'` form unless `requireKeyword` is set.
 * The keyword is case-insensitive.
 */
export function duration(requireKeyword = false): Parser<Literal> {
  const keyword = literalNoCase("duration");
  const prefixed = requireKeyword
    ? preceded(keyword, quotedDuration)
    : preceded(optional(keyword), quotedDuration);
  return label(map(prefixed, durationLiteral), "duration");
}
