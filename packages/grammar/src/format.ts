/**
 * Canonical text for literals and names. Parsing the output of
 * `formatLiteral` yields a literal equal to the input (NaN aside, which is
 * never equal to itself).
 */

import type { DateTimeOffset, CalendarDate, Literal, Name, TimeOfDay } from "./ast.js";
import {
  NANOS_PER_DAY,
  NANOS_PER_HOUR,
  NANOS_PER_MINUTE,
  NANOS_PER_SECOND,
  formatYear,
  pad,
} from "./temporal.js";

export function formatLiteral(literal: Literal): string {
  switch (literal.kind) {
    case "null":
      return "null";
    case "boolean":
      return literal.value ? "true" : "false";
    case "integer":
      return literal.value.toString();
    case "float":
      return formatFloat(literal.value);
    case "string":
      return `'${literal.value.replace(/'/g, "''")}'`;
    case "guid":
      return literal.value;
    case "date":
      return formatDate(literal.value);
    case "time":
      return formatTime(literal.value);
    case "dateTimeOffset":
      return formatDateTimeOffset(literal.value);
    case "duration":
      return formatDuration(literal.value.nanoseconds);
    case "binary":
      return `binary'${Buffer.from(literal.value).toString("base64url")}'`;
  }
}

export function formatName(name: Name): string {
  return name.kind === "identifier" ? name.name : name.segments.join(".");
}

export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Number.POSITIVE_INFINITY) return "INF";
  if (value === Number.NEGATIVE_INFINITY) return "-INF";
  if (Object.is(value, -0)) return "-0.0";
  const text = String(value);
  return /[.e]/i.test(text) ? text : `${text}.0`;
}

export function formatDate({ year, month, day }: CalendarDate): string {
  return `${formatYear(year)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/** `hh:mm:ss`, plus the fraction without trailing zeros when there is one. */
export function formatTime({ hour, minute, second, nanosecond }: TimeOfDay): string {
  const base = `${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}`;
  return nanosecond === 0 ? base : `${base}.${trimFraction(pad(nanosecond, 9))}`;
}

export function formatOffset(offsetMinutes: number): string {
  if (offsetMinutes === 0) return "Z";
  const abs = Math.abs(offsetMinutes);
  const sign = offsetMinutes < 0 ? "-" : "+";
  return `${sign}${pad(Math.floor(abs / 60), 2)}:${pad(abs % 60, 2)}`;
}

export function formatDateTimeOffset({ date, time, offsetMinutes }: DateTimeOffset): string {
  return `${formatDate(date)}T${formatTime(time)}${formatOffset(offsetMinutes)}`;
}

export function formatDuration(nanoseconds: bigint): string {
  const sign = nanoseconds < 0n ? "-" : "";
  let rest = nanoseconds < 0n ? -nanoseconds : nanoseconds;

  const days = rest / NANOS_PER_DAY;
  rest %= NANOS_PER_DAY;
  const hours = rest / NANOS_PER_HOUR;
  rest %= NANOS_PER_HOUR;
  const minutes = rest / NANOS_PER_MINUTE;
  rest %= NANOS_PER_MINUTE;
  const seconds = rest / NANOS_PER_SECOND;
  const fraction = rest % NANOS_PER_SECOND;

  let timePart = "";
  if (hours > 0n) timePart += `${hours}H`;
  if (minutes > 0n) timePart += `${minutes}M`;
  if (fraction > 0n) {
    timePart += `${seconds}.${trimFraction(fraction.toString().padStart(9, "0"))}S`;
  } else if (seconds > 0n) {
    timePart += `${seconds}S`;
  }

  let body = days > 0n ? `${days}D` : "";
  if (timePart) body += `T${timePart}`;
  return `duration'${sign}P${body || "T0S"}'`;
}

function trimFraction(digits: string): string {
  return digits.replace(/0+$/, "");
}
