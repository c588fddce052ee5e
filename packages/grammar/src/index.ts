/**
 * @odata-literal/grammar
 *
 * OData primitive literals and qualified names, parsed into typed values.
 *
 * @example
 * ```ts
 * import { parseLiteral, formatLiteral } from "@odata-literal/grammar";
 *
 * const outcome = parseLiteral("duration'P1DT2H'");
 * if (outcome.ok) formatLiteral(outcome.value); // → "duration'P1DT2H'"
 * else console.error(outcome.error.message);
 * ```
 *
 * @module
 */

export type {
  CalendarDate,
  DateTimeOffset,
  Duration,
  Literal,
  LiteralKind,
  Name,
  TimeOfDay,
} from "./ast.js";
export {
  INT64_MAX,
  INT64_MIN,
  binaryLiteral,
  booleanLiteral,
  dateLiteral,
  dateTimeOffsetLiteral,
  durationLiteral,
  floatLiteral,
  guidLiteral,
  identifierName,
  integerLiteral,
  literalEquals,
  nameEquals,
  nullLiteral,
  qualifiedName,
  stringLiteral,
  timeLiteral,
} from "./ast.js";

export {
  isBase64UrlChar,
  isDigit,
  isHexDigit,
  isIdentifierChar,
  isIdentifierLeading,
} from "./chars.js";

// Sub-parsers, for composition into a larger grammar
export { boolean, float, guid, integer, nullValue } from "./scalars.js";
export { binary, decodeBase64Url, quotedString, string } from "./text.js";
export {
  calendarDate,
  date,
  dateTimeOffset,
  daysInMonth,
  duration,
  durationValue,
  fractionalSeconds,
  isLeapYear,
  time,
  timeOfDay,
  utcOffset,
  year,
} from "./temporal.js";
export {
  type LiteralOptions,
  createLiteralParser,
  literalAlternatives,
  primitiveLiteral,
} from "./literal.js";
export { NAME_ALTERNATIVES, identifier, name, optionallyQualified } from "./name.js";

// Entry points
export {
  type Token,
  parseLiteral,
  parseLiteralOrThrow,
  parseName,
  parseNameOrThrow,
  parseToken,
} from "./entry.js";

export {
  formatDate,
  formatDateTimeOffset,
  formatDuration,
  formatFloat,
  formatLiteral,
  formatName,
  formatOffset,
  formatTime,
} from "./format.js";
export { type JSONValue, type LiteralJSON, literalToJSON, nameToJSON } from "./json.js";

export { ParseError, type Outcome } from "@odata-literal/parser";
