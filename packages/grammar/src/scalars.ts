/**
 * Scalar literal parsers: null, boolean, integer, float and GUID.
 */

import {
  alt,
  char,
  choice,
  commit,
  count,
  label,
  literal,
  literalNoCase,
  map,
  oneOf,
  optional,
  recognize,
  regex,
  seq,
  takeWhile1,
  takeWhileMN,
  terminated,
  tryMap,
  type Checked,
  type Parser,
} from "@odata-literal/parser";
import {
  INT64_MAX,
  INT64_MIN,
  booleanLiteral,
  floatLiteral,
  guidLiteral,
  integerLiteral,
  nullLiteral,
  type Literal,
} from "./ast.js";
import { isDigit, isHexDigit } from "./chars.js";

/** `null`, case-sensitive. */
export const nullValue: Parser<Literal> = map(literal("null"), () => nullLiteral());

/** `true` or `false` in any case. */
export const boolean: Parser<Literal> = label(
  alt(
    map(literalNoCase("true"), () => booleanLiteral(true)),
    map(literalNoCase("false"), () => booleanLiteral(false))
  ),
  "boolean"
);

const signedDigits = recognize(seq(optional(oneOf("+-")), takeWhile1(isDigit, "digit")));

/** Optionally signed decimal digits that fit a signed 64-bit integer. */
export const integer: Parser<Literal> = label(
  tryMap(signedDigits, (text): Checked<Literal> => {
    const n = BigInt(text);
    if (n < INT64_MIN || n > INT64_MAX) {
      return { ok: false, expected: `an integer between ${INT64_MIN} and ${INT64_MAX}` };
    }
    return { ok: true, value: integerLiteral(n) };
  }),
  "integer"
);

// A fraction, an exponent or both; bare digits are an integer.
const decimal = regex(
  /[+-]?[0-9]+(?:\.[0-9]+(?:[eE][+-]?[0-9]+)?|[eE][+-]?[0-9]+)/,
  "decimal number"
);

/** Decimal floats plus the special tokens `NaN`, `INF` and `-INF`. */
export const float: Parser<Literal> = label(
  choice(
    map(decimal, (text) => floatLiteral(Number(text))),
    map(literal("NaN"), () => floatLiteral(Number.NaN)),
    map(literal("INF"), () => floatLiteral(Number.POSITIVE_INFINITY)),
    map(literal("-INF"), () => floatLiteral(Number.NEGATIVE_INFINITY))
  ),
  "float"
);

const hexGroup = (n: number) => takeWhileMN(isHexDigit, n, n, `${n} hex digits`);

/**
 * 8-4-4-4-12 hex digits, kept as written. Eight hex digits and a hyphen commit
 * the token to being a GUID, after which bad grouping is a domain failure.
 */
export const guid: Parser<Literal> = label(
  map(
    recognize(
      seq(
        terminated(hexGroup(8), char("-")),
        commit(seq(count(terminated(hexGroup(4), char("-")), 3), hexGroup(12)))
      )
    ),
    guidLiteral
  ),
  "GUID"
);
