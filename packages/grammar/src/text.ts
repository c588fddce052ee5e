/**
 * Quoted string and binary literal parsers.
 */

import {
  alt,
  between,
  char,
  commit,
  label,
  literal,
  literalNoCase,
  many,
  map,
  preceded,
  takeWhile,
  takeWhile1,
  terminated,
  tryMap,
  value,
  type Checked,
  type Parser,
} from "@odata-literal/parser";
import { binaryLiteral, stringLiteral, type Literal } from "./ast.js";
import { isBase64UrlChar } from "./chars.js";

const stringPart = alt(
  value(literal("''"), "'"),
  takeWhile1((c) => c !== "'", "string character")
);

/** Apostrophe-delimited text in which `''` stands for one apostrophe. */
export const quotedString: Parser<string> = map(
  between(char("'"), many(stringPart), char("'")),
  (parts) => parts.join("")
);

export const string: Parser<Literal> = label(map(quotedString, stringLiteral), "string");

const BASE64URL = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_";

/**
 * Decode URL-safe base64, with or without `=` padding.
 *
 * Padding may be complete, short or missing. Rejects misplaced or excess
 * padding, a length no encoder produces and non-zero bits in the last
 * character.
 */
export function decodeBase64Url(text: string): Checked<Uint8Array> {
  const padStart = text.indexOf("=");
  const data = padStart === -1 ? text : text.slice(0, padStart);
  const padding = text.length - data.length;

  for (const c of data) {
    if (!BASE64URL.includes(c)) {
      return { ok: false, expected: "base64url characters" };
    }
  }
  if (/[^=]/.test(text.slice(data.length))) {
    return { ok: false, expected: "padding only at the end of base64url data" };
  }

  const rem = data.length % 4;
  if (rem === 1) {
    return { ok: false, expected: "base64url data of a valid length" };
  }
  if (padding > 0 && (rem === 0 || padding > 4 - rem)) {
    return { ok: false, expected: "padding consistent with the base64url data length" };
  }
  if (rem !== 0) {
    const last = BASE64URL.indexOf(data[data.length - 1]);
    const unused = rem === 2 ? 0b1111 : 0b11;
    if ((last & unused) !== 0) {
      return { ok: false, expected: "zero trailing bits in base64url data" };
    }
  }

  return { ok: true, value: Uint8Array.from(Buffer.from(data, "base64url")) };
}

const base64Body = terminated(
  takeWhile(isBase64UrlChar),
  label(char("'"), "a base64url character or closing \"'\"")
);

/** `binary'…'` with base64url content; everything after the prefix is committed. */
export const binary: Parser<Literal> = label(
  map(
    preceded(literalNoCase("binary'"), commit(tryMap(base64Body, decodeBase64Url))),
    binaryLiteral
  ),
  "binary"
);
