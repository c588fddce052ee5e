/**
 * Single-character predicates used by the literal and name grammars.
 * Each takes one code point as a string.
 */

const ALPHABETIC = /^\p{Alphabetic}$/u;
const ALPHANUMERIC = /^[\p{Alphabetic}\p{N}]$/u;

export function isDigit(c: string): boolean {
  return c >= "0" && c <= "9" && c.length === 1;
}

export function isHexDigit(c: string): boolean {
  return isDigit(c) || (c >= "a" && c <= "f") || (c >= "A" && c <= "F");
}

/** First character of an identifier: a Unicode letter or `_`. */
export function isIdentifierLeading(c: string): boolean {
  return c === "_" || ALPHABETIC.test(c);
}

/** Any later character of an identifier: a Unicode letter, number or `_`. */
export function isIdentifierChar(c: string): boolean {
  return c === "_" || ALPHANUMERIC.test(c);
}

/** The URL-safe base64 alphabet plus the `=` padding character. */
export function isBase64UrlChar(c: string): boolean {
  return (
    isDigit(c) ||
    (c >= "a" && c <= "z") ||
    (c >= "A" && c <= "Z") ||
    c === "-" ||
    c === "_" ||
    c === "="
  );
}
