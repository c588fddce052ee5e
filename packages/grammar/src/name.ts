/**
 * Identifiers and dot-separated qualified names.
 */

import {
  char,
  label,
  map,
  recognize,
  satisfy,
  sepBy1,
  seq,
  takeWhile,
  type Alternative,
  type Parser,
} from "@odata-literal/parser";
import { qualifiedName, type Name } from "./ast.js";
import { isIdentifierChar, isIdentifierLeading } from "./chars.js";

export const identifier: Parser<string> = recognize(
  seq(satisfy(isIdentifierLeading, "identifier"), takeWhile(isIdentifierChar))
);

/** Identifiers separated by `.`; a trailing `.` is left unconsumed. */
export const optionallyQualified: Parser<string[]> = sepBy1(identifier, char("."));

export const name: Parser<Name> = label(map(optionallyQualified, qualifiedName), "name");

export const NAME_ALTERNATIVES: readonly Alternative<Name>[] = Object.freeze([
  { name: "name", parser: name },
]);
