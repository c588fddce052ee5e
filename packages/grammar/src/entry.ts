/**
 * Top-level entry points. Each requires the whole input to be consumed and
 * reports failures as a structured `ParseError` instead of throwing.
 */

import { parseComplete, type Outcome } from "@odata-literal/parser";
import type { Literal, Name } from "./ast.js";
import { literalAlternatives, type LiteralOptions } from "./literal.js";
import { NAME_ALTERNATIVES } from "./name.js";

export type Token =
  | { readonly kind: "literal"; readonly literal: Literal }
  | { readonly kind: "name"; readonly name: Name };

export function parseLiteral(text: string, options: LiteralOptions = {}): Outcome<Literal> {
  return parseComplete(literalAlternatives(options), text);
}

export function parseName(text: string): Outcome<Name> {
  return parseComplete(NAME_ALTERNATIVES, text);
}

/**
 * A literal if the whole token is one, otherwise a name. On failure the
 * literal error is reported unless the name parser got further.
 */
export function parseToken(text: string, options: LiteralOptions = {}): Outcome<Token> {
  const asLiteral = parseLiteral(text, options);
  if (asLiteral.ok) {
    return {
      ok: true,
      value: { kind: "literal", literal: asLiteral.value },
      alternative: asLiteral.alternative,
    };
  }
  const asName = parseName(text);
  if (asName.ok) {
    return { ok: true, value: { kind: "name", name: asName.value }, alternative: asName.alternative };
  }
  if (asLiteral.error.kind !== "domain" && asName.error.pos > asLiteral.error.pos) {
    return asName;
  }
  return asLiteral;
}

/** @throws ParseError */
export function parseLiteralOrThrow(text: string, options: LiteralOptions = {}): Literal {
  const outcome = parseLiteral(text, options);
  if (!outcome.ok) throw outcome.error;
  return outcome.value;
}

/** @throws ParseError */
export function parseNameOrThrow(text: string): Name {
  const outcome = parseName(text);
  if (!outcome.ok) throw outcome.error;
  return outcome.value;
}
