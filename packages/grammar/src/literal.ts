/**
 * The primitive-literal dispatcher: an explicit ranked list of literal parsers
 * tried in order against the same position. The first success wins.
 *
 * The order matters. A bare quoted value shaped like a duration (`'P1D'`) is a
 * duration because durations are tried before strings; set
 * `requireDurationKeyword` to only accept `duration'…'`.
 */

import { rankedChoice, type Alternative, type Parser } from "@odata-literal/parser";
import type { Literal } from "./ast.js";
import { boolean, float, guid, integer, nullValue } from "./scalars.js";
import { date, dateTimeOffset, duration, time } from "./temporal.js";
import { binary, string } from "./text.js";

export interface LiteralOptions {
  /** Only accept durations written with the `duration` keyword. Default `false`. */
  requireDurationKeyword?: boolean;
}

function buildAlternatives(requireDurationKeyword: boolean): readonly Alternative<Literal>[] {
  return Object.freeze([
    { name: "null", parser: nullValue },
    { name: "duration", parser: duration(requireDurationKeyword) },
    { name: "boolean", parser: boolean },
    { name: "string", parser: string },
    { name: "datetime", parser: dateTimeOffset },
    { name: "date", parser: date },
    { name: "time", parser: time },
    { name: "guid", parser: guid },
    { name: "float", parser: float },
    { name: "integer", parser: integer },
    { name: "binary", parser: binary },
  ]);
}

const DEFAULT_ALTERNATIVES = buildAlternatives(false);
const KEYWORD_DURATION_ALTERNATIVES = buildAlternatives(true);

/** The ranked literal alternatives for the given options. */
export function literalAlternatives(options: LiteralOptions = {}): readonly Alternative<Literal>[] {
  return options.requireDurationKeyword ? KEYWORD_DURATION_ALTERNATIVES : DEFAULT_ALTERNATIVES;
}

/** A literal parser that may stop before the end of the input. */
export function createLiteralParser(options: LiteralOptions = {}): Parser<Literal> {
  return rankedChoice(literalAlternatives(options));
}

/** `primitiveLiteral` with default options. */
export const primitiveLiteral: Parser<Literal> = createLiteralParser();
