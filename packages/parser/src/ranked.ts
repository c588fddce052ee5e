/**
 * Ranked alternatives: an explicit, ordered list of named parsers tried in
 * sequence against the same position. The first success wins.
 *
 * `parseComplete` is the top-level entry: it requires the winning alternative
 * to consume the whole input and turns every other outcome into a `ParseError`
 * that names the alternative responsible.
 */

import { ParseError, mergeFailures } from "./combinators.js";
import type { Alternative, ParseFailure, Parser, ParseResult } from "./types.js";

/** Result of a top-level parse: never thrown, always reported. */
export type Outcome<T> =
  | { readonly ok: true; readonly value: T; readonly alternative: string }
  | { readonly ok: false; readonly error: ParseError };

/** Build a parser trying `alternatives` in order. */
export function rankedChoice<T>(alternatives: readonly Alternative<T>[]): Parser<T> {
  return {
    parse(input: string, pos = 0): ParseResult<T> {
      let failure: ParseFailure | undefined;
      for (const { parser } of alternatives) {
        const r = parser.parse(input, pos);
        if (r.ok) return r;
        failure = failure ? mergeFailures(failure, r) : r;
      }
      return failure ?? { ok: false, pos, expected: "an alternative", kind: "syntax" };
    },
    parseAll(input: string): T {
      const outcome = parseComplete(alternatives, input);
      if (!outcome.ok) throw outcome.error;
      return outcome.value;
    },
  };
}

interface AttemptedFailure {
  readonly alternative: string;
  readonly failure: ParseFailure;
}

/**
 * Parse the whole of `input` with the first alternative that matches.
 *
 * Errors, in order of preference:
 * 1. a domain failure from an alternative tried before the winner (farthest first),
 * 2. trailing input after the winner,
 * 3. a syntax failure at the farthest position any alternative reached.
 */
export function parseComplete<T>(alternatives: readonly Alternative<T>[], input: string): Outcome<T> {
  const failures: AttemptedFailure[] = [];
  let partial: { alternative: string; pos: number } | undefined;

  for (const { name, parser } of alternatives) {
    const r = parser.parse(input, 0);
    if (r.ok) {
      if (r.pos === input.length) {
        return { ok: true, value: r.value, alternative: name };
      }
      partial = { alternative: name, pos: r.pos };
      break;
    }
    failures.push({ alternative: name, failure: r });
  }

  const domain = farthest(failures.filter((f) => f.failure.kind === "domain"));
  if (domain) {
    return reject(input, domain.failure.pos, domain.failure.expected, "domain", domain.alternative);
  }

  if (partial) {
    return reject(input, partial.pos, "end of input", "trailing-input", partial.alternative);
  }

  const syntax = farthest(failures);
  if (!syntax) {
    return reject(input, 0, "an alternative", "syntax", undefined);
  }
  const expected = [
    ...new Set(failures.filter((f) => f.failure.pos === syntax.failure.pos).map((f) => f.failure.expected)),
  ].join(" or ");
  return reject(input, syntax.failure.pos, expected, "syntax", syntax.alternative);
}

/** First of the failures that got farthest into the input. */
function farthest(failures: readonly AttemptedFailure[]): AttemptedFailure | undefined {
  let best: AttemptedFailure | undefined;
  for (const f of failures) {
    if (!best || f.failure.pos > best.failure.pos) best = f;
  }
  return best;
}

function reject<T>(
  input: string,
  pos: number,
  expected: string,
  kind: ParseError["kind"],
  alternative: string | undefined
): Outcome<T> {
  return { ok: false, error: new ParseError(input, pos, expected, { kind, alternative }) };
}
