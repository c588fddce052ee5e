/**
 * Programmatic parser combinator API for @odata-literal/parser
 *
 * All combinators return `Parser<T>` values that can be composed freely.
 * PEG semantics: ordered alternation, first match wins, and a failed parser
 * never moves the position.
 */

import type {
  Checked,
  ParseErrorKind,
  ParseFailure,
  Parser,
  ParseResult,
  Spanned,
} from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Create a Parser<T> from a raw parse function. */
function mkParser<T>(parseFn: (input: string, pos: number) => ParseResult<T>): Parser<T> {
  return {
    parse(input: string, pos = 0): ParseResult<T> {
      return parseFn(input, pos);
    },
    parseAll(input: string): T {
      const result = parseFn(input, 0);
      if (!result.ok) {
        throw new ParseError(input, result.pos, result.expected, { kind: result.kind });
      }
      if (result.pos !== input.length) {
        throw new ParseError(input, result.pos, "end of input", { kind: "trailing-input" });
      }
      return result.value;
    },
  };
}

function ok<T>(value: T, pos: number): ParseResult<T> {
  return { ok: true, value, pos };
}

function fail(pos: number, expected: string, kind: ParseFailure["kind"] = "syntax"): ParseFailure {
  return { ok: false, pos, expected, kind };
}

/**
 * Pick the more informative of two failures from the same starting point.
 *
 * Domain failures outrank syntax failures, then the farthest position wins.
 * Syntax failures at the same position have their expectations joined.
 */
export function mergeFailures(a: ParseFailure, b: ParseFailure): ParseFailure {
  if (a.kind !== b.kind) return a.kind === "domain" ? a : b;
  if (a.pos !== b.pos) return a.pos > b.pos ? a : b;
  if (a.kind === "domain" || a.expected === b.expected) return a;
  return fail(a.pos, `${a.expected} or ${b.expected}`);
}

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

export interface ParseErrorOptions {
  /** Defaults to `"syntax"`. */
  kind?: ParseErrorKind;
  /** Name of the alternative the error was attributed to. */
  alternative?: string;
}

/** Descriptive parse error with position context. */
export class ParseError extends Error {
  /** Zero-based position in the input where parsing failed. */
  readonly pos: number;
  /** What the parser expected at the failure position. */
  readonly expected: string;
  readonly kind: ParseErrorKind;
  readonly alternative: string | undefined;
  /** 1-based line of `pos`. */
  readonly line: number;
  /** 1-based column of `pos`. */
  readonly column: number;

  constructor(input: string, pos: number, expected: string, options: ParseErrorOptions = {}) {
    const { line, col } = lineCol(input, pos);
    const snippet = input.slice(Math.max(0, pos - 10), pos + 20);
    const kind = options.kind ?? "syntax";
    super(`${describeKind(kind)} at line ${line}, col ${col}: expected ${expected}\n  ...${snippet}...`);
    this.name = "ParseError";
    this.pos = pos;
    this.expected = expected;
    this.kind = kind;
    this.alternative = options.alternative;
    this.line = line;
    this.column = col;
  }
}

function describeKind(kind: ParseErrorKind): string {
  switch (kind) {
    case "syntax":
      return "Parse error";
    case "domain":
      return "Invalid value";
    case "trailing-input":
      return "Unexpected trailing input";
  }
}

/** Convert a zero-based offset to 1-based line/col. */
function lineCol(input: string, pos: number): { line: number; col: number } {
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < input.length; i++) {
    if (input[i] === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/** Match an exact string literal. */
export function literal(s: string): Parser<string> {
  return mkParser((input, pos) => {
    if (input.startsWith(s, pos)) {
      return ok(s, pos + s.length);
    }
    return fail(pos, JSON.stringify(s));
  });
}

/** Match a string literal ignoring ASCII case. Yields the text as written in the input. */
export function literalNoCase(s: string): Parser<string> {
  const lower = s.toLowerCase();
  return mkParser((input, pos) => {
    const slice = input.slice(pos, pos + s.length);
    if (slice.length === s.length && slice.toLowerCase() === lower) {
      return ok(slice, pos + s.length);
    }
    return fail(pos, JSON.stringify(s));
  });
}

/** Match a single specific character. */
export function char(c: string): Parser<string> {
  return mkParser((input, pos) => {
    if (pos < input.length && input[pos] === c) {
      return ok(c, pos + 1);
    }
    return fail(pos, JSON.stringify(c));
  });
}

/** Match one character out of `chars`. */
export function oneOf(chars: string): Parser<string> {
  const expected = [...chars].map((c) => JSON.stringify(c)).join(" or ");
  return mkParser((input, pos) => {
    if (pos < input.length && chars.includes(input[pos])) {
      return ok(input[pos], pos + 1);
    }
    return fail(pos, expected);
  });
}

/** Read the code point at `pos` as a string, or undefined at end of input. */
function codePointAt(input: string, pos: number): string | undefined {
  const cp = input.codePointAt(pos);
  return cp === undefined ? undefined : String.fromCodePoint(cp);
}

/** Match a single character (code point) accepted by `pred`. */
export function satisfy(pred: (c: string) => boolean, expected: string): Parser<string> {
  return mkParser((input, pos) => {
    const c = codePointAt(input, pos);
    if (c !== undefined && pred(c)) {
      return ok(c, pos + c.length);
    }
    return fail(pos, expected);
  });
}

/**
 * Match between `min` and `max` characters accepted by `pred`, greedily.
 * Stops after `max` characters even if more would match.
 */
export function takeWhileMN(
  pred: (c: string) => boolean,
  min: number,
  max: number,
  expected: string
): Parser<string> {
  return mkParser((input, pos) => {
    let cur = pos;
    let count = 0;
    while (count < max) {
      const c = codePointAt(input, cur);
      if (c === undefined || !pred(c)) break;
      cur += c.length;
      count++;
    }
    if (count < min) return fail(pos, expected);
    return ok(input.slice(pos, cur), cur);
  });
}

/** Zero or more characters accepted by `pred`. Always succeeds. */
export function takeWhile(pred: (c: string) => boolean): Parser<string> {
  return takeWhileMN(pred, 0, Infinity, "");
}

/** One or more characters accepted by `pred`. */
export function takeWhile1(pred: (c: string) => boolean, expected: string): Parser<string> {
  return takeWhileMN(pred, 1, Infinity, expected);
}

/** Match a regex anchored at the current position. */
export function regex(pattern: RegExp, expected = `/${pattern.source}/`): Parser<string> {
  const anchored = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "") + "y");
  return mkParser((input, pos) => {
    anchored.lastIndex = pos;
    const m = anchored.exec(input);
    if (m) {
      return ok(m[0], pos + m[0].length);
    }
    return fail(pos, expected);
  });
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/** Sequence two parsers. */
export function seq<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]> {
  return mkParser((input, pos) => {
    const ra = a.parse(input, pos);
    if (!ra.ok) return ra;
    const rb = b.parse(input, ra.pos);
    if (!rb.ok) return rb;
    return ok<[A, B]>([ra.value, rb.value], rb.pos);
  });
}

/** Sequence three parsers. */
export function seq3<A, B, C>(a: Parser<A>, b: Parser<B>, c: Parser<C>): Parser<[A, B, C]> {
  return mkParser((input, pos) => {
    const ra = a.parse(input, pos);
    if (!ra.ok) return ra;
    const rb = b.parse(input, ra.pos);
    if (!rb.ok) return rb;
    const rc = c.parse(input, rb.pos);
    if (!rc.ok) return rc;
    return ok<[A, B, C]>([ra.value, rb.value, rc.value], rc.pos);
  });
}

/** Run `prefix` then `p`, keeping only the result of `p`. */
export function preceded<P, T>(prefix: Parser<P>, p: Parser<T>): Parser<T> {
  return map(seq(prefix, p), ([, value]) => value);
}

/** Run `p` then `suffix`, keeping only the result of `p`. */
export function terminated<T, S>(p: Parser<T>, suffix: Parser<S>): Parser<T> {
  return map(seq(p, suffix), ([value]) => value);
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C>(open: Parser<O>, p: Parser<T>, close: Parser<C>): Parser<T> {
  return mkParser((input, pos) => {
    const ro = open.parse(input, pos);
    if (!ro.ok) return ro;
    const rp = p.parse(input, ro.pos);
    if (!rp.ok) return rp;
    const rc = close.parse(input, rp.pos);
    if (!rc.ok) return rc;
    return ok(rp.value, rc.pos);
  });
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/** Ordered alternation (PEG): try `a` first, then `b`. */
export function alt<A, B>(a: Parser<A>, b: Parser<B>): Parser<A | B> {
  return mkParser<A | B>((input, pos) => {
    const ra = a.parse(input, pos);
    if (ra.ok) return ra;
    const rb = b.parse(input, pos);
    if (rb.ok) return rb;
    return mergeFailures(ra, rb);
  });
}

/** Ordered alternation over any number of parsers of the same type. */
export function choice<T>(...parsers: Parser<T>[]): Parser<T> {
  return mkParser((input, pos) => {
    let failure: ParseFailure | undefined;
    for (const p of parsers) {
      const r = p.parse(input, pos);
      if (r.ok) return r;
      failure = failure ? mergeFailures(failure, r) : r;
    }
    return failure ?? fail(pos, "an alternative");
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/**
 * Zero or more repetitions. Succeeds unless a repetition fails with a
 * domain failure, which is passed through.
 */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((input, pos) => {
    const results: T[] = [];
    let cur = pos;
    for (;;) {
      const r = p.parse(input, cur);
      if (!r.ok) {
        if (r.kind === "domain") return r;
        break;
      }
      if (r.pos === cur) break; // prevent infinite loop on zero-width match
      results.push(r.value);
      cur = r.pos;
    }
    return ok(results, cur);
  });
}

/** Exactly `n` repetitions. */
export function count<T>(p: Parser<T>, n: number): Parser<T[]> {
  return mkParser((input, pos) => {
    const results: T[] = [];
    let cur = pos;
    for (let i = 0; i < n; i++) {
      const r = p.parse(input, cur);
      if (!r.ok) return r;
      results.push(r.value);
      cur = r.pos;
    }
    return ok(results, cur);
  });
}

/**
 * Optional: succeed with `null` if `p` fails with a syntax failure.
 * A domain failure means the thing is present but invalid, so it is passed through.
 */
export function optional<T>(p: Parser<T>): Parser<T | null> {
  return mkParser<T | null>((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok || r.kind === "domain") return r;
    return ok(null, pos);
  });
}

/** One or more items separated by `sep`. A trailing separator is left unconsumed. */
export function sepBy1<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return mkParser((input, pos) => {
    const first = item.parse(input, pos);
    if (!first.ok) return first;
    const results: T[] = [first.value];
    let cur = first.pos;
    for (;;) {
      const rs = sep.parse(input, cur);
      if (!rs.ok) break;
      const ri = item.parse(input, rs.pos);
      if (!ri.ok) {
        if (ri.kind === "domain") return ri;
        break;
      }
      results.push(ri.value);
      cur = ri.pos;
    }
    return ok(results, cur);
  });
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return r;
    return ok(f(r.value), r.pos);
  });
}

/** Replace a parser's result with a constant. */
export function value<A, B>(p: Parser<A>, v: B): Parser<B> {
  return map(p, () => v);
}

/** Yield the slice of input consumed by `p` instead of its value. */
export function recognize<T>(p: Parser<T>): Parser<string> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return r;
    return ok(input.slice(pos, r.pos), r.pos);
  });
}

/** Pair the result of `p` with the range of input it consumed. */
export function spanned<T>(p: Parser<T>): Parser<Spanned<T>> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return r;
    return ok({ value: r.value, start: pos, end: r.pos }, r.pos);
  });
}

/** Replace the expectation of a syntax failure at the starting position. */
export function label<T>(p: Parser<T>, expected: string): Parser<T> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok || r.kind === "domain" || r.pos !== pos) return r;
    return fail(pos, expected);
  });
}

/**
 * Convert the result of `p`, or reject it with a domain failure at the
 * position the rejection names (default: where `p` started).
 */
export function tryMap<A, B>(p: Parser<A>, f: (a: A) => Checked<B>): Parser<B> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return r;
    const checked = f(r.value);
    if (!checked.ok) return fail(checked.pos ?? pos, checked.expected, "domain");
    return ok(checked.value, r.pos);
  });
}

/** Reject results of `p` that do not satisfy `pred` with a domain failure. */
export function verify<T>(p: Parser<T>, pred: (v: T) => boolean, expected: string): Parser<T> {
  return tryMap(p, (v): Checked<T> => (pred(v) ? { ok: true, value: v } : { ok: false, expected }));
}

/**
 * Once the input has committed to a production, report any syntax failure of
 * `p` as a domain failure: the token is recognisably of this kind but malformed.
 */
export function commit<T>(p: Parser<T>): Parser<T> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok || r.kind === "domain") return r;
    return fail(r.pos, r.expected, "domain");
  });
}
