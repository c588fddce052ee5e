/**
 * Core types for @odata-literal/parser
 *
 * Defines the parse result, failure kinds and the parser interface.
 */

/**
 * Why a parse attempt failed.
 *
 * - `syntax`: the input does not have the expected shape.
 * - `domain`: the input has the right shape but names an invalid value
 *   (month 13, integer overflow, malformed base64 padding).
 */
export type FailureKind = "syntax" | "domain";

/** Successful parse: the value and the position just after it. */
export interface ParseSuccess<T> {
  readonly ok: true;
  readonly value: T;
  readonly pos: number;
}

/** Failed parse: where it failed and what was expected there. */
export interface ParseFailure {
  readonly ok: false;
  readonly pos: number;
  readonly expected: string;
  readonly kind: FailureKind;
}

/** Result of a parse attempt: success with a value, or failure with what was expected. */
export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

/** A parser is a function from (input, position) to ParseResult. */
export interface Parser<T> {
  /** Attempt to parse starting at `pos` (default 0). */
  parse(input: string, pos?: number): ParseResult<T>;
  /** Parse the full input, throwing if not consumed entirely. */
  parseAll(input: string): T;
}

/** Kinds of error reported at a top-level entry point. */
export type ParseErrorKind = FailureKind | "trailing-input";

/** A named member of a ranked list of alternatives. */
export interface Alternative<T> {
  readonly name: string;
  readonly parser: Parser<T>;
}

/**
 * Outcome of a checked conversion used by `tryMap`. A rejection may point at
 * the offending part of the input with an absolute `pos`.
 */
export type Checked<T> =
  | { ok: true; value: T }
  | { ok: false; expected: string; pos?: number };

/** A value with the input range it was parsed from. */
export interface Spanned<T> {
  readonly value: T;
  readonly start: number;
  readonly end: number;
}
