/**
 * @odata-literal/parser
 *
 * Backtracking PEG parser combinators.
 *
 * Provides:
 * - `Parser<T>` values built from primitive parsers and combinators
 * - Syntax and domain failure kinds, so a well-formed but invalid token
 *   (month 13, integer overflow) is reported as such
 * - Ranked alternative lists and a full-input entry point
 *
 * @module
 */

// Core types
export type {
  Alternative,
  Checked,
  FailureKind,
  ParseErrorKind,
  ParseFailure,
  ParseResult,
  ParseSuccess,
  Parser,
  Spanned,
} from "./types.js";

// Combinator API
export {
  ParseError,
  type ParseErrorOptions,
  mergeFailures,
  literal,
  literalNoCase,
  char,
  oneOf,
  satisfy,
  takeWhile,
  takeWhile1,
  takeWhileMN,
  regex,
  seq,
  seq3,
  preceded,
  terminated,
  between,
  alt,
  choice,
  many,
  count,
  optional,
  sepBy1,
  map,
  value,
  recognize,
  spanned,
  label,
  tryMap,
  verify,
  commit,
} from "./combinators.js";

// Ranked alternatives
export { type Outcome, rankedChoice, parseComplete } from "./ranked.js";
