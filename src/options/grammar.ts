/**
 * Clause grammar for the `asn1` keyword argument.
 *
 * Five clause shapes, tried in a fixed priority order:
 *
 *   bitstring_overflow
 *   double_overflow
 *   oversize_length <uint32>
 *   absolute_offset <uint32>
 *   relative_offset <int32>
 *
 * Keywords are case-sensitive ASCII. Numeric clauses need at least one
 * whitespace character between the keyword and its digits.
 */

import { numericOverflowError } from "../errors/asn1-error.js";
import {
  I32_MAX,
  I32_MIN,
  U32_MAX,
  type Asn1Clause,
  type Asn1Options,
} from "./types.js";

/** A matched clause and the input left after it. */
export interface ClauseMatch {
  clause: Asn1Clause;
  rest: string;
}

/**
 * Returns null when the clause does not match at the start of `input`.
 * Throws NUMERIC_OVERFLOW when it matches but its number is out of range.
 */
export type ClauseMatcher = (input: string) => ClauseMatch | null;

export const WHITESPACE_RE = /^[ \t\r\n]+/;
const DIGITS_RE = /^[0-9]+/;

/** Parse a run of decimal digits as u32, or null when it does not fit. */
export function parseU32Digits(digits: string): number | null {
  const significant = digits.replace(/^0+(?=.)/, "");
  if (significant.length > 10) return null;
  const value = Number(significant);
  return value > U32_MAX ? null : value;
}

/** Input after `keyword` and its mandatory whitespace, or null. */
function argumentAfter(input: string, keyword: string): string | null {
  if (!input.startsWith(keyword)) return null;
  const afterKeyword = input.slice(keyword.length);
  const ws = WHITESPACE_RE.exec(afterKeyword);
  if (!ws) return null;
  return afterKeyword.slice(ws[0].length);
}

function matchFlag(
  input: string,
  keyword: "bitstring_overflow" | "double_overflow",
): ClauseMatch | null {
  if (!input.startsWith(keyword)) return null;
  return { clause: { keyword }, rest: input.slice(keyword.length) };
}

function matchUnsigned(
  input: string,
  keyword: "oversize_length" | "absolute_offset",
): ClauseMatch | null {
  const arg = argumentAfter(input, keyword);
  if (arg === null) return null;

  const digits = DIGITS_RE.exec(arg)?.[0];
  if (digits === undefined) return null;

  const value = parseU32Digits(digits);
  if (value === null) throw numericOverflowError(keyword, arg);

  return { clause: { keyword, value }, rest: arg.slice(digits.length) };
}

function matchSigned(input: string, keyword: "relative_offset"): ClauseMatch | null {
  const arg = argumentAfter(input, keyword);
  if (arg === null) return null;

  const negative = arg.startsWith("-");
  const body = negative ? arg.slice(1) : arg;
  const digits = DIGITS_RE.exec(body)?.[0];
  if (digits === undefined) return null;

  const magnitude = parseU32Digits(digits);
  if (magnitude === null) throw numericOverflowError(keyword, arg);

  // -0 is accepted and stored as plain 0
  const value = negative && magnitude !== 0 ? -magnitude : magnitude;
  if (value < I32_MIN || value > I32_MAX) throw numericOverflowError(keyword, arg);

  return { clause: { keyword, value }, rest: body.slice(digits.length) };
}

/** Matchers in priority order. */
export const CLAUSE_MATCHERS: readonly ClauseMatcher[] = [
  (input) => matchFlag(input, "bitstring_overflow"),
  (input) => matchFlag(input, "double_overflow"),
  (input) => matchUnsigned(input, "oversize_length"),
  (input) => matchUnsigned(input, "absolute_offset"),
  (input) => matchSigned(input, "relative_offset"),
];

/**
 * Try every matcher in priority order and return the first match.
 */
export function matchClause(input: string): ClauseMatch | null {
  for (const matcher of CLAUSE_MATCHERS) {
    const match = matcher(input);
    if (match) return match;
  }
  return null;
}

/**
 * Apply a clause to the options. A repeated keyword overwrites the
 * earlier value.
 */
export function applyClause(options: Asn1Options, clause: Asn1Clause): void {
  switch (clause.keyword) {
    case "bitstring_overflow":
      options.bitstringOverflow = true;
      break;
    case "double_overflow":
      options.doubleOverflow = true;
      break;
    case "oversize_length":
      options.oversizeLength = clause.value;
      break;
    case "absolute_offset":
      options.absoluteOffset = clause.value;
      break;
    case "relative_offset":
      options.relativeOffset = clause.value;
      break;
  }
}
