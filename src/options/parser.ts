/**
 * Parser for the `asn1` keyword argument.
 *
 * Walks the unconsumed input one clause at a time: skip leading
 * whitespace, match a clause, then consume at most one separator
 * (a whitespace run or a single comma). Any position where no clause
 * matches ends the parse with UNRECOGNIZED_OPTION.
 */

import { emptyInputError, unrecognizedOptionError } from "../errors/asn1-error.js";
import { applyClause, matchClause, WHITESPACE_RE } from "./grammar.js";
import { createDefaultAsn1Options, type Asn1Clause, type Asn1Options } from "./types.js";

function skipWhitespace(input: string): string {
  const ws = WHITESPACE_RE.exec(input);
  return ws ? input.slice(ws[0].length) : input;
}

function consumeSeparator(input: string): string {
  if (input.startsWith(",")) return input.slice(1);
  return skipWhitespace(input);
}

/** A clause must be followed by a separator or the end of input. */
function atClauseBoundary(rest: string): boolean {
  return rest.length === 0 || rest.startsWith(",") || WHITESPACE_RE.test(rest);
}

/**
 * Split the argument into its recognized clauses, in input order.
 */
export function tokenizeAsn1Options(input: string): Asn1Clause[] {
  if (input.length === 0) throw emptyInputError();

  const clauses: Asn1Clause[] = [];
  let rest = input;

  while (rest.length > 0) {
    rest = skipWhitespace(rest);

    const match = matchClause(rest);
    if (!match) throw unrecognizedOptionError(rest);
    // "bitstring_overflowdouble_overflow" stops at "double_overflow"
    if (!atClauseBoundary(match.rest)) throw unrecognizedOptionError(match.rest);

    clauses.push(match.clause);
    rest = consumeSeparator(match.rest);
  }

  return clauses;
}

/**
 * Parse the argument into options. `maxFrames` keeps its default here;
 * the boundary adapter applies the configured override.
 */
export function parseAsn1Options(input: string): Asn1Options {
  return optionsFromClauses(tokenizeAsn1Options(input));
}

/** Fold clauses onto the defaults; later clauses overwrite earlier ones. */
export function optionsFromClauses(clauses: readonly Asn1Clause[]): Asn1Options {
  const options = createDefaultAsn1Options();
  for (const clause of clauses) {
    applyClause(options, clause);
  }
  return options;
}
