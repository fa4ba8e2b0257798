/**
 * Boundary adapter: validates raw input, runs the parser, applies the
 * configured `asn1-max-frames` override and hands back an owned value.
 *
 * Results are plain objects created per call; nothing is retained here.
 */

import { Asn1OptionError } from "../errors/asn1-error.js";
import { toAsn1OptionError } from "../errors/error-mapper.js";
import { emptyConfig, MAX_FRAMES_CONFIG_KEY, type ConfigProvider } from "../config/provider.js";
import { optionsFromClauses, tokenizeAsn1Options } from "../options/parser.js";
import { U16_MAX, type Asn1Clause, type Asn1Options } from "../options/types.js";
import { decodeKeywordInput, type Asn1KeywordInput } from "./encoding.js";

export interface Asn1ParseDeps {
  /** Source of the `asn1-max-frames` override */
  config?: ConfigProvider;
  /** Diagnostic sink; defaults to stderr */
  log?: (message: string) => void;
}

export type Asn1ParseResult =
  | { ok: true; options: Asn1Options }
  | { ok: false; error: Asn1OptionError };

export type Asn1ClauseParseResult =
  | { ok: true; options: Asn1Options; clauses: Asn1Clause[] }
  | { ok: false; error: Asn1OptionError };

const defaultLog = (message: string) => console.error(message);

/** Parse an override value as u16, or null when it is not one. */
export function parseMaxFrames(raw: string): number | null {
  if (!/^\+?[0-9]+$/.test(raw)) return null;
  const digits = raw.replace(/^\+/, "").replace(/^0+(?=.)/, "");
  if (digits.length > 5) return null;
  const value = Number(digits);
  return value > U16_MAX ? null : value;
}

function applyMaxFramesOverride(options: Asn1Options, deps: Asn1ParseDeps): void {
  const config = deps.config ?? emptyConfig;
  const raw = config.get(MAX_FRAMES_CONFIG_KEY);
  if (raw === undefined) return;

  const value = parseMaxFrames(raw);
  if (value === null) {
    (deps.log ?? defaultLog)(`Could not parse ${MAX_FRAMES_CONFIG_KEY}: ${raw}`);
    return;
  }
  options.maxFrames = value;
}

/**
 * Parse an `asn1` keyword argument. Never throws; failures come back as
 * `{ ok: false, error }` and no partial options are exposed.
 */
export function parseAsn1Keyword(
  input: Asn1KeywordInput | null | undefined,
  deps: Asn1ParseDeps = {},
): Asn1ParseResult {
  const result = parseAsn1KeywordClauses(input, deps);
  return result.ok ? { ok: true, options: result.options } : result;
}

/**
 * Same as {@link parseAsn1Keyword}, also returning the recognized clauses
 * in input order (repeats included).
 */
export function parseAsn1KeywordClauses(
  input: Asn1KeywordInput | null | undefined,
  deps: Asn1ParseDeps = {},
): Asn1ClauseParseResult {
  try {
    const text = decodeKeywordInput(input);
    const clauses = tokenizeAsn1Options(text);
    const options = optionsFromClauses(clauses);
    applyMaxFramesOverride(options, deps);
    return { ok: true, options, clauses };
  } catch (err) {
    return { ok: false, error: toAsn1OptionError(err) };
  }
}

/**
 * Same as {@link parseAsn1Keyword}, returning null on any failure.
 */
export function parseAsn1KeywordOrNull(
  input: Asn1KeywordInput | null | undefined,
  deps: Asn1ParseDeps = {},
): Asn1Options | null {
  const result = parseAsn1Keyword(input, deps);
  return result.ok ? result.options : null;
}
