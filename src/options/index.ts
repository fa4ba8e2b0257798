export { parseAsn1Options, tokenizeAsn1Options, optionsFromClauses } from "./parser.js";
export { formatAsn1Options } from "./format.js";
export { applyClause, matchClause, parseU32Digits, CLAUSE_MATCHERS } from "./grammar.js";
export type { ClauseMatch, ClauseMatcher } from "./grammar.js";
export {
  createDefaultAsn1Options,
  toAsn1OptionsJson,
  DEFAULT_MAX_FRAMES,
  U16_MAX,
  U32_MAX,
  I32_MIN,
  I32_MAX,
} from "./types.js";
export type { Asn1Options, Asn1OptionsJson, Asn1Clause, Asn1Keyword } from "./types.js";
