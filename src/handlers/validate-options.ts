import type { HandlerDeps } from "./types.js";
import type { ValidateOptionsArgs } from "../schemas/tools.js";
import { formatResponse, formatError } from "../response.js";
import { toAsn1OptionError } from "../errors/error-mapper.js";
import { parseAsn1KeywordClauses } from "../boundary/adapter.js";
import { formatAsn1Options } from "../options/format.js";
import { toAsn1OptionsJson } from "../options/types.js";

/**
 * Parse without allocating a handle. Also reports the clause sequence,
 * which shows repeated keywords that the options record collapses.
 */
export async function handleValidateOptions(
  deps: HandlerDeps,
  args: ValidateOptionsArgs,
) {
  const startTime = Date.now();
  try {
    const result = parseAsn1KeywordClauses(args.options, { config: deps.config, log: deps.log });
    if (!result.ok) {
      return formatError("validate_asn1_options", result.error, startTime);
    }

    return formatResponse("validate_asn1_options", {
      valid: true,
      options: toAsn1OptionsJson(result.options),
      canonical: formatAsn1Options(result.options),
      clauses: result.clauses,
    }, startTime);
  } catch (error) {
    return formatError("validate_asn1_options", toAsn1OptionError(error), startTime);
  }
}
