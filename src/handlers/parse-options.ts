import type { HandlerDeps } from "./types.js";
import type { ParseOptionsArgs } from "../schemas/tools.js";
import { formatResponse, formatError } from "../response.js";
import { toAsn1OptionError } from "../errors/error-mapper.js";
import { formatAsn1Options } from "../options/format.js";
import { toAsn1OptionsJson } from "../options/types.js";

export async function handleParseOptions(
  deps: HandlerDeps,
  args: ParseOptionsArgs,
) {
  const startTime = Date.now();
  try {
    const result = deps.handles.parseOrError(args.options, { config: deps.config, log: deps.log });
    if (!result.ok) {
      return formatError("parse_asn1_options", result.error, startTime);
    }

    return formatResponse("parse_asn1_options", {
      handle: result.handle,
      options: toAsn1OptionsJson(result.options),
      canonical: formatAsn1Options(result.options),
    }, startTime);
  } catch (error) {
    return formatError("parse_asn1_options", toAsn1OptionError(error), startTime);
  }
}
