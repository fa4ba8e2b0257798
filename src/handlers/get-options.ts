import type { HandlerDeps } from "./types.js";
import type { GetOptionsArgs } from "../schemas/tools.js";
import { formatResponse, formatError } from "../response.js";
import { Asn1OptionError } from "../errors/asn1-error.js";
import { toAsn1OptionsJson } from "../options/types.js";

export async function handleGetOptions(
  deps: HandlerDeps,
  args: GetOptionsArgs,
) {
  const startTime = Date.now();
  const options = deps.handles.get(args.handle);
  if (!options) {
    return formatError("get_asn1_options", new Asn1OptionError(
      `Unknown or released handle: ${args.handle}`,
      "HANDLE_NOT_FOUND",
      "not_found",
      { remediation: "Call parse_asn1_options to obtain a new handle" },
    ), startTime);
  }

  return formatResponse("get_asn1_options", {
    handle: args.handle,
    options: toAsn1OptionsJson(options),
  }, startTime);
}
