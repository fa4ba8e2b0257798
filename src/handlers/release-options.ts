import type { HandlerDeps } from "./types.js";
import type { ReleaseOptionsArgs } from "../schemas/tools.js";
import { formatResponse } from "../response.js";

/**
 * Release a handle. Unknown and already-released handles report
 * `released: false` rather than an error.
 */
export async function handleReleaseOptions(
  deps: HandlerDeps,
  args: ReleaseOptionsArgs,
) {
  const startTime = Date.now();
  const released = deps.handles.release(args.handle);
  return formatResponse("release_asn1_options", {
    handle: args.handle,
    released,
  }, startTime);
}
