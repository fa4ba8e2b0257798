import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { ConfigProvider } from "./config/provider.js";
import {
  parseOptionsSchema,
  validateOptionsSchema,
  getOptionsSchema,
  releaseOptionsSchema,
} from "./schemas/tools.js";
import { OptionsHandleTable } from "./state/handle-table.js";
import { packageVersion } from "./version.js";
import type { HandlerDeps } from "./handlers/types.js";
import { handleParseOptions } from "./handlers/parse-options.js";
import { handleValidateOptions } from "./handlers/validate-options.js";
import { handleGetOptions } from "./handlers/get-options.js";
import { handleReleaseOptions } from "./handlers/release-options.js";

export interface ServerConfig {
  /** Source of `asn1-max-frames` */
  config: ConfigProvider;
  log?: (message: string) => void;
}

export async function createServer(config: ServerConfig) {
  const server = new McpServer(
    {
      name: "asn1-keyword-server",
      version: packageVersion(),
    },
    {
      instructions:
        "This server parses the argument of the asn1 detection-rule keyword " +
        "(bitstring_overflow, double_overflow, oversize_length <n>, absolute_offset <n>, " +
        "relative_offset <n>) into structured options. parse_asn1_options stores the " +
        "result behind a handle; call release_asn1_options when done with it. " +
        "Use validate_asn1_options to check option text without storing anything.",
    },
  );

  const deps: HandlerDeps = {
    config: config.config,
    handles: new OptionsHandleTable(),
    log: config.log ?? ((message) => console.error(message)),
  };

  // Tool: parse_asn1_options - Parse and store behind a handle
  server.tool(
    "parse_asn1_options",
    "Parse asn1 keyword options and return a handle to the stored result along with the parsed fields.",
    parseOptionsSchema.shape,
    (args) => handleParseOptions(deps, args)
  );

  // Tool: validate_asn1_options - Parse without storing
  server.tool(
    "validate_asn1_options",
    "Check asn1 keyword options and return the parsed fields and clause list without allocating a handle.",
    validateOptionsSchema.shape,
    (args) => handleValidateOptions(deps, args)
  );

  // Tool: get_asn1_options - Read a stored result
  server.tool(
    "get_asn1_options",
    "Return the parsed options behind a handle from parse_asn1_options.",
    getOptionsSchema.shape,
    (args) => handleGetOptions(deps, args)
  );

  // Tool: release_asn1_options - Free a stored result
  server.tool(
    "release_asn1_options",
    "Release a handle from parse_asn1_options. Releasing an unknown handle is a no-op.",
    releaseOptionsSchema.shape,
    (args) => handleReleaseOptions(deps, args)
  );

  return server;
}

export async function startServer(config: ServerConfig) {
  const server = await createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = async () => {
    try {
      await server.close();
    } catch (err) {
      console.error("Error during shutdown:", err);
    }
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  console.error("asn1 keyword server started");
}

export { parseAsn1Keyword, parseAsn1KeywordClauses, parseAsn1KeywordOrNull } from "./boundary/adapter.js";
export type { Asn1ParseDeps, Asn1ParseResult, Asn1ClauseParseResult } from "./boundary/adapter.js";
export type { Asn1KeywordInput } from "./boundary/encoding.js";
export { OptionsHandleTable } from "./state/handle-table.js";
export type { Asn1Handle, HandleParseResult } from "./state/handle-table.js";
export {
  MapConfigProvider,
  EnvConfigProvider,
  ChainedConfigProvider,
  MAX_FRAMES_CONFIG_KEY,
} from "./config/provider.js";
export type { ConfigProvider } from "./config/provider.js";
export { Asn1OptionError } from "./errors/asn1-error.js";
export type { Asn1ErrorCode, ErrorCategory } from "./errors/asn1-error.js";
export * from "./options/index.js";
