#!/usr/bin/env node

import { startServer, type ServerConfig } from "./index.js";
import { packageVersion } from "./version.js";
import {
  ChainedConfigProvider,
  EnvConfigProvider,
  MapConfigProvider,
  MAX_FRAMES_CONFIG_KEY,
} from "./config/provider.js";

function parseArgs(): ServerConfig {
  const args = process.argv.slice(2);
  const overrides = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    let arg = args[i];
    let value: string | undefined = args[i + 1];
    let usedEqualsSyntax = false;

    // Support --flag=value syntax: split on first '='
    if (arg.startsWith("--") && arg.includes("=")) {
      const eqIndex = arg.indexOf("=");
      value = arg.slice(eqIndex + 1);
      arg = arg.slice(0, eqIndex);
      usedEqualsSyntax = true;
    }

    // Helper: only skip next arg if value came from separate arg (not '=' syntax)
    const consumeValue = () => { if (!usedEqualsSyntax) i++; };

    switch (arg) {
      case "--max-frames":
        if (value !== undefined) overrides.set(MAX_FRAMES_CONFIG_KEY, value);
        consumeValue();
        break;
      case "--set": {
        const eq = value?.indexOf("=") ?? -1;
        if (value !== undefined && eq > 0) {
          overrides.set(value.slice(0, eq), value.slice(eq + 1));
        } else {
          console.error(`Ignoring --set without key=value: ${value ?? ""}`);
        }
        consumeValue();
        break;
      }
      case "--help":
      case "-h":
        printHelp();
        process.exit(0);
      case "--version":
      case "-v":
        console.log(`asn1-keyword-server v${packageVersion()}`);
        process.exit(0);
    }
  }

  return {
    config: new ChainedConfigProvider(new MapConfigProvider(overrides), new EnvConfigProvider()),
  };
}

function printHelp() {
  console.log(`
asn1-keyword-server - MCP server that parses asn1 detection-rule keyword options

USAGE:
  asn1-keyword-server [OPTIONS]

OPTIONS:
  --max-frames <n>        Override asn1-max-frames (0-65535, default: 30)
  --set <key=value>       Set a configuration value (repeatable)
  -h, --help              Show this help message
  -v, --version           Show version

ENVIRONMENT:
  ASN1_MAX_FRAMES         Used when --max-frames is not given

EXAMPLES:
  asn1-keyword-server
  asn1-keyword-server --max-frames=64
  ASN1_MAX_FRAMES=16 asn1-keyword-server
`);
}

// Start server
startServer(parseArgs()).catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
