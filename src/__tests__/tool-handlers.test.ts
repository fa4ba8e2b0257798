/**
 * Integration tests for MCP tool handlers
 *
 * Uses InMemoryTransport to invoke tools through the MCP protocol,
 * ensuring handlers are tested as wired in createServer().
 */

import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createServer, type ServerConfig } from "../index.js";
import { MapConfigProvider } from "../config/provider.js";
import type { ToolResponse } from "../response.js";

// ---------------------------------------------------------------------------
// Setup: create MCP server + in-memory client
// ---------------------------------------------------------------------------

const testConfig: ServerConfig = {
  config: new MapConfigProvider({ "asn1-max-frames": "64" }),
  log: vi.fn(),
};

let client: Client;
let closeTransports: () => Promise<void>;

beforeAll(async () => {
  const server = await createServer(testConfig);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  await server.connect(serverTransport);

  client = new Client({ name: "test-client", version: "1.0.0" });
  await client.connect(clientTransport);

  closeTransports = async () => {
    await clientTransport.close();
    await serverTransport.close();
  };
});

afterAll(async () => {
  await closeTransports?.();
});

// Helper to call a tool and return the parsed envelope + raw isError
async function callTool(name: string, args: Record<string, unknown>): Promise<{ envelope: ToolResponse; isError?: boolean }> {
  const result = await client.callTool({ name, arguments: args });
  const textContent = (result.content as Array<{ type: string; text: string }>)[0];
  const envelope = JSON.parse(textContent.text) as ToolResponse;
  return { envelope, isError: result.isError as boolean | undefined };
}

describe("server info", () => {
  it("reports the package version", () => {
    expect(client.getServerVersion()).toEqual({ name: "asn1-keyword-server", version: "0.1.0" });
  });
});

describe("tool listing", () => {
  it("registers the four asn1 tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "get_asn1_options",
      "parse_asn1_options",
      "release_asn1_options",
      "validate_asn1_options",
    ]);
  });
});

// =========================================================================
// parse / get / release lifecycle
// =========================================================================

describe("handle lifecycle", () => {
  it("parses, reads back and releases a handle", async () => {
    const parsed = await callTool("parse_asn1_options", {
      options: "double_overflow, oversize_length 1024 absolute_offset 10,\n bitstring_overflow",
    });

    expect(parsed.isError).toBeFalsy();
    expect(parsed.envelope.success).toBe(true);
    expect(parsed.envelope.data.options).toEqual({
      bitstring_overflow: true,
      double_overflow: true,
      oversize_length: 1024,
      absolute_offset: 10,
      relative_offset: null,
      max_frames: 64,
    });
    expect(parsed.envelope.data.canonical).toBe(
      "bitstring_overflow, double_overflow, oversize_length 1024, absolute_offset 10",
    );

    const handle = parsed.envelope.data.handle;
    expect(typeof handle).toBe("string");

    const got = await callTool("get_asn1_options", { handle });
    expect(got.envelope.success).toBe(true);
    expect(got.envelope.data.options).toEqual(parsed.envelope.data.options);

    const released = await callTool("release_asn1_options", { handle });
    expect(released.envelope.data.released).toBe(true);

    const again = await callTool("release_asn1_options", { handle });
    expect(again.envelope.data.released).toBe(false);
    expect(again.isError).toBeFalsy();

    const gone = await callTool("get_asn1_options", { handle });
    expect(gone.isError).toBe(true);
    expect(gone.envelope.error_code).toBe("HANDLE_NOT_FOUND");
    expect(gone.envelope.error_category).toBe("not_found");
  });

  it("returns the error kind and remainder on parse failure", async () => {
    const { envelope, isError } = await callTool("parse_asn1_options", {
      options: "oversize_length 1024, some_other_param 360",
    });
    expect(isError).toBe(true);
    expect(envelope.success).toBe(false);
    expect(envelope.error_code).toBe("UNRECOGNIZED_OPTION");
    expect(envelope.data).toEqual({ remainder: "some_other_param 360" });
  });

  it("rejects empty option text", async () => {
    const { envelope } = await callTool("parse_asn1_options", { options: "" });
    expect(envelope.error_code).toBe("EMPTY_INPUT");
  });
});

// =========================================================================
// validate_asn1_options
// =========================================================================

describe("validate_asn1_options", () => {
  it("returns options and clauses without allocating a handle", async () => {
    const { envelope } = await callTool("validate_asn1_options", {
      options: "relative_offset -4 relative_offset 9",
    });
    expect(envelope.success).toBe(true);
    expect(envelope.data.valid).toBe(true);
    expect(envelope.data.handle).toBeUndefined();
    expect(envelope.data.clauses).toEqual([
      { keyword: "relative_offset", value: -4 },
      { keyword: "relative_offset", value: 9 },
    ]);
    expect(envelope.data.canonical).toBe("relative_offset 9");
  });

  it("reports numeric overflow", async () => {
    const { envelope, isError } = await callTool("validate_asn1_options", {
      options: "absolute_offset 4294967296",
    });
    expect(isError).toBe(true);
    expect(envelope.error_code).toBe("NUMERIC_OVERFLOW");
    expect(envelope.error_category).toBe("range");
  });
});
