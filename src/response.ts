/**
 * Standardized JSON response envelope for all MCP tool handlers.
 *
 * Every tool returns { success, tool, data, metadata } so callers
 * get a predictable shape regardless of which tool was invoked.
 */

import type { Asn1OptionError, ErrorCategory } from "./errors/asn1-error.js";

export interface ToolResponse {
  success: boolean;
  tool: string;
  data: Record<string, unknown>;
  error?: string;
  error_code?: string;
  error_category?: ErrorCategory;
  remediation?: string;
  metadata: {
    elapsed_ms: number;
  };
}

/**
 * Build a success response envelope.
 */
export function formatResponse(
  tool: string,
  data: Record<string, unknown>,
  startTime: number,
): { content: Array<{ type: "text"; text: string }>; isError?: boolean } {
  const envelope: ToolResponse = {
    success: true,
    tool,
    data,
    metadata: { elapsed_ms: Date.now() - startTime },
  };
  return {
    content: [{ type: "text", text: JSON.stringify(envelope, null, 2) }],
  };
}

/**
 * Build an error response envelope. Sets `isError: true` on the MCP result.
 *
 * The envelope carries error_code, error_category, remediation when the
 * error has one, and `data.remainder` when parsing stopped partway
 * through the input.
 */
export function formatError(
  tool: string,
  error: Asn1OptionError,
  startTime: number,
): { content: Array<{ type: "text"; text: string }>; isError: true } {
  const envelope: ToolResponse = {
    success: false,
    tool,
    data: {},
    error: error.message,
    error_code: error.code,
    error_category: error.category,
    metadata: { elapsed_ms: Date.now() - startTime },
  };

  if (error.remediation) {
    envelope.remediation = error.remediation;
  }
  if (error.remainder !== undefined) {
    envelope.data = { remainder: error.remainder };
  }

  return {
    content: [{ type: "text", text: JSON.stringify(envelope, null, 2) }],
    isError: true,
  };
}
