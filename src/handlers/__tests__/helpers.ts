import { vi } from "vitest";
import type { HandlerDeps } from "../types.js";
import { MapConfigProvider } from "../../config/provider.js";
import { OptionsHandleTable } from "../../state/handle-table.js";

export function createMockDeps(config: Record<string, string> = {}): HandlerDeps {
  return {
    config: new MapConfigProvider(config),
    handles: new OptionsHandleTable(),
    log: vi.fn(),
  };
}

export function parseEnvelope(result: { content: Array<{ type: string; text: string }> }) {
  return JSON.parse(result.content[0].text);
}
