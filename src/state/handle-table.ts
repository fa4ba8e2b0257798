/**
 * Opaque handles for parsed options held on behalf of callers that cannot
 * keep a JS object themselves (MCP clients).
 *
 * A handle owns one frozen Asn1Options value until it is released.
 * Releasing twice, or using a handle after release, finds nothing.
 */

import { randomUUID } from "node:crypto";
import { parseAsn1Keyword, type Asn1ParseDeps } from "../boundary/adapter.js";
import type { Asn1KeywordInput } from "../boundary/encoding.js";
import type { Asn1OptionError } from "../errors/asn1-error.js";
import type { Asn1Options } from "../options/types.js";

export type Asn1Handle = string;

export const HANDLE_PREFIX = "asn1h_";

export type HandleParseResult =
  | { ok: true; handle: Asn1Handle; options: Readonly<Asn1Options> }
  | { ok: false; error: Asn1OptionError };

export class OptionsHandleTable {
  private entries = new Map<Asn1Handle, Readonly<Asn1Options>>();

  /**
   * Parse and store the result, returning its handle or the error.
   */
  parseOrError(
    input: Asn1KeywordInput | null | undefined,
    deps: Asn1ParseDeps = {},
  ): HandleParseResult {
    const result = parseAsn1Keyword(input, deps);
    if (!result.ok) return result;

    const handle = `${HANDLE_PREFIX}${randomUUID()}`;
    const options = Object.freeze({ ...result.options });
    this.entries.set(handle, options);
    return { ok: true, handle, options };
  }

  /**
   * Parse and store the result. Returns null on any parse failure.
   */
  parse(input: Asn1KeywordInput | null | undefined, deps: Asn1ParseDeps = {}): Asn1Handle | null {
    const result = this.parseOrError(input, deps);
    return result.ok ? result.handle : null;
  }

  get(handle: Asn1Handle): Readonly<Asn1Options> | undefined {
    return this.entries.get(handle);
  }

  /**
   * Drop the value behind `handle`. Returns whether a live handle was released;
   * null, undefined and unknown handles are no-ops.
   */
  release(handle: Asn1Handle | null | undefined): boolean {
    if (handle === null || handle === undefined) return false;
    return this.entries.delete(handle);
  }

  get size(): number {
    return this.entries.size;
  }
}
