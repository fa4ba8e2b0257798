/**
 * Input decoding for the boundary adapter.
 *
 * Accepts either a JS string or a byte buffer holding a C-style string.
 * Byte input ends at the first NUL and must be valid UTF-8; a leading BOM
 * is kept so bytes and strings parse alike. Strings must not contain lone
 * UTF-16 surrogates.
 */

import { Asn1OptionError } from "../errors/asn1-error.js";

export type Asn1KeywordInput = string | Uint8Array;

function invalidEncoding(detail: string): Asn1OptionError {
  return new Asn1OptionError(
    `asn1 keyword argument is not valid text: ${detail}`,
    "INVALID_ENCODING",
    "encoding",
    { remediation: "Pass the option text as UTF-8" },
  );
}

/** Throw INVALID_ENCODING if `s` holds an unpaired surrogate. */
export function assertWellFormed(s: string): void {
  for (let i = 0; i < s.length; i++) {
    const cu = s.charCodeAt(i);
    if (cu >= 0xd800 && cu <= 0xdbff) {
      const next = i + 1 < s.length ? s.charCodeAt(i + 1) : -1;
      if (next < 0xdc00 || next > 0xdfff) throw invalidEncoding("unpaired surrogate");
      i++; // well-formed pair
      continue;
    }
    if (cu >= 0xdc00 && cu <= 0xdfff) throw invalidEncoding("unpaired surrogate");
  }
}

/**
 * Decode keyword input to a string. Null and undefined raise MISSING_INPUT.
 */
export function decodeKeywordInput(input: Asn1KeywordInput | null | undefined): string {
  if (input === null || input === undefined) {
    throw new Asn1OptionError("asn1 keyword argument is missing", "MISSING_INPUT", "validation");
  }

  if (typeof input === "string") {
    assertWellFormed(input);
    return input;
  }

  const nul = input.indexOf(0);
  const bytes = nul === -1 ? input : input.subarray(0, nul);
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    throw invalidEncoding("invalid utf-8");
  }
}
