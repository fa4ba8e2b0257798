/**
 * Maps raw/unknown errors into structured Asn1OptionError instances.
 *
 * Catch blocks can call `toAsn1OptionError(err)` to get a typed error
 * with code and category.
 */

import { Asn1OptionError } from "./asn1-error.js";

export function toAsn1OptionError(raw: unknown): Asn1OptionError {
  if (raw instanceof Asn1OptionError) {
    return raw;
  }

  const msg = raw instanceof Error ? raw.message : String(raw);
  return new Asn1OptionError(msg, "UNKNOWN_ERROR", "internal");
}
