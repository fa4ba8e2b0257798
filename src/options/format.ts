import type { Asn1Options } from "./types.js";

/**
 * Render options as canonical keyword text, clauses in grammar order
 * joined by ", ". `maxFrames` comes from configuration and is not part
 * of the keyword, so it is never rendered.
 */
export function formatAsn1Options(options: Asn1Options): string {
  const parts: string[] = [];
  if (options.bitstringOverflow) parts.push("bitstring_overflow");
  if (options.doubleOverflow) parts.push("double_overflow");
  if (options.oversizeLength !== undefined) parts.push(`oversize_length ${options.oversizeLength}`);
  if (options.absoluteOffset !== undefined) parts.push(`absolute_offset ${options.absoluteOffset}`);
  if (options.relativeOffset !== undefined) parts.push(`relative_offset ${options.relativeOffset}`);
  return parts.join(", ");
}
