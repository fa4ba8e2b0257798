/**
 * Types and defaults for parsed `asn1` keyword options.
 */

/** Frames inspected per buffer unless `asn1-max-frames` overrides it. */
export const DEFAULT_MAX_FRAMES = 30;

export const U16_MAX = 0xffff;
export const U32_MAX = 0xffffffff;
export const I32_MIN = -0x80000000;
export const I32_MAX = 0x7fffffff;

/** Options for one `asn1` rule keyword. */
export interface Asn1Options {
  /** Match BIT STRINGs whose unused-bits count is out of range */
  bitstringOverflow: boolean;
  /** Match REAL encodings that overflow a double */
  doubleOverflow: boolean;
  /** Match when a length field exceeds this value (u32) */
  oversizeLength?: number;
  /** Start decoding at this absolute payload offset (u32) */
  absoluteOffset?: number;
  /** Start decoding relative to the previous content match (i32) */
  relativeOffset?: number;
  /** Maximum ASN.1 frames to decode (u16) */
  maxFrames: number;
}

/** One recognized clause of the keyword argument. */
export type Asn1Clause =
  | { keyword: "bitstring_overflow" }
  | { keyword: "double_overflow" }
  | { keyword: "oversize_length"; value: number }
  | { keyword: "absolute_offset"; value: number }
  | { keyword: "relative_offset"; value: number };

export type Asn1Keyword = Asn1Clause["keyword"];

/** Wire form of {@link Asn1Options}, keyed by the rule-language names. */
export interface Asn1OptionsJson {
  bitstring_overflow: boolean;
  double_overflow: boolean;
  oversize_length: number | null;
  absolute_offset: number | null;
  relative_offset: number | null;
  max_frames: number;
}

export function createDefaultAsn1Options(): Asn1Options {
  return {
    bitstringOverflow: false,
    doubleOverflow: false,
    maxFrames: DEFAULT_MAX_FRAMES,
  };
}

export function toAsn1OptionsJson(options: Asn1Options): Asn1OptionsJson {
  return {
    bitstring_overflow: options.bitstringOverflow,
    double_overflow: options.doubleOverflow,
    oversize_length: options.oversizeLength ?? null,
    absolute_offset: options.absoluteOffset ?? null,
    relative_offset: options.relativeOffset ?? null,
    max_frames: options.maxFrames,
  };
}
