/**
 * Structured error type for asn1 keyword parsing.
 *
 * Carries a machine-readable code and category, the unconsumed
 * input where parsing stopped, and an optional remediation hint.
 */

export type ErrorCategory =
  | "validation"
  | "syntax"
  | "range"
  | "encoding"
  | "not_found"
  | "internal";

export type Asn1ErrorCode =
  | "MISSING_INPUT"
  | "EMPTY_INPUT"
  | "UNRECOGNIZED_OPTION"
  | "NUMERIC_OVERFLOW"
  | "INVALID_ENCODING"
  | "HANDLE_NOT_FOUND"
  | "UNKNOWN_ERROR";

export class Asn1OptionError extends Error {
  readonly code: Asn1ErrorCode;
  readonly category: ErrorCategory;
  /** Input left unconsumed at the point of failure */
  readonly remainder?: string;
  readonly remediation?: string;

  constructor(
    message: string,
    code: Asn1ErrorCode,
    category: ErrorCategory,
    options: { remainder?: string; remediation?: string } = {},
  ) {
    super(message);
    this.name = "Asn1OptionError";
    this.code = code;
    this.category = category;
    this.remainder = options.remainder;
    this.remediation = options.remediation;
  }
}

export function emptyInputError(): Asn1OptionError {
  return new Asn1OptionError(
    "asn1 keyword requires at least one option",
    "EMPTY_INPUT",
    "validation",
    { remainder: "", remediation: "Provide one of: bitstring_overflow, double_overflow, oversize_length, absolute_offset, relative_offset" },
  );
}

export function unrecognizedOptionError(remainder: string): Asn1OptionError {
  return new Asn1OptionError(
    `Unrecognized asn1 option at: "${remainder}"`,
    "UNRECOGNIZED_OPTION",
    "syntax",
    { remainder, remediation: "Separate options with whitespace or a single comma; numeric options need an argument" },
  );
}

export function numericOverflowError(keyword: string, remainder: string): Asn1OptionError {
  return new Asn1OptionError(
    `Value for ${keyword} is out of range: "${remainder}"`,
    "NUMERIC_OVERFLOW",
    "range",
    { remainder },
  );
}
