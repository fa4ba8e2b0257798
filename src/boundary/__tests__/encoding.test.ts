import { describe, it, expect } from "vitest";
import { assertWellFormed, decodeKeywordInput } from "../encoding.js";
import { Asn1OptionError } from "../../errors/asn1-error.js";

function decodeError(input: Parameters<typeof decodeKeywordInput>[0]): Asn1OptionError {
  try {
    decodeKeywordInput(input);
  } catch (err) {
    if (err instanceof Asn1OptionError) return err;
    throw err;
  }
  throw new Error("expected decode to fail");
}

describe("decodeKeywordInput", () => {
  it("returns strings unchanged", () => {
    expect(decodeKeywordInput("double_overflow")).toBe("double_overflow");
  });

  it("decodes UTF-8 bytes", () => {
    expect(decodeKeywordInput(new TextEncoder().encode("oversize_length 8"))).toBe("oversize_length 8");
  });

  it("stops at the first NUL byte", () => {
    const bytes = Buffer.from("bitstring_overflow\0garbage");
    expect(decodeKeywordInput(bytes)).toBe("bitstring_overflow");
  });

  it("keeps a leading byte order mark", () => {
    const bytes = Uint8Array.from([0xef, 0xbb, 0xbf, ...new TextEncoder().encode("double_overflow")]);
    expect(decodeKeywordInput(bytes)).toBe("\ufeffdouble_overflow");
  });

  it("rejects null and undefined", () => {
    expect(decodeError(null).code).toBe("MISSING_INPUT");
    expect(decodeError(undefined).code).toBe("MISSING_INPUT");
  });

  it("rejects invalid UTF-8", () => {
    const err = decodeError(Uint8Array.from([0x62, 0xff, 0x61]));
    expect(err.code).toBe("INVALID_ENCODING");
    expect(err.category).toBe("encoding");
  });

  it("rejects strings with a lone surrogate", () => {
    expect(decodeError("bitstring_overflow\ud800").code).toBe("INVALID_ENCODING");
  });
});

describe("assertWellFormed", () => {
  it("accepts surrogate pairs", () => {
    expect(() => assertWellFormed("a😀b")).not.toThrow();
  });

  it("rejects a lone low surrogate", () => {
    expect(() => assertWellFormed("\udc00")).toThrow(Asn1OptionError);
  });

  it("rejects a high surrogate followed by a normal character", () => {
    expect(() => assertWellFormed("\ud800x")).toThrow(Asn1OptionError);
  });
});
