/**
 * Tests for the Base32 secret decoder
 */

import { base32Decode, base32Encode } from "./base32";
import { OtpError } from "./errors";

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected function to throw");
}

describe("base32Encode", () => {
  it("should encode buffer to base32", () => {
    expect(base32Encode(Buffer.from("Hello"))).toBe("JBSWY3DP");
  });

  it("should encode empty buffer", () => {
    expect(base32Encode(Buffer.from(""))).toBe("");
  });

  it("should not pad partial quintets", () => {
    expect(base32Encode(Buffer.from("f"))).toBe("MY");
  });

  it("should encode the RFC 6238 seed", () => {
    expect(base32Encode(Buffer.from("12345678901234567890"))).toBe(
      "GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ",
    );
  });
});

describe("base32Decode", () => {
  it("should decode base32 to buffer", () => {
    expect(base32Decode("JBSWY3DP").toString()).toBe("Hello");
  });

  it("should decode a 16 character secret to 10 bytes", () => {
    const decoded = base32Decode("JBSWY3DPEHPK3PXP");
    expect(decoded.toString("hex")).toBe("48656c6c6f21deadbeef");
  });

  it("should handle lowercase input", () => {
    expect(base32Decode("jbswy3dp").toString()).toBe("Hello");
  });

  it("should decode mixed case identically to uppercase", () => {
    expect(base32Decode("JbSwY3dPeHpK3pXp")).toEqual(
      base32Decode("JBSWY3DPEHPK3PXP"),
    );
  });

  it("should drop trailing bits that do not complete a byte", () => {
    expect(base32Decode("MY")).toEqual(Buffer.from([0x66]));
    expect(base32Decode("A").length).toBe(0);
  });

  it("should decode empty input to an empty buffer", () => {
    expect(base32Decode("").length).toBe(0);
  });

  it("should reject padding", () => {
    expect(() => base32Decode("JBSWY3DP======")).toThrow(OtpError);
  });

  it("should throw on invalid characters", () => {
    const error = catchError(() => base32Decode("INVALID!"));
    expect(error).toBeInstanceOf(OtpError);
    expect(error).toMatchObject({
      code: "INVALID_BASE32",
      message: 'invalid base32 character: "!"',
    });
  });

  it("should reject digits outside 2-7", () => {
    expect(() => base32Decode("AB01")).toThrow(/invalid base32 character: "0"/);
    expect(() => base32Decode("AB8")).toThrow(/"8"/);
  });

  it("should reject whitespace", () => {
    expect(() => base32Decode("JBSW Y3DP")).toThrow(/" "/);
  });

  it("should reject characters whose uppercase form is several letters", () => {
    expect(() => base32Decode("ß")).toThrow(OtpError);
  });

  it("should own its memory so zeroing the result clears the key", () => {
    const decoded = base32Decode("JBSWY3DPEHPK3PXP");
    expect(decoded.byteOffset).toBe(0);
    expect(decoded.buffer.byteLength).toBe(10);

    decoded.fill(0);
    expect(new Uint8Array(decoded.buffer).every((byte) => byte === 0)).toBe(true);
  });

  it("should decode what it encodes", () => {
    const original = Buffer.from([0x00, 0xff, 0x12, 0x34, 0xab, 0xcd]);
    expect(base32Decode(base32Encode(original))).toEqual(original);
  });
});
