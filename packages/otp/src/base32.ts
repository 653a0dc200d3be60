/**
 * @otpkit/otp - Base32
 *
 * RFC 4648 Base32 without padding, as typed into authenticator apps
 *
 * @packageDocumentation
 */

import { OtpError } from "./errors";

/**
 * Base32 alphabet (RFC 4648)
 */
export const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

// Both cases map to the same quintet
const LOOKUP = new Map<string, number>();
for (let i = 0; i < BASE32_ALPHABET.length; i++) {
  const char = BASE32_ALPHABET[i];
  LOOKUP.set(char, i);
  LOOKUP.set(char.toLowerCase(), i);
}

/**
 * Encode bytes to base32
 * @param buffer Bytes to encode
 * @returns Unpadded, uppercase Base32 string
 */
export function base32Encode(buffer: Uint8Array): string {
  let bits = 0;
  let value = 0;
  let output = "";

  for (const byte of buffer) {
    value = ((value << 8) | byte) & 0xfff;
    bits += 8;

    while (bits >= 5) {
      output += BASE32_ALPHABET[(value >>> (bits - 5)) & 31];
      bits -= 5;
    }
  }

  if (bits > 0) {
    output += BASE32_ALPHABET[(value << (5 - bits)) & 31];
  }

  return output;
}

/**
 * Decode base32 to bytes
 *
 * Case-insensitive. Padding is not accepted: `=` is rejected like any other
 * character outside the alphabet. Trailing bits that do not complete a byte
 * are dropped.
 *
 * @param input Base32 string
 * @returns Decoded bytes (empty for empty input)
 * @throws OtpError INVALID_BASE32
 */
export function base32Decode(input: string): Buffer {
  // The returned buffer is the only copy of the key; callers may zero it
  const output = Buffer.alloc(Math.floor((input.length * 5) / 8));
  let length = 0;
  let bits = 0;
  let value = 0;

  for (const char of input) {
    const idx = LOOKUP.get(char);
    if (idx === undefined) {
      output.fill(0);
      throw new OtpError(
        "INVALID_BASE32",
        `invalid base32 character: ${JSON.stringify(char)}`,
      );
    }

    value = ((value << 5) | idx) & 0xfff;
    bits += 5;

    if (bits >= 8) {
      output[length++] = (value >>> (bits - 8)) & 255;
      bits -= 8;
    }
  }

  return output.subarray(0, length);
}
