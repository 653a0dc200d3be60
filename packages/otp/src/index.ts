/**
 * @otpkit/otp
 *
 * One-time password derivation:
 * - HOTP, RFC 4226 (counter based)
 * - TOTP, RFC 6238 (time based), with SHA-1, SHA-256 or SHA-512
 *
 * @packageDocumentation
 */

export {
  computeTotp,
  generateCode,
  verifyCode,
  hotp,
  counterAt,
  resolveTimestamp,
  formatCode,
  generateSecret,
  generateOtpAuthUri,
  DEFAULT_OPTIONS,
  HASH_ALGORITHMS,
  MAX_DIGITS,
  type HashAlgorithm,
  type Seconds,
  type TOTPOptions,
  type TOTPDefaults,
  type TOTPVerifyResult,
} from "./totp";

export { base32Encode, base32Decode, BASE32_ALPHABET } from "./base32";

export { OtpError, isOtpError, type OtpErrorCode } from "./errors";
