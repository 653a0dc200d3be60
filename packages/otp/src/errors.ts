/**
 * @otpkit/otp - Errors
 *
 * @packageDocumentation
 */

/**
 * Failure categories raised while deriving or checking a code
 */
export type OtpErrorCode =
  /** Secret contains a character outside the RFC 4648 alphabet */
  | "INVALID_BASE32"
  /** Secret decodes to zero bytes */
  | "EMPTY_SECRET"
  /** Time step is zero, negative or not an integer */
  | "INVALID_INTERVAL"
  /** Digit count outside 1..10 */
  | "INVALID_DIGITS"
  /** Epoch, timestamp or counter out of the unsigned 64-bit range */
  | "INVALID_PARAMETER"
  /** Wall clock unreadable or set before the Unix epoch */
  | "CLOCK_ERROR";

export class OtpError extends Error {
  readonly code: OtpErrorCode;

  constructor(code: OtpErrorCode, message: string) {
    super(message);
    this.name = "OtpError";
    this.code = code;
  }
}

export function isOtpError(e: unknown): e is OtpError {
  return e instanceof OtpError;
}
