/**
 * @otpkit/otp - TOTP Algorithm
 *
 * HOTP (RFC 4226) and TOTP (RFC 6238) code derivation on Node's crypto HMAC.
 * Codes are interchangeable with Google Authenticator, FreeOTP, Authy and
 * any other RFC 6238 implementation.
 *
 * @packageDocumentation
 */

import crypto from "crypto";
import { base32Decode, base32Encode } from "./base32";
import { OtpError, type OtpErrorCode } from "./errors";

/**
 * HMAC hash functions allowed by RFC 6238
 */
export type HashAlgorithm = "sha1" | "sha256" | "sha512";

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = [
  "sha1",
  "sha256",
  "sha512",
];

/**
 * A count of seconds. Numbers must be safe integers; bigints cover the full
 * unsigned 64-bit range.
 */
export type Seconds = number | bigint;

/**
 * Parameters of a TOTP derivation; every field is optional
 */
export interface TOTPOptions {
  /** Time step in seconds (default: 30) */
  interval?: Seconds;
  /** Number of code digits, 1 to 10 (default: 6) */
  digits?: number;
  /** Unix time the steps are counted from (default: 0) */
  epoch?: Seconds;
  /** Windows accepted either side of the current one by verifyCode (default: 1) */
  range?: number;
  /** HMAC hash (default: sha1) */
  algorithm?: HashAlgorithm;
  /** Unix time to evaluate; the clock is read when omitted */
  timestamp?: Seconds;
  /** Milliseconds since the Unix epoch (default: Date.now) */
  clock?: () => number;
}

export type TOTPDefaults = Required<
  Pick<TOTPOptions, "interval" | "digits" | "epoch" | "range" | "algorithm">
>;

/**
 * RFC 6238 defaults, the values authenticator apps assume
 */
export const DEFAULT_OPTIONS: TOTPDefaults = {
  interval: 30,
  digits: 6,
  epoch: 0,
  range: 1,
  algorithm: "sha1",
};

export interface TOTPVerifyResult {
  valid: boolean;
  /** Window the code matched in, relative to the current one */
  delta?: number;
}

export const MAX_DIGITS = 10;

const UINT64_LIMIT = 1n << 64n;

interface ResolvedOptions {
  interval: bigint;
  epoch: bigint;
  digits: number;
  algorithm: HashAlgorithm;
}

function toUint64(name: string, value: Seconds, code: OtpErrorCode): bigint {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new OtpError(code, `${name} must be a non-negative integer, got ${value}`);
    }
    return BigInt(value);
  }
  if (value < 0n || value >= UINT64_LIMIT) {
    throw new OtpError(code, `${name} is outside the unsigned 64-bit range: ${value}`);
  }
  return value;
}

function checkDigits(digits: number): number {
  if (!Number.isInteger(digits) || digits < 1 || digits > MAX_DIGITS) {
    throw new OtpError(
      "INVALID_DIGITS",
      `digits must be an integer between 1 and ${MAX_DIGITS}, got ${digits}`,
    );
  }
  return digits;
}

function checkAlgorithm(algorithm: string): HashAlgorithm {
  const found = HASH_ALGORITHMS.find((a) => a === algorithm);
  if (!found) {
    throw new OtpError(
      "INVALID_PARAMETER",
      `unsupported algorithm: ${algorithm} (expected ${HASH_ALGORITHMS.join(", ")})`,
    );
  }
  return found;
}

function checkInterval(interval: Seconds): bigint {
  const value = toUint64("interval", interval, "INVALID_INTERVAL");
  if (value === 0n) {
    throw new OtpError("INVALID_INTERVAL", "interval must be greater than zero");
  }
  return value;
}

function resolveOptions(options: TOTPOptions): ResolvedOptions {
  return {
    interval: checkInterval(options.interval ?? DEFAULT_OPTIONS.interval),
    epoch: toUint64("epoch", options.epoch ?? DEFAULT_OPTIONS.epoch, "INVALID_PARAMETER"),
    digits: checkDigits(options.digits ?? DEFAULT_OPTIONS.digits),
    algorithm: checkAlgorithm(options.algorithm ?? DEFAULT_OPTIONS.algorithm),
  };
}

/**
 * Resolve the Unix time to evaluate, in whole seconds
 * @throws OtpError CLOCK_ERROR when the clock reads before 1970 or not at all
 */
export function resolveTimestamp(
  options: Pick<TOTPOptions, "timestamp" | "clock"> = {},
): bigint {
  if (options.timestamp !== undefined) {
    return toUint64("timestamp", options.timestamp, "INVALID_PARAMETER");
  }

  const now = (options.clock ?? Date.now)();
  if (!Number.isFinite(now) || now < 0) {
    throw new OtpError("CLOCK_ERROR", `system time is unavailable or before the Unix epoch (${now})`);
  }
  return BigInt(Math.floor(now / 1000));
}

/**
 * Time-step counter: floor((timestamp - epoch) / interval)
 */
export function counterAt(
  timestamp: Seconds,
  epoch: Seconds = DEFAULT_OPTIONS.epoch,
  interval: Seconds = DEFAULT_OPTIONS.interval,
): bigint {
  const step = checkInterval(interval);
  const t = toUint64("timestamp", timestamp, "INVALID_PARAMETER");
  const t0 = toUint64("epoch", epoch, "INVALID_PARAMETER");
  if (t < t0) {
    throw new OtpError("INVALID_PARAMETER", `timestamp ${t} is before epoch ${t0}`);
  }
  return (t - t0) / step;
}

/**
 * HOTP value for a counter (RFC 4226 section 5.3)
 * @param key Raw secret bytes, any length
 * @param counter Moving factor, 0 to 2^64 - 1
 * @returns Code in [0, 10^digits)
 */
export function hotp(
  key: Uint8Array,
  counter: bigint | number,
  options: Pick<TOTPOptions, "digits" | "algorithm"> = {},
): number {
  const digits = checkDigits(options.digits ?? DEFAULT_OPTIONS.digits);
  const algorithm = checkAlgorithm(options.algorithm ?? DEFAULT_OPTIONS.algorithm);
  const moving = toUint64("counter", counter, "INVALID_PARAMETER");

  const message = Buffer.alloc(8);
  message.writeBigUInt64BE(moving);

  const digest = crypto.createHmac(algorithm, key).update(message).digest();

  // Dynamic truncation
  const offset = digest[digest.length - 1] & 0x0f;
  const binary = digest.readUInt32BE(offset) & 0x7fffffff;

  return binary % 10 ** digits;
}

/**
 * Left-pad a code with zeros to exactly `digits` characters
 */
export function formatCode(
  code: number,
  digits: number = DEFAULT_OPTIONS.digits,
): string {
  return String(code).padStart(digits, "0");
}

function decodeKey(secret: string): Buffer {
  const key = base32Decode(secret);
  if (key.length === 0) {
    throw new OtpError("EMPTY_SECRET", "secret is empty");
  }
  return key;
}

/**
 * Compute the TOTP code for a secret
 * @param secret Base32-encoded secret, case-insensitive, unpadded
 * @param options TOTP options
 * @returns Code as an integer, in [0, 10^digits)
 */
export function computeTotp(secret: string, options: TOTPOptions = {}): number {
  const opts = resolveOptions(options);
  const key = decodeKey(secret);

  try {
    const timestamp = resolveTimestamp(options);
    const counter = counterAt(timestamp, opts.epoch, opts.interval);
    return hotp(key, counter, opts);
  } finally {
    key.fill(0);
  }
}

/**
 * Same as {@link computeTotp}, rendered as the string an authenticator app
 * shows: exactly `digits` characters, leading zeros kept
 */
export function generateCode(
  secret: string,
  options: TOTPOptions = {},
): string {
  const digits = options.digits ?? DEFAULT_OPTIONS.digits;
  return formatCode(computeTotp(secret, options), digits);
}

// 0, -1, +1, -2, +2, ...
function windowOffsets(range: number): number[] {
  const offsets = [0];
  for (let i = 1; i <= range; i++) {
    offsets.push(-i, i);
  }
  return offsets;
}

/**
 * Check a submitted code against the current window and `range` windows on
 * either side, nearest first.
 *
 * A malformed code (letters, wrong length) is simply not valid; a malformed
 * secret or option throws as in {@link computeTotp}.
 */
export function verifyCode(
  secret: string,
  code: string,
  options: TOTPOptions = {},
): TOTPVerifyResult {
  const opts = resolveOptions(options);
  const range = options.range ?? DEFAULT_OPTIONS.range;
  if (!Number.isInteger(range) || range < 0) {
    throw new OtpError("INVALID_PARAMETER", `range must be a non-negative integer, got ${range}`);
  }

  const key = decodeKey(secret);

  try {
    // Authenticator apps display codes in groups: "123 456"
    const submitted = code.replace(/\s/g, "");
    if (!/^\d+$/.test(submitted) || submitted.length !== opts.digits) {
      return { valid: false };
    }
    const submittedBytes = Buffer.from(submitted);

    const current = counterAt(resolveTimestamp(options), opts.epoch, opts.interval);

    for (const delta of windowOffsets(range)) {
      const counter = current + BigInt(delta);
      if (counter < 0n || counter >= UINT64_LIMIT) continue;

      const expected = Buffer.from(formatCode(hotp(key, counter, opts), opts.digits));
      if (crypto.timingSafeEqual(expected, submittedBytes)) {
        return { valid: true, delta };
      }
    }

    return { valid: false };
  } finally {
    key.fill(0);
  }
}

/**
 * Random secret of `size` bytes, Base32-encoded for enrolment
 */
export function generateSecret(size = 20): string {
  return base32Encode(crypto.randomBytes(size));
}

/**
 * Key URI understood by authenticator apps when scanned as a QR code.
 * `digits`, `period` and `algorithm` are only written when they differ from
 * {@link DEFAULT_OPTIONS}, since apps assume those values otherwise.
 */
export function generateOtpAuthUri(
  secret: string,
  user: string,
  issuer: string,
  options: TOTPOptions = {},
): string {
  const label = `${encodeURIComponent(issuer)}:${encodeURIComponent(user)}`;
  const params: Array<[string, string]> = [
    ["secret", secret.toUpperCase()],
    ["issuer", encodeURIComponent(issuer)],
  ];

  const digits = options.digits ?? DEFAULT_OPTIONS.digits;
  if (digits !== DEFAULT_OPTIONS.digits) {
    params.push(["digits", String(digits)]);
  }
  const period = String(options.interval ?? DEFAULT_OPTIONS.interval);
  if (period !== String(DEFAULT_OPTIONS.interval)) {
    params.push(["period", period]);
  }
  const algorithm = options.algorithm ?? DEFAULT_OPTIONS.algorithm;
  if (algorithm !== DEFAULT_OPTIONS.algorithm) {
    params.push(["algorithm", algorithm.toUpperCase()]);
  }

  const query = params.map(([name, value]) => `${name}=${value}`).join("&");
  return `otpauth://totp/${label}?${query}`;
}
