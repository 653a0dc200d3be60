/**
 * Settings for one run of the `totp` command.
 *
 * Flags win over environment variables, which win over the built-in defaults.
 */

import { LOG_LEVELS } from "@otpkit/logger";
import { DEFAULT_OPTIONS } from "@otpkit/otp";
import { z } from "zod";
import { CliError } from "./errors";

/** Option values as commander hands them over */
export type CliFlags = {
  digits?: string;
  epoch?: string;
  interval?: string;
  time?: string;
  algorithm?: string;
  verify?: string;
  range?: string;
  logLevel?: string;
};

export const ENV_PREFIX = "TOTP_";

const unsigned = z
  .string()
  .trim()
  .regex(/^\d+$/, "expected a non-negative integer");

const seconds = unsigned.transform((value) => BigInt(value));

const ConfigSchema = z.object({
  digits: unsigned.transform(Number).default(String(DEFAULT_OPTIONS.digits)),
  epoch: seconds.default(String(DEFAULT_OPTIONS.epoch)),
  interval: seconds.default(String(DEFAULT_OPTIONS.interval)),
  time: seconds.optional(),
  algorithm: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["sha1", "sha256", "sha512"]))
    .default(DEFAULT_OPTIONS.algorithm),
  range: unsigned.transform(Number).default(String(DEFAULT_OPTIONS.range)),
  verify: z.string().optional(),
  logLevel: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default("warn"),
});

export type CliConfig = z.infer<typeof ConfigSchema>;

/**
 * Merge flags over `TOTP_*` environment variables and validate the result
 * @throws CliError naming the first invalid setting
 */
export function resolveConfig(
  flags: CliFlags,
  env: Record<string, string | undefined> = {},
): CliConfig {
  const parsed = ConfigSchema.safeParse({
    digits: flags.digits ?? env[`${ENV_PREFIX}DIGITS`],
    epoch: flags.epoch ?? env[`${ENV_PREFIX}EPOCH`],
    interval: flags.interval ?? env[`${ENV_PREFIX}INTERVAL`],
    time: flags.time,
    algorithm: flags.algorithm ?? env[`${ENV_PREFIX}ALGORITHM`],
    range: flags.range ?? env[`${ENV_PREFIX}RANGE`],
    verify: flags.verify,
    logLevel: flags.logLevel ?? env[`${ENV_PREFIX}LOG_LEVEL`],
  });

  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new CliError(`invalid ${issue.path.join(".")}: ${issue.message}`);
  }

  return parsed.data;
}
