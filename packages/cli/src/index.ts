/**
 * @otpkit/cli
 *
 * The `totp` command: prints the current code for a Base32 secret given as
 * an argument or on standard input.
 *
 * @packageDocumentation
 */

export { run, createProgram, VERSION, type CliIO } from "./program";
export { resolveConfig, ENV_PREFIX, type CliConfig, type CliFlags } from "./config";
export { readSecret } from "./input";
export { formatError } from "./output";
export { CliError } from "./errors";
