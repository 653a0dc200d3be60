import chalk from "chalk";
import { isOtpError } from "@otpkit/otp";
import { CliError } from "./errors";

function messageOf(error: unknown): string {
  if (isOtpError(error) || error instanceof CliError) {
    return error.message;
  }
  if (error instanceof Error) {
    return `unexpected failure: ${error.message}`;
  }
  return "an unexpected error occurred";
}

/**
 * Render a failure for stderr
 */
export function formatError(error: unknown): string {
  return chalk.red(`error: ${messageOf(error)}, try --help`);
}

/**
 * Usage errors from commander arrive as "error: ...\n"; give them the same
 * hint as every other failure
 */
export function formatCommanderError(text: string): string {
  return `${chalk.red(`${text.replace(/\n+$/, "")}, try --help`)}\n`;
}
