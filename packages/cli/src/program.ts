import { Command, CommanderError } from "commander";
import { createLogger } from "@otpkit/logger";
import { generateCode, verifyCode, type TOTPOptions } from "@otpkit/otp";
import { resolveConfig, type CliFlags } from "./config";
import { readSecret } from "./input";
import { formatCommanderError, formatError } from "./output";

export const VERSION = "0.1.0";

/**
 * Process boundary of the command, injectable for tests
 */
export interface CliIO {
  stdin: NodeJS.ReadableStream;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
  /** Milliseconds since the Unix epoch (default: Date.now) */
  clock?: () => number;
}

export function createProgram(
  io: CliIO,
  setExitCode: (code: number) => void,
): Command {
  const program = new Command();

  program
    .name("totp")
    .description(
      "Print the time-based one-time password (RFC 6238) for a Base32 secret",
    )
    .version(VERSION)
    .argument("[secret]", "base32 secret; read from stdin when omitted")
    .option("-d, --digits <n>", "number of digits in the code (default: 6)")
    .option("-e, --epoch <seconds>", "Unix time steps are counted from (default: 0)")
    .option("-i, --interval <seconds>", "length of one time step (default: 30)")
    .option("-t, --time <seconds>", "Unix time to evaluate instead of now")
    .option("-a, --algorithm <name>", "sha1, sha256 or sha512 (default: sha1)")
    .option("--verify <code>", "check a code instead of printing one")
    .option("-r, --range <n>", "windows accepted either side with --verify (default: 1)")
    .option("--log-level <level>", "debug, info, notice, warn or error (default: warn)")
    .addHelpText(
      "after",
      [
        "",
        "Examples:",
        "  $ totp JBSWY3DPEHPK3PXP",
        "  $ echo JBSWY3DPEHPK3PXP | totp --digits 8",
        "",
        "Environment: TOTP_DIGITS, TOTP_EPOCH, TOTP_INTERVAL, TOTP_ALGORITHM,",
        "TOTP_RANGE and TOTP_LOG_LEVEL provide defaults for the flags.",
      ].join("\n"),
    )
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
      outputError: (text, write) => write(formatCommanderError(text)),
    })
    .action(async (secretArg: string | undefined) => {
      const config = resolveConfig(program.opts<CliFlags>(), io.env);
      const logger = createLogger({ logLevel: config.logLevel, logger: "stderr" });

      let secret = secretArg;
      if (secret === undefined) {
        logger.debug("reading secret from stdin");
        secret = await readSecret(io.stdin);
      }

      const options: TOTPOptions = {
        digits: config.digits,
        epoch: config.epoch,
        interval: config.interval,
        algorithm: config.algorithm,
        timestamp: config.time,
        clock: io.clock,
      };

      logger.debug(
        `algorithm=${config.algorithm} digits=${config.digits} epoch=${config.epoch} interval=${config.interval}`,
      );

      if (config.verify !== undefined) {
        const result = verifyCode(secret, config.verify, {
          ...options,
          range: config.range,
        });
        if (result.valid) {
          logger.info(`code accepted in window ${result.delta}`);
        }
        io.stdout(result.valid ? "valid\n" : "invalid\n");
        setExitCode(result.valid ? 0 : 1);
        return;
      }

      io.stdout(`${generateCode(secret, options)}\n`);
    });

  return program;
}

/**
 * Run the command once
 * @param args Arguments after the program name
 * @returns Process exit code
 */
export async function run(args: string[], io: CliIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(args, { from: "user" });
    return exitCode;
  } catch (error: unknown) {
    // Commander has already printed its own message
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.stderr(`${formatError(error)}\n`);
    return 1;
  }
}
