import readline from "node:readline";
import { CliError } from "./errors";

/**
 * Read the first line of a stream, trimmed.
 * A stream that ends without any data yields an empty string.
 */
export async function readSecret(input: NodeJS.ReadableStream): Promise<string> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

  try {
    for await (const line of rl) {
      return line.trim();
    }
    return "";
  } catch (error: unknown) {
    throw new CliError("error reading stdin", { cause: error });
  } finally {
    rl.close();
  }
}
