/**
 * Failure in the command line layer itself (bad flag value, unreadable stdin)
 */
export class CliError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CliError";
  }
}
