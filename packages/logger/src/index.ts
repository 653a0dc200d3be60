/**
 * @otpkit/logger
 *
 * Levelled logger writing through the console.
 *
 * Two back ends:
 * - "std": each level goes to the matching console method
 * - "stderr": every level goes to console.error as "[level] message", which
 *   keeps stdout free for program output
 *
 * @packageDocumentation
 */

export const LOG_LEVELS = ["debug", "info", "notice", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LoggerBackend = "std" | "stderr";

export interface LoggerConfig {
  /** Lowest level written (default: "notice") */
  logLevel?: LogLevel;
  /** Back end (default: "std") */
  logger?: LoggerBackend;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  notice(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type Sink = (level: LogLevel, message: string) => void;

const stdSink: Sink = (level, message) => {
  switch (level) {
    case "debug":
      console.debug(message);
      break;
    case "info":
      console.log(message);
      break;
    case "notice":
    case "warn":
      console.warn(message);
      break;
    case "error":
      console.error(message);
      break;
  }
};

const stderrSink: Sink = (level, message) => {
  console.error(`[${level}] ${message}`);
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(conf: LoggerConfig = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(conf.logLevel ?? "notice");
  const sink = conf.logger === "stderr" ? stderrSink : stdSink;

  const at =
    (level: LogLevel) =>
    (message: string): void => {
      if (LOG_LEVELS.indexOf(level) >= threshold) {
        sink(level, message);
      }
    };

  return {
    debug: at("debug"),
    info: at("info"),
    notice: at("notice"),
    warn: at("warn"),
    error: at("error"),
  };
}
