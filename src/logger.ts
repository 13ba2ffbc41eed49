/**
 * Console logger for vmkeep.
 *
 * Lines go to stderr so command output on stdout stays pipeable.
 */

import winston from "winston";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** The subset of a winston logger the compute modules write to. */
export type Logger = Pick<winston.Logger, LogLevel>;

export function createLogger(level: LogLevel = "info"): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level: lvl, message }) => `${timestamp} ${lvl}: ${message}`)
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: [...LOG_LEVELS],
        silent: process.env.NODE_ENV === "test",
      }),
    ],
  });
}

let _logger: winston.Logger | null = null;

export function logger(): winston.Logger {
  if (!_logger) _logger = createLogger();
  return _logger;
}

export function setLogLevel(level: LogLevel): void {
  logger().level = level;
}
