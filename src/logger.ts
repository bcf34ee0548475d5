import winston from "winston";
import type { LogLevel } from "./schemas/config.js";

/**
 * Minimal logging surface every component takes by injection.
 */
export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export interface LoggerOptions {
  /** Prefix for all log lines. Default: "blackboard". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: LogLevel;
}

/**
 * Winston-backed logger writing `<timestamp> [prefix:level] message` lines.
 */
export function createLogger(opts?: LoggerOptions): Logger {
  const prefix = opts?.prefix ?? "blackboard";
  const minLevel = opts?.level ?? "info";

  const winstonLogger = winston.createLogger({
    level: minLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      winston.format.printf(
        ({ timestamp, level, message }) =>
          `${String(timestamp)} [${prefix}:${level}] ${String(message)}`,
      ),
    ),
    transports: [new winston.transports.Console({ forceConsole: true })],
  });

  return {
    debug: (msg: string) => winstonLogger.debug(msg),
    info: (msg: string) => winstonLogger.info(msg),
    warn: (msg: string) => winstonLogger.warn(msg),
    error: (msg: string) => winstonLogger.error(msg),
  };
}

/** Child logger sharing the parent's sink, with a sub-prefix on every line */
export function withPrefix(logger: Logger, prefix: string): Logger {
  return {
    debug: (msg: string) => logger.debug(`${prefix}: ${msg}`),
    info: (msg: string) => logger.info(`${prefix}: ${msg}`),
    warn: (msg: string) => logger.warn(`${prefix}: ${msg}`),
    error: (msg: string) => logger.error(`${prefix}: ${msg}`),
  };
}
