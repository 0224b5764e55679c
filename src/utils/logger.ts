import winston from "winston";
import type { LogLevel } from "../types";

let logger: winston.Logger | null = null;
let level: LogLevel = "warn";

function createLogger(): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({
        format: "YYYY-MM-DD HH:mm:ss",
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack }) => {
        const prefix = `[${timestamp}] [PrettyAxiosLogger] [${level.toUpperCase()}]`;
        if (stack) {
          return `${prefix} ${message}\n${stack}`;
        }
        return `${prefix} ${message}`;
      })
    ),
    transports: [new winston.transports.Console()],
    exitOnError: false,
  });
}

function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

/**
 * Changes the level of the package's own diagnostics. Takes effect on the
 * live logger as well as on the next one created.
 */
export function setLogLevel(next: LogLevel): void {
  level = next;
  if (logger) logger.level = next;
}

export function getLogLevel(): LogLevel {
  return level;
}

type LogMethod = (message: string, meta?: Record<string, unknown>) => void;

export const log: Record<LogLevel, LogMethod> = {
  error: (message, meta) => {
    getLogger().error(message, meta);
  },
  warn: (message, meta) => {
    getLogger().warn(message, meta);
  },
  info: (message, meta) => {
    getLogger().info(message, meta);
  },
  verbose: (message, meta) => {
    getLogger().verbose(message, meta);
  },
  debug: (message, meta) => {
    getLogger().debug(message, meta);
  },
  silly: (message, meta) => {
    getLogger().silly(message, meta);
  },
};

export function resetLogger(): void {
  logger = null;
}
