import winston from "winston";

export type Logger = winston.Logger;

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly color?: boolean;
  readonly silent?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

const { combine, timestamp, printf, colorize, errors } = winston.format;

const consoleFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  const stackStr = typeof stack === "string" ? `\n${stack}` : "";
  return `${String(timestamp)} [${level}] ${String(message)}${metaStr}${stackStr}`;
});

/**
 * Console logger bound to stderr for every level, so stdout carries only the
 * rendered report.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const formats = [
    errors({ stack: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  ];
  if (options.color ?? false) {
    formats.push(colorize({ all: true }));
  }
  formats.push(consoleFormat);

  return winston.createLogger({
    level: options.level ?? "info",
    silent: options.silent ?? false,
    format: combine(...formats),
    transports: [
      new winston.transports.Console({
        stderrLevels: [...LOG_LEVELS],
      }),
    ],
  });
}

export function createSilentLogger(): Logger {
  return createLogger({ silent: true });
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
