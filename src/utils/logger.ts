/**
 * Shared pino logger.
 */

import pino from "pino";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = (process.env.LOG_LEVEL || "").trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : DEFAULT_LOG_LEVEL;
}

function shouldPrettyPrint(level: LogLevel): boolean {
  const noColor = process.env.NO_COLOR;
  if (level === "silent" || noColor === "1" || noColor === "true") {
    return false;
  }
  return Boolean(process.stdout.isTTY);
}

const level = initialLevel();

const logger = pino({
  level,
  serializers: { error: pino.stdSerializers.err },
  ...(shouldPrettyPrint(level)
    ? { transport: { target: "pino-pretty", options: { colorize: true } } }
    : {}),
});

/**
 * Change the log level at run time. Unknown levels are ignored with a
 * warning.
 */
export function configureLogger(requested?: string): void {
  const wanted = requested || process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
  const normalized = wanted.trim().toLowerCase();
  if (isLogLevel(normalized)) {
    logger.level = normalized;
    return;
  }
  logger.warn(
    { level: requested },
    "Invalid log level; keeping current level",
  );
}

export default logger;
