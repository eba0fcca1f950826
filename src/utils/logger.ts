/**
 * Structured logger using Winston.
 * Tags every line with the unit (actor or module) that produced it.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const REDACTED_KEYS = new Set(["password", "username", "sessionId", "cookies"]);

/** Credentials and session material never reach a transport */
const redact = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (REDACTED_KEYS.has(key)) {
      info[key] = "[redacted]";
    }
  }
  return info;
});

const logFormat = printf(({ level, message, timestamp, unit, ...meta }) => {
  const unitTag = unit ? `[${String(unit)}]` : "[system]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} ${level} ${unitTag} ${message}${metaStr}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  silent: process.env.NODE_ENV === "test" && !process.env.LOG_LEVEL,
  format: combine(
    redact(),
    errors({ stack: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      // The CLI prints replies on stdout; keep log lines on stderr
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
      format: combine(colorize(), logFormat),
    }),
  ],
});

/** Create a child logger tagged with a unit name */
export function agentLogger(unit: string): winston.Logger {
  return logger.child({ unit });
}

/** Error-ish values flattened for log metadata */
export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
