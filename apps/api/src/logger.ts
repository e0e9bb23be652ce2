import pino, { type Logger, type LoggerOptions } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

const redactPaths = [
  "authorization",
  "password",
  "secret",
  "token",
  "*.password",
  "*.secret",
  "*.token",
  "req.headers.authorization",
];

/**
 * Builds the root pino logger for the configured destination. `enabled: false`
 * produces a silent logger with the same API, which tests use.
 */
export function createLogger(logging: AppConfig["logging"], enabled = true): Logger {
  const options: LoggerOptions = {
    level: logging.level,
    enabled,
    redact: { paths: redactPaths, censor: "[REDACTED]" },
    serializers: { err: pino.stdSerializers.err },
  };

  switch (logging.provider) {
    case "console":
      return pino(options);
    case "json":
      return pino({
        ...options,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: { level: (label) => ({ level: label }) },
      });
    case "file":
      return pino(options, pino.destination({ dest: logging.filePath, mkdir: true, sync: false }));
  }
}
