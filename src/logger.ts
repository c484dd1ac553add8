import pino, { type DestinationStream, type Logger } from "pino";
import type { LogLevel } from "./types";

/**
 * Logger used by a client when none is injected. Writes JSON lines to
 * stdout unless `destination` is given.
 */
export function createLogger(
  level: LogLevel = "silent",
  destination?: DestinationStream,
): Logger {
  return pino(
    {
      name: "chapa-sdk",
      level,
      redact: {
        paths: [
          "headers.authorization",
          'headers["Authorization"]',
          "apiKey",
          "*.apiKey",
        ],
        censor: "[REDACTED]",
      },
    },
    destination,
  );
}
