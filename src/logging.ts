import pino from "pino";
import type { DestinationStream, Logger } from "pino";

/**
 * Access tokens can show up in logged tokens, requests and headers; pino
 * censors these paths before anything is written.
 */
export const REDACT_PATHS = [
  "tokenValue",
  "accessToken",
  "*.tokenValue",
  "*.accessToken",
  "headers.authorization",
  "*.headers.authorization",
];

export type LoggerOptions = {
  level?: pino.LevelWithSilent;
  stream?: DestinationStream; // tests pass an in-memory stream
};

function levelFromEnv(): pino.LevelWithSilent {
  const level = process.env.LOG_LEVEL?.trim().toLowerCase();
  switch (level) {
    case "fatal":
    case "error":
    case "warn":
    case "info":
    case "debug":
    case "trace":
    case "silent":
      return level;
    default:
      return "info";
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? levelFromEnv(),
    redact: REDACT_PATHS,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  return pino(pinoOptions, options.stream ?? pino.destination(2));
}
