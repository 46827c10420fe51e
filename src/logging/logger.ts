import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

/**
 * Log fields that could carry conversation text. Components log ids and
 * counts; these paths catch anything that slips through.
 */
export const CONTENT_LOG_PATHS = [
  "content",
  "initialContext",
  "transcript",
  "query",
  "*.content",
  "history[*].content",
];

export function createLogger(config?: LoggingConfig): Logger {
  const options: pino.LoggerOptions = {
    name: "kestrel",
    level: config?.level ?? "info",
    redact: { paths: CONTENT_LOG_PATHS, censor: "[content]" },
  };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, mkdir: true, sync: true }));
  }

  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  if (isJson) return pino(options);

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
    },
  });
}
