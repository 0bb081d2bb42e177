import { pino } from "pino";
import type { DestinationStream, Logger } from "pino";
import { DEFAULT_CLIENT_NAME } from "./constants.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  level?: string;
  name?: string;
  destination?: DestinationStream;
}

const REDACTED_TEXT = "[REDACTED]";

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = {
    name: options.name ?? DEFAULT_CLIENT_NAME,
    level: options.level?.trim() || process.env.LOG_LEVEL?.trim() || "info"
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

export function redactToken(text: string, token: string | undefined): string {
  const trimmed = token?.trim();
  if (!trimmed) {
    return text;
  }
  return text.split(trimmed).join(REDACTED_TEXT);
}
