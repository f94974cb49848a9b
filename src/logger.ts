import pino from "pino";
import type { Logger } from "pino";
import { getConfig } from "./config.js";
import type { LogLevel } from "./config.js";

export type { Logger };

export interface LoggerOptions {
  enabled?: boolean;
  level?: LogLevel;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const config = getConfig();
  const enabled = options.enabled ?? config.TRAE_ENABLE_LOGGING;

  return pino({
    name: "trae-transport",
    level: enabled ? (options.level ?? config.LOG_LEVEL) : "silent",
    transport:
      config.NODE_ENV === "development" && enabled
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss",
              ignore: "pid,hostname"
            }
          }
        : undefined
  });
}

export const logger = createLogger();
