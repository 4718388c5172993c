import pino from "pino";
import { isEnabled } from "@/lib/infra/env";

export interface LoggerOptions {
  component: string;
  runId?: string;
}

export interface BaseLoggerOptions {
  level: string;
  pretty: boolean;
}

/** stderr; stdout carries CLI output, including --json payloads. */
export const LOG_FD = 2;

const prettyByDefault = process.env.NODE_ENV !== "production" && !process.env.VITEST;

/**
 * Base logger.
 * - pretty: pino-pretty with colors
 * - otherwise: JSON lines for log aggregation
 */
export function createBaseLogger(options: BaseLoggerOptions): pino.Logger {
  const shared: pino.LoggerOptions = {
    level: options.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.pretty) {
    return pino({
      ...shared,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: LOG_FD,
        },
      },
    });
  }
  return pino(shared, pino.destination({ fd: LOG_FD, sync: true }));
}

const baseLogger = createBaseLogger({
  level: process.env.LOG_LEVEL ?? "info",
  pretty: isEnabled("LOG_PRETTY", prettyByDefault ? "true" : "false"),
});

export type Logger = pino.Logger;

export function createLogger(options: LoggerOptions): Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.runId && { runId: options.runId }),
  });
}
