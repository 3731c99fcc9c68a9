/**
 * Centralized logging configuration using Pino
 * Pretty-printed in development, JSON lines in production, silent under test
 */

import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";
const isTest = process.env.VITEST !== undefined;

function resolveLevel(): string {
  if (isTest) return "silent";
  return process.env.LOG_LEVEL || (isDev ? "debug" : "info");
}

/**
 * Pino logger instance
 * In development: Pretty-printed colored output
 * In production: JSON format for log aggregation
 */
export const logger = pino({
  level: resolveLevel(),
  transport:
    isDev && !isTest
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:mm:ss",
            ignore: "pid,hostname,component",
          },
        }
      : undefined,
});

export type Logger = pino.Logger;

/**
 * Create a component logger, e.g. `createComponentLogger("ConnectionManager", "Conn")`
 * logs `[Conn] ...` with `{ component: "ConnectionManager" }` bound.
 */
export function createComponentLogger(component: string, prefix: string = component): Logger {
  return logger.child({ component }, { msgPrefix: `[${prefix}] ` });
}
