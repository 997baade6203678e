import pino, { type Logger } from "pino";
import pretty from "pino-pretty";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === fromEnv) ?? "info";
}

const root = pino(
  { level: initialLevel(), base: undefined },
  pretty({
    destination: 2,
    translateTime: "SYS:HH:MM:ss",
    ignore: "pid,hostname,module",
    messageFormat: "[{module}] {msg}",
    sync: true,
  })
);

const children = new Set<Logger>();

/**
 * Create a logger bound to a module name.
 */
export function createLogger(module: string): Logger {
  const child = root.child({ module });
  children.add(child);
  return child;
}

/**
 * Change the level of the root logger and every module logger created so far.
 */
export function setLogLevel(level: LogLevel): void {
  root.level = level;
  for (const child of children) {
    child.level = level;
  }
}
