// src/logger.ts
import { type Level, type Logger, pino } from "pino";

export type { Logger };
export type LogLevel = Level | "silent";

export const logger = pino({
  name: "waste-pickup-alerts",
  level: process.env.LOG_LEVEL ?? "info",
});

// Children copy the parent's level once, when they are created
const children = new Set<Logger>();

export function childLogger(module: string): Logger {
  const child = logger.child({ module });
  children.add(child);
  return child;
}

/** Applies `level` to the root logger and every module logger. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of children) child.level = level;
}
