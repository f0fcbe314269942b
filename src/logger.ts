import type { ConsolaInstance } from "consola";
import { createConsola, LogLevels } from "consola";

export type Logger = ConsolaInstance;

export type LogLevelName = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "verbose";

// Root instance. Tagged children copy the level when created, so they are
// cached per tag here and kept in step by setLogLevel.
export const logger: Logger = createConsola({ level: LogLevels.info });
const children = new Map<string, Logger>();

/** Scoped logger with a `[tag]` prefix. Repeated calls with one tag share an instance. */
export function createLogger(tag: string): Logger {
  let child = children.get(tag);
  if (!child) {
    child = logger.withTag(tag);
    children.set(tag, child);
  }
  return child;
}

export function setLogLevel(level: number): void {
  logger.level = level;
  for (const child of children.values()) {
    child.level = level;
  }
}

export function levelFromName(name: LogLevelName): number {
  return LogLevels[name];
}

export { LogLevels } from "consola";
