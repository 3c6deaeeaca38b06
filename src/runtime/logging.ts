import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";
import { format } from "util";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): void;
}

type ConsoleLevel = "log" | "debug" | "info" | "warn" | "error";

const LEVELS: ConsoleLevel[] = ["log", "debug", "info", "warn", "error"];

/**
 * Mirrors console output into an appended log file. Without a path the
 * console is left untouched.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  stream.write(`[${new Date().toISOString()}] --- file-agent session started ---\n`);

  const original = {
    log: console.log,
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  const mirror =
    (level: ConsoleLevel) =>
    (...args: unknown[]) => {
      original[level].apply(console, args);
      stream.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${format(...args)}\n`);
    };

  for (const level of LEVELS) {
    console[level] = mirror(level);
  }

  let closed = false;
  const shutdown = () => {
    if (closed) return;
    closed = true;
    for (const level of LEVELS) {
      console[level] = original[level];
    }
    stream.write(`[${new Date().toISOString()}] --- file-agent session ended ---\n`);
    stream.end();
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
