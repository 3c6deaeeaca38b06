import type { LogLevel, LoggerPort } from "../../ports/sys/LoggerPort";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
  const payload = meta && Object.keys(meta).length ? `${message} ${JSON.stringify(meta)}` : message;
  switch (level) {
    case "debug":
      return console.debug(payload);
    case "info":
      return console.info(payload);
    case "warn":
      return console.warn(payload);
    case "error":
      return console.error(payload);
  }
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
}

export class ConsoleLogger implements LoggerPort {
  private readonly minimum: number;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minimum = LEVEL_ORDER[options.level ?? "debug"];
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < this.minimum) return;
    log(level, message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }
}
