import type { LoggerPort } from "../../ports/sys/LoggerPort";

type Level = "debug" | "info" | "warn" | "error";

export interface ConsoleLoggerOptions {
  scope?: string;
  /** Debug lines are dropped unless enabled. */
  debug?: boolean;
}

function format(scope: string | undefined, message: string, meta?: Record<string, unknown>): string {
  const prefixed = scope ? `[${scope}] ${message}` : message;
  if (!meta || !Object.keys(meta).length) return prefixed;
  try {
    return `${prefixed} ${JSON.stringify(meta)}`;
  } catch {
    return `${prefixed} ${String(meta)}`;
  }
}

export class ConsoleLogger implements LoggerPort {
  constructor(private readonly options: ConsoleLoggerOptions = {}) {}

  child(scope: string): ConsoleLogger {
    const nested = this.options.scope ? `${this.options.scope}:${scope}` : scope;
    return new ConsoleLogger({ ...this.options, scope: nested });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.options.debug) return;
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

  private write(level: Level, message: string, meta?: Record<string, unknown>): void {
    const line = format(this.options.scope, message, meta);
    switch (level) {
      case "debug":
        return console.debug(line);
      case "info":
        return console.info(line);
      case "warn":
        return console.warn(line);
      case "error":
        return console.error(line);
    }
  }
}
