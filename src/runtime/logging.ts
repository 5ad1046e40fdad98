import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";
import { finished } from "stream";

export interface LoggingHandle {
  readonly logPath?: string;
  /** Restores console and resolves once the log file is flushed or has failed. */
  shutdown(): Promise<void>;
}

type ConsoleLevel = "log" | "debug" | "info" | "warn" | "error";

const LEVELS: ConsoleLevel[] = ["log", "debug", "info", "warn", "error"];

function stringifyArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Copies everything written through `console` into `logFile` (appending),
 * bracketed by session markers. Without a file this is a no-op.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: async () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  stream.write(`[${new Date().toISOString()}] --- benchmark session started (pid ${process.pid}) ---\n`);

  const original = {
    log: console.log,
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  stream.on("error", (err) => original.error(`Writing ${resolvedLog} failed:`, err));

  for (const level of LEVELS) {
    const forward = original[level].bind(console);
    console[level] = (...args: unknown[]) => {
      forward(...args);
      const message = args.map(stringifyArg).join(" ");
      stream.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}\n`);
    };
  }

  const shutdown = (): Promise<void> => {
    for (const level of LEVELS) {
      console[level] = original[level];
    }
    // A failed log file has already been reported by the error listener.
    return new Promise<void>((resolve) => {
      finished(stream, () => resolve());
      if (!stream.errored) {
        stream.end(`[${new Date().toISOString()}] --- benchmark session ended ---\n`);
      }
    });
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
