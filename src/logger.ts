/**
 * Application logger.
 *
 * Writes one line per event to the console and to an append-only log file:
 *   <ISO timestamp> - <component> - <LEVEL> - <message>[ <json data>]
 */

import { createWriteStream } from "node:fs";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  /** Logger sharing sinks and level, tagged with another component name. */
  child(component: string): Logger;
}

/**
 * Destination for formatted log lines.
 */
export interface LogSink {
  write(line: string, level: LogLevel): void;
  close?(): Promise<void>;
}

export interface LoggerOptions {
  component: string;
  level?: LogLevel;
  sinks?: LogSink[];
  clock?: () => Date;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ============================================================================
// Sinks
// ============================================================================

export const consoleSink: LogSink = {
  write(line, level) {
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  },
};

/**
 * Append-only file sink. Lines are queued on a write stream, so logging
 * never blocks the caller.
 */
export function createFileSink(path: string): LogSink {
  const stream = createWriteStream(path, { flags: "a", encoding: "utf8" });
  stream.on("error", (err) => {
    console.error(`[logger] Failed to write ${path}: ${err.message}`);
  });

  return {
    write(line) {
      stream.write(`${line}\n`);
    },
    close() {
      return new Promise<void>((resolve) => {
        stream.end(() => resolve());
      });
    },
  };
}

/**
 * In-memory sink, handy for inspecting log output.
 */
export function createMemorySink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write(line) {
      lines.push(line);
    },
  };
}

// ============================================================================
// Logger
// ============================================================================

export function formatLogLine(
  timestamp: Date,
  component: string,
  level: LogLevel,
  message: string,
  data?: LogData,
): string {
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
  return `${timestamp.toISOString()} - ${component} - ${level.toUpperCase()} - ${message}${suffix}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVEL_WEIGHT[options.level ?? "info"];
  const sinks = options.sinks ?? [consoleSink];
  const clock = options.clock ?? (() => new Date());

  function build(component: string): Logger {
    const emit = (level: LogLevel, msg: string, data?: LogData): void => {
      if (LEVEL_WEIGHT[level] < threshold) return;
      const line = formatLogLine(clock(), component, level, msg, data);
      for (const sink of sinks) {
        sink.write(line, level);
      }
    };

    return {
      debug: (msg, data) => emit("debug", msg, data),
      info: (msg, data) => emit("info", msg, data),
      warn: (msg, data) => emit("warn", msg, data),
      error: (msg, data) => emit("error", msg, data),
      child: (name) => build(name),
    };
  }

  return build(options.component);
}

/**
 * Close every sink that holds a resource.
 */
export async function closeSinks(sinks: LogSink[]): Promise<void> {
  for (const sink of sinks) {
    await sink.close?.();
  }
}

/**
 * Error message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
