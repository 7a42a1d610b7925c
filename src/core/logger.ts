import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export type LogEvent = JsonObject & {
  ts: string;
  level: LogLevel;
  type: string;
  session_id?: number;
  task?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  level?: LogLevel;
  sessionId?: number;
  task?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type EventDefaults = {
  sessionId?: number;
  task?: string;
};

export interface LogSink {
  readonly label: string;
  write(line: string): void;
  close(): void;
}

export type JsonlLoggerOptions = {
  level?: LogLevel;
  defaults?: EventDefaults;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  readonly level: LogLevel;
  private readonly defaults: EventDefaults;

  constructor(
    private readonly sink: LogSink,
    opts: JsonlLoggerOptions = {},
  ) {
    this.level = opts.level ?? "info";
    this.defaults = opts.defaults ?? {};
  }

  static toStderr(opts: JsonlLoggerOptions = {}): JsonlLogger {
    return new JsonlLogger(new StreamSink(process.stderr, "stderr"), opts);
  }

  static toFile(filePath: string, opts: JsonlLoggerOptions = {}): JsonlLogger {
    return new JsonlLogger(new FileSink(filePath), opts);
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.level];
  }

  log(event: LogEventInput): void {
    const level = event.level ?? "info";
    if (!this.enabled(level)) return;
    this.sink.write(`${JSON.stringify(eventWithTs(event, this.defaults))}\n`);
  }

  error(type: string, payload?: JsonObject): void {
    this.log({ type, level: "error", payload });
  }

  warn(type: string, payload?: JsonObject): void {
    this.log({ type, level: "warn", payload });
  }

  info(type: string, payload?: JsonObject): void {
    this.log({ type, level: "info", payload });
  }

  debug(type: string, payload?: JsonObject): void {
    this.log({ type, level: "debug", payload });
  }

  child(defaults: EventDefaults): JsonlLogger {
    return new JsonlLogger(this.sink, {
      level: this.level,
      defaults: { ...this.defaults, ...defaults },
    });
  }

  close(): void {
    this.sink.close();
  }
}

// =============================================================================
// SINKS
// =============================================================================

export class FileSink implements LogSink {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(public readonly label: string) {
    fse.ensureDirSync(path.dirname(label));
    this.fileDescriptor = fs.openSync(label, "a");
  }

  write(line: string): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, line);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatSinkFailureWarning("write", this.label, err));
    }
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatSinkFailureWarning("close", this.label, err));
    } finally {
      this.closed = true;
    }
  }
}

export class StreamSink implements LogSink {
  constructor(
    private readonly stream: NodeJS.WritableStream,
    public readonly label: string,
  ) {}

  write(line: string): void {
    try {
      this.stream.write(line);
    } catch (err) {
      console.warn(formatSinkFailureWarning("write", this.label, err));
    }
  }

  // The process owns stderr.
  close(): void {}
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { sessionId: providedSessionId, task: providedTask, payload, ts, type, level } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ts: normalizedTs,
    level: level ?? "info",
    type,
  };

  const sessionId = providedSessionId ?? defaults.sessionId;
  if (sessionId !== undefined) {
    result.session_id = sessionId;
  }
  const task = providedTask ?? defaults.task;
  if (task) {
    result.task = task;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "warning") return "warn";
  return LOG_LEVELS.find((level) => level === normalized);
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatSinkFailureWarning(
  action: "write" | "close",
  label: string,
  error: unknown,
): string {
  const actionLabel = action === "write" ? `write log event to ${label}` : `close log ${label}`;
  return `Warning: failed to ${actionLabel}: ${formatErrorMessage(error)}`;
}
