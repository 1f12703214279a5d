import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

/** One line of a task's JSONL log. */
export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  task_id: string;
  file?: string;
  worker?: number;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  file?: string;
  worker?: number;
  payload?: JsonObject;
  ts?: string | Date;
};

export type LogEventListener = (event: LogEvent) => void;

export type JsonlLoggerOptions = {
  taskId: string;
  // Receives every event after it is written, e.g. to print progress.
  echo?: LogEventListener;
};

// =============================================================================
// LOGGER
// =============================================================================

/**
 * Append-only event log for one task. Each event is synced before `log` returns, so the log
 * is never behind the state file by more than the event being written.
 *
 * Logging must not take a run down: write failures become console warnings.
 */
export class JsonlLogger {
  private readonly fd: number;
  private readonly debug = resolveDebugFlagFromArgv(process.argv) ?? false;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly options: JsonlLoggerOptions,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
  }

  log(input: LogEventInput): void {
    if (this.closed) return;

    const event = buildLogEvent(input, this.options.taskId);
    try {
      fs.writeSync(this.fd, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fd);
    } catch (err) {
      this.warn(`write log event to ${this.filePath}`, err);
    }
    this.options.echo?.(event);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.fsyncSync(this.fd);
      fs.closeSync(this.fd);
    } catch (err) {
      this.warn(`close log file ${this.filePath}`, err);
    }
  }

  private warn(action: string, err: unknown): void {
    const message = `Warning: failed to ${action}: ${formatErrorMessage(err)}`;
    const stack = this.debug
      ? formatErrorLines(err, { mode: "debug" }).find((line) => line.kind === "stack")?.text
      : undefined;
    console.warn(stack ? `${message}\n${stack}` : message);
  }
}

// =============================================================================
// EVENTS
// =============================================================================

export function buildLogEvent(input: LogEventInput, taskId: string): LogEvent {
  const ts = input.ts instanceof Date ? input.ts.toISOString() : (input.ts ?? isoNow());
  const event: LogEvent = { ts, type: input.type, task_id: taskId };

  if (input.file !== undefined) event.file = input.file;
  if (input.worker !== undefined) event.worker = input.worker;
  if (input.payload && Object.keys(input.payload).length > 0) event.payload = input.payload;

  return event;
}

export function logTaskEvent(
  logger: JsonlLogger,
  type: string,
  fields: Omit<LogEventInput, "type"> = {},
): void {
  logger.log({ type, ...fields });
}

export function logTaskResume(
  logger: JsonlLogger,
  details: { recovered: number; remaining: number; terminal: number },
): void {
  logTaskEvent(logger, "task.resume", {
    payload: {
      recovered_files: details.recovered,
      remaining_files: details.remaining,
      terminal_files: details.terminal,
    },
  });
}

// =============================================================================
// DEBUG FLAG
// =============================================================================

/** The last of `--debug` / `--no-debug` before a `--` wins; undefined when neither appears. */
export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debug: boolean | undefined;
  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") debug = true;
    if (arg === "--no-debug") debug = false;
  }
  return debug;
}
