import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  JsonlLogger,
  buildLogEvent,
  logTaskEvent,
  logTaskResume,
  resolveDebugFlagFromArgv,
  type LogEvent,
} from "./logger.js";

const tempDirs: string[] = [];

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function tempLogPath(...segments: string[]): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
  tempDirs.push(dir);
  return path.join(dir, ...segments);
}

function readEvents(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line): Record<string, unknown> => JSON.parse(line));
}

describe("JsonlLogger", () => {
  it("writes events with the default task id into a nested log path", () => {
    const logPath = tempLogPath("logs", "task_0.jsonl");
    const logger = new JsonlLogger(logPath, { taskId: "task_0" });

    logger.log({ type: "task.start", payload: { scheduled_files: 2 } });
    logger.close();

    const [event] = readEvents(logPath);
    expect(event.type).toBe("task.start");
    expect(event.task_id).toBe("task_0");
    expect(event.payload).toEqual({ scheduled_files: 2 });
    expect(new Date(String(event.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const logPath = tempLogPath("events.jsonl");
    const first = new JsonlLogger(logPath, { taskId: "task_1" });
    first.log({ type: "task.create" });
    first.close();

    const second = new JsonlLogger(logPath, { taskId: "task_1" });
    second.log({ type: "task.resume" });
    second.close();

    expect(readEvents(logPath).map((event) => event.type)).toEqual(["task.create", "task.resume"]);
  });

  it("passes every written event to the echo listener", () => {
    const logPath = tempLogPath("events.jsonl");
    const seen: LogEvent[] = [];
    const logger = new JsonlLogger(logPath, { taskId: "task_2", echo: (e) => seen.push(e) });

    logTaskEvent(logger, "file.transition", {
      file: "src/a.ts",
      worker: 1,
      ts: "2024-05-01T00:00:00.000Z",
      payload: { from: "pending", to: "prompt_in_progress" },
    });
    logger.close();

    expect(seen).toEqual([
      {
        ts: "2024-05-01T00:00:00.000Z",
        type: "file.transition",
        task_id: "task_2",
        file: "src/a.ts",
        worker: 1,
        payload: { from: "pending", to: "prompt_in_progress" },
      },
    ]);
    expect(readEvents(logPath)).toEqual(seen);
  });

  it("ignores writes after close", () => {
    const logPath = tempLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { taskId: "task_3" });
    logger.log({ type: "task.start" });
    logger.close();
    logger.log({ type: "task.stop" });
    logger.close();

    expect(readEvents(logPath).map((event) => event.type)).toEqual(["task.start"]);
  });

  it("warns on write failures instead of throwing", () => {
    const logPath = tempLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { taskId: "task_4" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "task.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });
});

describe("event helpers", () => {
  it("drops empty payloads", () => {
    const event = buildLogEvent(
      { type: "task.complete", payload: {}, ts: "2024-01-01T00:00:00.000Z" },
      "task_5",
    );
    expect(event).toEqual({ ts: "2024-01-01T00:00:00.000Z", type: "task.complete", task_id: "task_5" });
  });

  it("serializes Date timestamps", () => {
    const event = buildLogEvent(
      { type: "task.start", worker: 0, ts: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) },
      "task_5",
    );
    expect(event).toEqual({
      ts: "2024-01-02T03:04:05.000Z",
      type: "task.start",
      task_id: "task_5",
      worker: 0,
    });
  });

  it("summarizes a resume", () => {
    const logPath = tempLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { taskId: "task_6" });
    logTaskResume(logger, { recovered: 1, remaining: 3, terminal: 2 });
    logger.close();

    const [event] = readEvents(logPath);
    expect(event.type).toBe("task.resume");
    expect(event.payload).toEqual({ recovered_files: 1, remaining_files: 3, terminal_files: 2 });
  });

  it("reads the last debug flag before --", () => {
    expect(resolveDebugFlagFromArgv(["node", "fileloop", "--debug", "--no-debug"])).toBe(false);
    expect(resolveDebugFlagFromArgv(["node", "fileloop", "--", "--debug"])).toBeUndefined();
    expect(resolveDebugFlagFromArgv(["--debug"])).toBe(true);
  });
});
