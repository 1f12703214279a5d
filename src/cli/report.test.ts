import { describe, expect, it } from "vitest";

import type { TaskStatusSummary } from "../core/state-store.js";

import { formatRegistryTable, formatTaskReport, formatTransitionLine } from "./report.js";

function summary(overrides: Partial<TaskStatusSummary> = {}): TaskStatusSummary {
  return {
    taskId: "task_3",
    done: false,
    createdAt: "2024-01-01T00:00:00.000Z",
    updatedAt: "2024-01-01T00:05:00.000Z",
    workingDir: "/repo",
    maxRetries: 2,
    concurrency: 2,
    verifyCommand: "npm test",
    counts: {
      total: 3,
      pending: 1,
      prompt_in_progress: 0,
      awaiting_verification: 0,
      verify_in_progress: 0,
      fixup_in_progress: 0,
      completed: 1,
      failed: 1,
    },
    files: [
      { path: "src/a.ts", status: "completed", retryCount: 0, lastError: null },
      { path: "src/long-name.ts", status: "failed", retryCount: 2, lastError: "\nexpected 1\nreceived 2" },
      { path: "src/c.ts", status: "pending", retryCount: 0, lastError: null },
    ],
    ...overrides,
  };
}

describe("formatTransitionLine", () => {
  it("shows the worker and the retry count once retries were used", () => {
    expect(
      formatTransitionLine({
        taskId: "task_3",
        file: "src/a.ts",
        workerId: 2,
        from: "verify_in_progress",
        to: "fixup_in_progress",
        retryCount: 1,
      }),
    ).toBe("[task_3][worker 2] src/a.ts: verify_in_progress -> fixup_in_progress (retry 1)");

    expect(
      formatTransitionLine({
        taskId: "task_3",
        file: "src/a.ts",
        workerId: null,
        from: "pending",
        to: "prompt_in_progress",
        retryCount: 0,
      }),
    ).toBe("[task_3][worker -] src/a.ts: pending -> prompt_in_progress");
  });
});

describe("formatTaskReport", () => {
  it("lists every file and the first line of each failure", () => {
    expect(formatTaskReport(summary())).toEqual([
      "Task: task_3",
      "Status: incomplete",
      "Working dir: /repo",
      "Updated: 2024-01-01T00:05:00.000Z",
      "Files: 3 total, 1 completed, 1 failed, 1 remaining",
      "",
      "File              Status     Retries",
      "src/a.ts          completed  0",
      "src/long-name.ts  failed     2",
      "src/c.ts          pending    0",
      "",
      "Failures:",
      "- src/long-name.ts: expected 1",
    ]);
  });

  it("notes a task without files", () => {
    const lines = formatTaskReport(summary({ files: [] }));
    expect(lines[lines.length - 1]).toBe("(no files)");
  });
});

describe("formatRegistryTable", () => {
  it("prints a placeholder without tasks", () => {
    expect(formatRegistryTable([])).toEqual(["No tasks found."]);
  });

  it("prints one row per task", () => {
    expect(
      formatRegistryTable([
        {
          task_id: "task_0",
          state_file: "state_0.json",
          status_summary: "complete",
          working_dir: "/repo",
          description: "Add tests for {file}",
          created_at: "2024-01-01T00:00:00.000Z",
          updated_at: "2024-01-01T00:00:00.000Z",
        },
      ]),
    ).toEqual([
      "ID      Status    Created               Description",
      "task_0  complete  2024-01-01T00:00:00   Add tests for {file}",
    ]);
  });
});
