import type { TransitionEvent } from "../app/orchestrator/run/task-orchestrator.js";
import type { TaskStatusSummary } from "../core/state-store.js";
import type { RegistryEntry } from "../core/task-registry.js";

// =============================================================================
// PROGRESS
// =============================================================================

export function formatTransitionLine(event: TransitionEvent): string {
  const worker = event.workerId === null ? "-" : `${event.workerId}`;
  const retry = event.retryCount > 0 ? ` (retry ${event.retryCount})` : "";
  return `[${event.taskId}][worker ${worker}] ${event.file}: ${event.from} -> ${event.to}${retry}`;
}

// =============================================================================
// REPORTS
// =============================================================================

export function formatTaskReport(summary: TaskStatusSummary): string[] {
  const { counts } = summary;
  const lines = [
    `Task: ${summary.taskId}`,
    `Status: ${summary.done ? "complete" : "incomplete"}`,
    `Working dir: ${summary.workingDir}`,
    `Updated: ${summary.updatedAt}`,
    `Files: ${counts.total} total, ${counts.completed} completed, ${counts.failed} failed, ${counts.total - counts.completed - counts.failed} remaining`,
    "",
  ];

  if (summary.files.length === 0) {
    lines.push("(no files)");
    return lines;
  }

  const pathWidth = Math.max("File".length, ...summary.files.map((row) => row.path.length));
  const statusWidth = Math.max("Status".length, ...summary.files.map((row) => row.status.length));

  lines.push(`${"File".padEnd(pathWidth)}  ${"Status".padEnd(statusWidth)}  Retries`);
  for (const row of summary.files) {
    lines.push(`${row.path.padEnd(pathWidth)}  ${row.status.padEnd(statusWidth)}  ${row.retryCount}`);
  }

  const failed = summary.files.filter((row) => row.status === "failed");
  if (failed.length > 0) {
    lines.push("", "Failures:");
    for (const row of failed) {
      lines.push(`- ${row.path}: ${firstLine(row.lastError ?? "(no error recorded)")}`);
    }
  }

  return lines;
}

export function formatRegistryTable(entries: RegistryEntry[]): string[] {
  if (entries.length === 0) {
    return ["No tasks found."];
  }

  const idWidth = Math.max("ID".length, ...entries.map((entry) => entry.task_id.length));
  const statusWidth = Math.max(
    "Status".length,
    ...entries.map((entry) => entry.status_summary.length),
  );

  const lines = [`${"ID".padEnd(idWidth)}  ${"Status".padEnd(statusWidth)}  Created               Description`];
  for (const entry of entries) {
    lines.push(
      `${entry.task_id.padEnd(idWidth)}  ${entry.status_summary.padEnd(statusWidth)}  ${entry.created_at.slice(0, 19).padEnd(20)}  ${entry.description}`,
    );
  }
  return lines;
}

export function resumeHint(taskId: string): string {
  return `Resume with: fileloop resume ${taskId}`;
}

function firstLine(text: string): string {
  const line = text.split("\n").find((candidate) => candidate.trim().length > 0) ?? "";
  return line.trim();
}
