import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { PersistenceError, ResumeInconsistencyError } from "./errors.js";
import { countFileStatuses, type FileStatusCounts } from "./state-mutations.js";
import {
  TaskRecordSchema,
  type FileState,
  type FileStatus,
  type Task,
  type TaskRecord,
} from "./state-schema.js";
import { isMissingFile, isoNow, SerialQueue, writeJsonFileAtomic } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type FileStatusRow = {
  path: string;
  status: FileStatus;
  retryCount: number;
  lastError: string | null;
};

export type TaskStatusSummary = {
  taskId: string;
  done: boolean;
  createdAt: string;
  updatedAt: string;
  workingDir: string;
  maxRetries: number;
  concurrency: number;
  verifyCommand: string | null;
  counts: FileStatusCounts;
  files: FileStatusRow[];
};

// =============================================================================
// STORE
// =============================================================================

/**
 * Sole writer of one task's state file.
 *
 * `save` snapshots the task when it is called and publishes snapshots in call order, so a
 * slow write can never overwrite a newer one.
 */
export class TaskStateStore {
  private readonly queue = new SerialQueue();

  constructor(public readonly statePath: string) {}

  async exists(): Promise<boolean> {
    return fse.pathExists(this.statePath);
  }

  async load(): Promise<Task> {
    return fromTaskRecord(await loadTaskRecord(this.statePath));
  }

  async save(task: Task): Promise<void> {
    task.updated_at = isoNow();
    const record = toTaskRecord(task);

    await this.queue.run(async () => {
      try {
        await writeJsonFileAtomic(this.statePath, record);
      } catch (err) {
        throw new PersistenceError(
          `Failed to write task state to ${this.statePath}: ${formatErrorMessage(err)}`,
          this.statePath,
          err,
        );
      }
    });
  }
}

// =============================================================================
// RECORD I/O
// =============================================================================

export async function loadTaskRecord(statePath: string): Promise<TaskRecord> {
  let raw: string;
  try {
    raw = await fse.readFile(statePath, "utf8");
  } catch (err) {
    const reason = isMissingFile(err) ? "is missing" : `cannot be read (${formatErrorMessage(err)})`;
    throw new ResumeInconsistencyError(`Task state file ${statePath} ${reason}`, err);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new ResumeInconsistencyError(`Task state file ${statePath} is not valid JSON`, err);
  }

  const parsed = TaskRecordSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ResumeInconsistencyError(
      `Invalid task state at ${statePath}: ${parsed.error.toString()}`,
      parsed.error,
    );
  }

  return parsed.data;
}

export function toTaskRecord(task: Task): TaskRecord {
  const { files, ...rest } = task;
  const record: TaskRecord = {
    ...structuredClone(rest),
    files: [...files.values()].map((file): FileState => structuredClone(file)),
  };
  return record;
}

export function fromTaskRecord(record: TaskRecord): Task {
  const { files, ...rest } = record;
  return {
    ...rest,
    files: new Map(files.map((file) => [file.path, file])),
  };
}

// =============================================================================
// SUMMARIES
// =============================================================================

export function summarizeTask(task: Task): TaskStatusSummary {
  const counts = countFileStatuses(task);
  return {
    taskId: task.id,
    done: counts.completed + counts.failed === counts.total,
    createdAt: task.created_at,
    updatedAt: task.updated_at,
    workingDir: task.working_dir,
    maxRetries: task.max_retries,
    concurrency: task.concurrency,
    verifyCommand: task.verify_command ?? null,
    counts,
    files: [...task.files.values()].map((file) => ({
      path: file.path,
      status: file.status,
      retryCount: file.retry_count,
      lastError: file.last_error ?? null,
    })),
  };
}
