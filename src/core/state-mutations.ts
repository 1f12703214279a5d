import type { JsonValue } from "./logger.js";
import { recoveryStatus, type Transition } from "./state-machine.js";
import {
  TASK_RECORD_SCHEMA_VERSION,
  isTerminalStatus,
  type AgentSettings,
  type FileState,
  type FileStatus,
  type Task,
  type TaskGitState,
} from "./state-schema.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TASK CREATION
// =============================================================================

export type CreateTaskInput = {
  id: string;
  prompt: string;
  fixupPrompt?: string;
  verifyCommand?: string;
  allowlistPattern: string;
  maxRetries: number;
  concurrency: number;
  maxFiles?: number;
  stepTimeoutSeconds?: number;
  workingDir: string;
  inputFile?: string;
  agent: AgentSettings;
  git: TaskGitState;
  files: Array<[path: string, metadata: JsonValue]>;
  now?: string;
};

export function createTask(input: CreateTaskInput): Task {
  const now = input.now ?? isoNow();
  const files = new Map<string, FileState>();
  for (const [filePath, metadata] of input.files) {
    files.set(filePath, { path: filePath, status: "pending", retry_count: 0, metadata });
  }

  return {
    schema_version: TASK_RECORD_SCHEMA_VERSION,
    id: input.id,
    prompt: input.prompt,
    fixup_prompt: input.fixupPrompt,
    verify_command: input.verifyCommand,
    allowlist_pattern: input.allowlistPattern,
    max_retries: input.maxRetries,
    concurrency: input.concurrency,
    max_files: input.maxFiles,
    step_timeout_seconds: input.stepTimeoutSeconds,
    working_dir: input.workingDir,
    input_file: input.inputFile,
    agent: input.agent,
    git: input.git,
    created_at: now,
    updated_at: now,
    files,
  };
}

// =============================================================================
// FILE MUTATIONS
// =============================================================================

export type TransitionDetails = {
  error?: string;
  result?: { value: JsonValue; raw: boolean };
};

export function requireFile(task: Task, filePath: string): FileState {
  const file = task.files.get(filePath);
  if (!file) {
    throw new Error(`Unknown file in task ${task.id}: ${filePath}`);
  }
  return file;
}

export function applyTransition(
  file: FileState,
  transition: Transition,
  details: TransitionDetails = {},
  now: string = isoNow(),
): void {
  if (file.status !== transition.from) {
    throw new Error(
      `Cannot apply ${transition.from} -> ${transition.to} to ${file.path} in status ${file.status}`,
    );
  }

  file.status = transition.to;
  if (transition.consumesRetry) {
    file.retry_count += 1;
  }
  if (transition.from === "pending") {
    file.started_at = now;
  }
  if (details.error !== undefined) {
    file.last_error = details.error;
  }
  if (details.result) {
    file.result = details.result.value;
    file.result_raw = details.result.raw ? true : undefined;
  }
  if (isTerminalStatus(transition.to)) {
    file.completed_at = now;
  }
}

export type RecoveredFile = {
  path: string;
  from: FileStatus;
  to: FileStatus;
};

export function recoverInterruptedFiles(task: Task): RecoveredFile[] {
  const recovered: RecoveredFile[] = [];
  for (const file of task.files.values()) {
    const to = recoveryStatus(file.status);
    if (to !== file.status) {
      recovered.push({ path: file.path, from: file.status, to });
      file.status = to;
    }
  }
  return recovered;
}

// =============================================================================
// QUERIES
// =============================================================================

export type FileStatusCounts = Record<FileStatus, number> & { total: number };

export function countFileStatuses(task: Task): FileStatusCounts {
  const counts: FileStatusCounts = {
    total: 0,
    pending: 0,
    prompt_in_progress: 0,
    awaiting_verification: 0,
    verify_in_progress: 0,
    fixup_in_progress: 0,
    completed: 0,
    failed: 0,
  };
  for (const file of task.files.values()) {
    counts.total += 1;
    counts[file.status] += 1;
  }
  return counts;
}

export function isTaskDone(task: Task): boolean {
  for (const file of task.files.values()) {
    if (!isTerminalStatus(file.status)) return false;
  }
  return true;
}
