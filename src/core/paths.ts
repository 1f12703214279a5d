import { createHash } from "node:crypto";
import path from "node:path";

import { slugify, toPosixPath } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  tasksDir: string;
};

export const DEFAULT_TASKS_DIR = "./fileloop-tasks";

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveTasksDir(input: { tasksDir?: string; workingDir?: string } = {}): string {
  const base = input.workingDir ?? process.cwd();
  if (input.tasksDir) {
    return path.resolve(base, input.tasksDir);
  }

  if (process.env.FILELOOP_TASKS_DIR) {
    return path.resolve(base, process.env.FILELOOP_TASKS_DIR);
  }

  return path.resolve(base, DEFAULT_TASKS_DIR);
}

export function createPathsContext(input: { tasksDir?: string; workingDir?: string }): PathsContext {
  return { tasksDir: resolveTasksDir(input) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function registryPath(paths: PathsContext): string {
  return path.join(paths.tasksDir, "task_list.json");
}

export function stateFileName(sequence: number): string {
  return `state_${sequence}.json`;
}

// Registry entries store state files relative to the tasks dir so the directory can move.
export function taskStatePath(paths: PathsContext, stateFile: string): string {
  return path.isAbsolute(stateFile) ? stateFile : path.join(paths.tasksDir, stateFile);
}

export function taskLogPath(paths: PathsContext, taskId: string): string {
  return path.join(paths.tasksDir, "logs", `${taskId}.jsonl`);
}

// The slug keeps names readable; the hash keeps `a-b.ts` and `a_b.ts` apart.
export function failureLogPath(paths: PathsContext, taskId: string, filePath: string): string {
  const posixPath = toPosixPath(filePath);
  const slug = slugify(posixPath) || "file";
  const digest = createHash("sha1").update(posixPath).digest("hex").slice(0, 8);
  return path.join(paths.tasksDir, "failures", taskId, `${slug}-${digest}.log`);
}
