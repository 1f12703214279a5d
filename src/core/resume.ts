import { ResumeInconsistencyError } from "./errors.js";
import { taskStatePath, type PathsContext } from "./paths.js";
import type { Task } from "./state-schema.js";
import { TaskStateStore } from "./state-store.js";
import { TaskRegistry, type RegistryEntry } from "./task-registry.js";

export type LoadedTask = {
  entry: RegistryEntry;
  task: Task;
  store: TaskStateStore;
};

/**
 * Reconstructs a task exactly as it was last persisted.
 *
 * Without a task id the first registry entry that is not complete is used. Returns null when
 * there is nothing to resume; a registry entry whose state file is missing, unreadable or for
 * a different task is a ResumeInconsistencyError.
 */
export async function loadTaskForResume(input: {
  paths: PathsContext;
  taskId?: string;
  registry?: TaskRegistry;
}): Promise<LoadedTask | null> {
  const registry = input.registry ?? new TaskRegistry(input.paths);

  const entry = input.taskId
    ? await registry.find(input.taskId)
    : await registry.firstIncomplete();

  if (!entry) {
    if (input.taskId) {
      throw new ResumeInconsistencyError(
        `Task ${input.taskId} is not in registry ${registry.filePath}`,
      );
    }
    return null;
  }

  const store = new TaskStateStore(taskStatePath(input.paths, entry.state_file));
  const task = await store.load();
  if (task.id !== entry.task_id) {
    throw new ResumeInconsistencyError(
      `State file ${store.statePath} belongs to ${task.id}, registry expects ${entry.task_id}`,
    );
  }

  return { entry, task, store };
}
