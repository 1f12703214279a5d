import { createPathsContext } from "../core/paths.js";
import { loadTaskForResume } from "../core/resume.js";
import { summarizeTask } from "../core/state-store.js";
import { TaskRegistry } from "../core/task-registry.js";

import { normalizeCommandError } from "./command-errors.js";
import { loadConfigForCli } from "./config.js";
import { formatTaskReport } from "./report.js";

export type StatusCommandOptions = {
  taskId?: string;
  workingDir?: string;
  tasksDir?: string;
  config?: string;
};

/** Prints the per-file report of a task: the given one, else the first incomplete, else the latest. */
export async function statusCommand(opts: StatusCommandOptions): Promise<void> {
  try {
    const env = loadConfigForCli({
      workingDir: opts.workingDir,
      tasksDir: opts.tasksDir,
      explicitConfigPath: opts.config,
    });
    const paths = createPathsContext({ tasksDir: env.tasksDir, workingDir: env.workingDir });
    const registry = new TaskRegistry(paths);

    let taskId = opts.taskId;
    if (!taskId) {
      const entries = await registry.list();
      const chosen =
        entries.find((entry) => entry.status_summary !== "complete") ?? entries.at(-1);
      if (!chosen) {
        console.log(`No tasks found in ${paths.tasksDir}.`);
        console.log("Start one with: fileloop run --input <files.json> --prompt <text>");
        process.exitCode = 1;
        return;
      }
      taskId = chosen.task_id;
    }

    const loaded = await loadTaskForResume({ paths, taskId, registry });
    if (!loaded) return;

    for (const line of formatTaskReport(summarizeTask(loaded.task))) console.log(line);
  } catch (error) {
    throw normalizeCommandError(error, "Status command failed.");
  }
}
