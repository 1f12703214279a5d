import { createPathsContext } from "../core/paths.js";
import { TaskRegistry } from "../core/task-registry.js";

import { normalizeCommandError } from "./command-errors.js";
import { loadConfigForCli } from "./config.js";
import { formatRegistryTable } from "./report.js";

export type TasksCommandOptions = {
  workingDir?: string;
  tasksDir?: string;
  config?: string;
};

export async function tasksCommand(opts: TasksCommandOptions): Promise<void> {
  try {
    const env = loadConfigForCli({
      workingDir: opts.workingDir,
      tasksDir: opts.tasksDir,
      explicitConfigPath: opts.config,
    });
    const paths = createPathsContext({ tasksDir: env.tasksDir, workingDir: env.workingDir });
    const entries = await new TaskRegistry(paths).list();

    for (const line of formatRegistryTable(entries)) console.log(line);
  } catch (error) {
    throw normalizeCommandError(error, "Tasks command failed.");
  }
}
