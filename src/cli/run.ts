import {
  createAndRunTask,
  createTaskOnly,
  type EngineRunResult,
} from "../app/orchestrator/run/run-engine.js";
import { summarizeTask } from "../core/state-store.js";

import { normalizeCommandError } from "./command-errors.js";
import { loadConfigForCli, resolveNewTaskSettings, type RunFlags } from "./config.js";
import { formatTaskReport, formatTransitionLine, resumeHint } from "./report.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

export type RunCommandOptions = RunFlags & {
  input: string;
  workingDir?: string;
  tasksDir?: string;
  config?: string;
  dryRun?: boolean;
};

export async function runCommand(opts: RunCommandOptions): Promise<void> {
  try {
    const env = loadConfigForCli({
      workingDir: opts.workingDir,
      tasksDir: opts.tasksDir,
      explicitConfigPath: opts.config,
    });
    if (env.configPath) {
      console.log(`Using config ${env.configPath}`);
    }
    const settings = resolveNewTaskSettings(env.config, opts);

    if (opts.dryRun) {
      const created = await createTaskOnly({
        workingDir: env.workingDir,
        tasksDir: env.tasksDir,
        settings,
        input: opts.input,
      });
      console.log(
        `Dry run: created ${created.task.id} with ${created.task.files.size} file(s) at ${created.store.statePath}.`,
      );
      console.log(resumeHint(created.task.id));
      for (const line of formatTaskReport(summarizeTask(created.task))) console.log(line);
      return;
    }

    const stopHandler = createRunStopSignalHandler({
      onSignal: (signal) => {
        console.log(`Received ${signal}. Finishing in-flight steps before stopping.`);
      },
    });

    let res: EngineRunResult;
    try {
      res = await createAndRunTask({
        workingDir: env.workingDir,
        tasksDir: env.tasksDir,
        settings,
        input: opts.input,
        stopSignal: stopHandler.signal,
        onTransition: (event) => console.log(formatTransitionLine(event)),
      });
    } finally {
      stopHandler.cleanup();
    }

    printRunOutcome(res);
  } catch (error) {
    throw normalizeCommandError(error, "Run command failed.");
  }
}

export function printRunOutcome(res: EngineRunResult): void {
  console.log("");
  for (const line of formatTaskReport(res.summary)) console.log(line);
  console.log("");
  console.log(`Log: ${res.logPath}`);

  if (res.stopped) {
    const signalLabel = res.stopped.signal ? ` (${res.stopped.signal})` : "";
    console.log(`Task ${res.taskId} stopped by signal${signalLabel}.`);
    console.log(resumeHint(res.taskId));
    return;
  }

  if (!res.done) {
    if (res.deferred > 0) {
      console.log(`${res.deferred} file(s) deferred by max_files.`);
    }
    console.log(resumeHint(res.taskId));
    return;
  }

  if (res.summary.counts.failed > 0) {
    process.exitCode = 1;
  }
}
