import {
  resumeTask,
  type EngineRunResult,
  type ResumeOverrides,
} from "../app/orchestrator/run/run-engine.js";

import { normalizeCommandError } from "./command-errors.js";
import { loadConfigForCli } from "./config.js";
import { formatTransitionLine } from "./report.js";
import { printRunOutcome } from "./run.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

export type ResumeCommandOptions = ResumeOverrides & {
  taskId?: string;
  workingDir?: string;
  tasksDir?: string;
  config?: string;
};

export async function resumeCommand(opts: ResumeCommandOptions): Promise<void> {
  try {
    const env = loadConfigForCli({
      workingDir: opts.workingDir,
      tasksDir: opts.tasksDir,
      explicitConfigPath: opts.config,
    });

    const stopHandler = createRunStopSignalHandler({
      onSignal: (signal) => {
        console.log(`Received ${signal}. Finishing in-flight steps before stopping.`);
      },
    });

    let res: EngineRunResult | null;
    try {
      res = await resumeTask({
        workingDir: env.workingDir,
        tasksDir: env.tasksDir,
        taskId: opts.taskId,
        overrides: {
          concurrency: opts.concurrency,
          maxRetries: opts.maxRetries,
          maxFiles: opts.maxFiles,
          verifyCommand: opts.verifyCommand,
          fixupPrompt: opts.fixupPrompt,
          stepTimeoutSeconds: opts.stepTimeoutSeconds,
        },
        stopSignal: stopHandler.signal,
        onTransition: (event) => console.log(formatTransitionLine(event)),
      });
    } finally {
      stopHandler.cleanup();
    }

    if (!res) {
      console.log("No incomplete tasks to resume.");
      return;
    }

    printRunOutcome(res);
  } catch (error) {
    throw normalizeCommandError(error, "Resume command failed.");
  }
}
