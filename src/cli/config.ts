import path from "node:path";

import type { NewTaskSettings } from "../app/orchestrator/run/run-engine.js";
import { loadRunnerConfig } from "../core/config-loader.js";
import type { RunnerConfig } from "../core/config.js";

// =============================================================================
// SETTINGS RESOLUTION (CLI)
//
// Precedence: explicit flag > fileloop.yaml > built-in default.
// =============================================================================

export type RunFlags = {
  prompt: string;
  verify?: string;
  fixup?: string;
  allowlist?: string;
  concurrency?: number;
  maxRetries?: number;
  maxFiles?: number;
  stepTimeout?: number;
  git?: boolean;
  autoBranch?: boolean;
  autoCommit?: boolean;
};

export type CliEnvironment = {
  workingDir: string;
  tasksDir?: string;
  config: RunnerConfig;
  configPath: string | null;
};

export function loadConfigForCli(args: {
  workingDir?: string;
  tasksDir?: string;
  explicitConfigPath?: string;
}): CliEnvironment {
  const workingDir = path.resolve(args.workingDir ?? process.cwd());
  const { config, configPath } = loadRunnerConfig({
    workingDir,
    explicitPath: args.explicitConfigPath,
  });

  return {
    workingDir,
    tasksDir: args.tasksDir ?? config.tasks_dir,
    config,
    configPath,
  };
}

export function resolveNewTaskSettings(config: RunnerConfig, flags: RunFlags): NewTaskSettings {
  const autoBranch = flags.autoBranch ?? config.git.auto_branch;
  const autoCommit = flags.autoCommit ?? config.git.auto_commit;

  return {
    prompt: flags.prompt,
    fixupPrompt: flags.fixup,
    verifyCommand: flags.verify,
    allowlistPattern: flags.allowlist ?? config.allowlist,
    maxRetries: flags.maxRetries ?? config.max_retries,
    concurrency: flags.concurrency ?? config.concurrency,
    maxFiles: flags.maxFiles ?? config.max_files,
    stepTimeoutSeconds: flags.stepTimeout ?? config.step_timeout_seconds,
    agent: { command: config.agent.command, args: [...config.agent.args] },
    git: {
      // Branching or committing needs change tracking.
      enabled: (flags.git ?? config.git.enabled) || autoBranch || autoCommit,
      autoBranch,
      autoCommit,
      commitMessage: config.git.commit_message,
    },
  };
}
