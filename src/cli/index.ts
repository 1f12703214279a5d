import { Command, InvalidArgumentError } from "commander";

import { resumeCommand } from "./resume.js";
import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";
import { tasksCommand } from "./tasks.js";

type GlobalOptions = {
  config?: string;
  tasksDir?: string;
  workingDir?: string;
  debug?: boolean;
};

type RunCliOptions = {
  input: string;
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
  dryRun?: boolean;
};

type ResumeCliOptions = {
  concurrency?: number;
  maxRetries?: number;
  maxFiles?: number;
  stepTimeout?: number;
  verify?: string;
  fixup?: string;
};

export function buildCli(): Command {
  const program = new Command();

  program
    .name("fileloop")
    .description("Run a prompt over many files with verification, fixups and resumable state")
    .version("0.1.0")
    .option("--config <path>", "Config file (default: ./fileloop.yaml when present)")
    .option("--tasks-dir <dir>", "Where task state and logs live (default: ./fileloop-tasks)")
    .option("--working-dir <dir>", "Directory the agent and verify commands run in (default: cwd)")
    .option("--debug", "Print error details and stack traces");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command("run")
    .description("Create a task from an input mapping and run it")
    .requiredOption("--input <path>", "JSON object mapping file paths to metadata")
    .requiredOption("--prompt <text>", "Prompt for each file; supports {file} placeholders")
    .option("--verify <command>", "Verification command run after each prompt")
    .option("--fixup <text>", "Prompt sent when verification fails")
    .option("--allowlist <pattern>", "Files a step may modify (default: {file_stem}*)")
    .option("--concurrency <n>", "Max files processed at once", parsePositiveInt)
    .option("--max-retries <n>", "Fixup attempts per file", parseNonNegativeInt)
    .option("--max-files <n>", "Process at most n files this invocation", parsePositiveInt)
    .option("--step-timeout <seconds>", "Time limit for each external step", parsePositiveInt)
    .option("--git", "Track changes with git and enforce the allowlist")
    .option("--auto-branch", "Create a task branch before running")
    .option("--auto-commit", "Commit each file once it completes")
    .option("--dry-run", "Create the task without running it", false)
    .action(async (opts: RunCliOptions) => {
      const { tasksDir, workingDir, config } = globals();
      await runCommand({ ...opts, tasksDir, workingDir, config });
    });

  program
    .command("resume")
    .description("Resume a task by id, or the first incomplete task")
    .argument("[taskId]", "Task id, e.g. task_0")
    .option("--concurrency <n>", "Override the task's concurrency", parsePositiveInt)
    .option("--max-retries <n>", "Override the task's max retries", parseNonNegativeInt)
    .option("--max-files <n>", "Process at most n files this invocation", parsePositiveInt)
    .option("--step-timeout <seconds>", "Override the step time limit", parsePositiveInt)
    .option("--verify <command>", "Override the verification command")
    .option("--fixup <text>", "Override the fixup prompt")
    .action(async (taskId: string | undefined, opts: ResumeCliOptions) => {
      const { tasksDir, workingDir, config } = globals();
      await resumeCommand({
        taskId,
        tasksDir,
        workingDir,
        config,
        concurrency: opts.concurrency,
        maxRetries: opts.maxRetries,
        maxFiles: opts.maxFiles,
        stepTimeoutSeconds: opts.stepTimeout,
        verifyCommand: opts.verify,
        fixupPrompt: opts.fixup,
      });
    });

  program
    .command("status")
    .description("Show per-file status of a task")
    .argument("[taskId]", "Task id (default: first incomplete, else latest)")
    .action(async (taskId: string | undefined) => {
      await statusCommand({ taskId, ...globals() });
    });

  program
    .command("tasks")
    .description("List registered tasks")
    .action(async () => {
      await tasksCommand(globals());
    });

  return program;
}

// =============================================================================
// OPTION PARSERS
// =============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}
