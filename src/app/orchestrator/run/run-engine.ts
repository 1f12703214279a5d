/**
 * Entry points for creating, running and resuming tasks.
 * Purpose: wire the registry, state store, logger and ports around a TaskOrchestrator.
 * Assumptions: settings were already resolved from CLI flags, config file and defaults.
 * Usage: createAndRunTask(opts), createTaskOnly(opts) for dry runs, resumeTask(opts).
 */

import path from "node:path";

import {
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../../../core/errors.js";
import {
  JsonlLogger,
  logTaskEvent,
  type JsonValue,
  type LogEventListener,
} from "../../../core/logger.js";
import { createPathsContext, taskLogPath, type PathsContext } from "../../../core/paths.js";
import { loadTaskForResume } from "../../../core/resume.js";
import { createTask } from "../../../core/state-mutations.js";
import type { AgentSettings, Task } from "../../../core/state-schema.js";
import { TaskStateStore } from "../../../core/state-store.js";
import { loadTaskInput } from "../../../core/task-input.js";
import { TaskRegistry, type RegistryEntry } from "../../../core/task-registry.js";
import { compactTimestamp } from "../../../core/utils.js";
import { checkoutNewBranch, currentBranch, isInsideWorkTree } from "../../../git/git.js";
import { systemClock, type OrchestratorPorts } from "../ports.js";
import { createChangeTracker } from "../vcs/git-change-tracker.js";
import { CommandExecutor } from "../workers/command-executor.js";

import {
  TaskOrchestrator,
  type TaskRunResult,
  type TransitionEvent,
} from "./task-orchestrator.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitSettings = {
  enabled: boolean;
  autoBranch: boolean;
  autoCommit: boolean;
  commitMessage: string;
};

export type NewTaskSettings = {
  prompt: string;
  fixupPrompt?: string;
  verifyCommand?: string;
  allowlistPattern: string;
  maxRetries: number;
  concurrency: number;
  maxFiles?: number;
  stepTimeoutSeconds?: number;
  agent: AgentSettings;
  git: GitSettings;
};

export type PortsFactory = (task: Task, paths: PathsContext) => OrchestratorPorts;

type EngineOptions = {
  workingDir: string;
  tasksDir?: string;
  portsFactory?: PortsFactory;
  stopSignal?: AbortSignal;
  onTransition?: (event: TransitionEvent) => void;
  // Echo of every structured log event, e.g. for terminal progress output.
  echo?: LogEventListener;
};

export type CreateTaskOptions = EngineOptions & {
  settings: NewTaskSettings;
  // Path to the JSON input mapping, or the entries themselves.
  input: string | Array<[string, JsonValue]>;
};

export type CreatedTask = {
  paths: PathsContext;
  entry: RegistryEntry;
  task: Task;
  store: TaskStateStore;
};

export type ResumeOverrides = {
  concurrency?: number;
  maxRetries?: number;
  maxFiles?: number;
  verifyCommand?: string;
  fixupPrompt?: string;
  stepTimeoutSeconds?: number;
};

export type ResumeTaskOptions = EngineOptions & {
  taskId?: string;
  overrides?: ResumeOverrides;
};

export type EngineRunResult = TaskRunResult & {
  entry: RegistryEntry;
  logPath: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createDefaultPorts(task: Task, paths: PathsContext): OrchestratorPorts {
  return {
    executor: new CommandExecutor({
      cwd: task.working_dir,
      agent: task.agent,
      timeoutSeconds: task.step_timeout_seconds,
    }),
    changeTracker: createChangeTracker({
      enabled: task.git.enabled,
      cwd: task.working_dir,
      allowlistPattern: task.allowlist_pattern,
      baseline: task.git.baseline,
      tasksDir: paths.tasksDir,
    }),
    clock: systemClock,
  };
}

/**
 * Creates a task without running it: writes the state file (all files pending), then the
 * registry entry. Used directly for dry runs.
 */
export async function createTaskOnly(options: CreateTaskOptions): Promise<CreatedTask> {
  const workingDir = path.resolve(options.workingDir);
  const paths = createPathsContext({ tasksDir: options.tasksDir, workingDir });
  const registry = new TaskRegistry(paths);
  const { settings } = options;

  const inputFile = typeof options.input === "string" ? path.resolve(options.input) : undefined;
  const files = typeof options.input === "string" ? await loadTaskInput(options.input) : options.input;

  if (settings.git.enabled && !(await isInsideWorkTree(workingDir))) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Not a git repository.",
      message: `${workingDir} is not inside a git work tree, but git tracking is enabled.`,
      hint: "Run from a git checkout, or set git.enabled: false in fileloop.yaml.",
    });
  }

  const { taskId, stateFile } = await registry.allocate();
  const task = createTask({
    id: taskId,
    prompt: settings.prompt,
    fixupPrompt: settings.fixupPrompt,
    verifyCommand: settings.verifyCommand,
    allowlistPattern: settings.allowlistPattern,
    maxRetries: settings.maxRetries,
    concurrency: settings.concurrency,
    maxFiles: settings.maxFiles,
    stepTimeoutSeconds: settings.stepTimeoutSeconds,
    workingDir,
    inputFile,
    agent: settings.agent,
    git: {
      enabled: settings.git.enabled,
      auto_branch: settings.git.autoBranch,
      auto_commit: settings.git.autoCommit,
      commit_message: settings.git.commitMessage,
      baseline: [],
    },
    files,
  });

  const ports = (options.portsFactory ?? createDefaultPorts)(task, paths);
  task.git.baseline = await ports.changeTracker.captureBaseline();

  if (settings.git.enabled && settings.git.autoBranch) {
    task.git.original_branch = await currentBranch(workingDir);
    task.git.task_branch = `fileloop/${taskId}-${compactTimestamp()}`;
    await checkoutNewBranch(workingDir, task.git.task_branch);
  }

  const store = new TaskStateStore(path.join(paths.tasksDir, stateFile));
  await store.save(task);
  const entry = await registry.register({
    taskId,
    stateFile,
    workingDir,
    prompt: settings.prompt,
  });

  const logger = new JsonlLogger(taskLogPath(paths, taskId), { taskId, echo: options.echo });
  try {
    logTaskEvent(logger, "task.create", {
      payload: {
        files: task.files.size,
        state_file: store.statePath,
        baseline_files: task.git.baseline.length,
        ...(task.git.task_branch ? { task_branch: task.git.task_branch } : {}),
      },
    });
  } finally {
    logger.close();
  }

  return { paths, entry, task, store };
}

export async function createAndRunTask(options: CreateTaskOptions): Promise<EngineRunResult> {
  const created = await createTaskOnly(options);
  return runLoadedTask(options, { ...created, resumed: false });
}

/** Returns null when no task id was given and every registered task is complete. */
export async function resumeTask(options: ResumeTaskOptions): Promise<EngineRunResult | null> {
  const workingDir = path.resolve(options.workingDir);
  const paths = createPathsContext({ tasksDir: options.tasksDir, workingDir });
  const loaded = await loadTaskForResume({ paths, taskId: options.taskId });
  if (!loaded) {
    return null;
  }

  applyResumeOverrides(loaded.task, options.overrides ?? {});
  return runLoadedTask(options, { ...loaded, paths, resumed: true });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runLoadedTask(
  options: EngineOptions,
  loaded: CreatedTask & { resumed: boolean },
): Promise<EngineRunResult> {
  const { task, store, paths, entry } = loaded;
  const ports = (options.portsFactory ?? createDefaultPorts)(task, paths);

  if (loaded.resumed) {
    task.git.baseline = await ports.changeTracker.captureBaseline();
    await store.save(task);
  }

  const logPath = taskLogPath(paths, task.id);
  const logger = new JsonlLogger(logPath, { taskId: task.id, echo: options.echo });

  try {
    const orchestrator = new TaskOrchestrator({
      task,
      store,
      registry: new TaskRegistry(paths),
      paths,
      ports,
      logger,
      stopSignal: options.stopSignal,
      resumed: loaded.resumed,
      onTransition: options.onTransition,
    });
    const result = await orchestrator.run();
    return { ...result, entry, logPath };
  } finally {
    logger.close();
  }
}

export function applyResumeOverrides(task: Task, overrides: ResumeOverrides): void {
  if (overrides.maxRetries !== undefined) {
    const highest = Math.max(0, ...[...task.files.values()].map((file) => file.retry_count));
    if (overrides.maxRetries < highest) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Invalid max retries.",
        message: `--max-retries ${overrides.maxRetries} is below retries already used (${highest}) in ${task.id}.`,
        hint: `Pass --max-retries ${highest} or higher, or omit it to keep ${task.max_retries}.`,
      });
    }
    task.max_retries = overrides.maxRetries;
  }
  if (overrides.concurrency !== undefined) task.concurrency = overrides.concurrency;
  if (overrides.maxFiles !== undefined) task.max_files = overrides.maxFiles;
  if (overrides.verifyCommand !== undefined) task.verify_command = overrides.verifyCommand;
  if (overrides.fixupPrompt !== undefined) task.fixup_prompt = overrides.fixupPrompt;
  if (overrides.stepTimeoutSeconds !== undefined) {
    task.step_timeout_seconds = overrides.stepTimeoutSeconds;
  }
}
