/**
 * Executes the external operation a file's status calls for and reports the outcome.
 * Purpose: keep I/O out of the state machine; this module never mutates task state.
 * Assumptions: the caller holds the claim on the file and applies the returned outcome.
 * Usage: const report = await runPipelineStep(env, fileSnapshot, "prompt")
 */

import {
  checkAuthorization,
  describeViolation,
  relativeToWorkingDir,
} from "../../../core/authorization.js";
import { ExecutorError, GitError } from "../../../core/errors.js";
import { expandCommand, expandGlobPattern } from "../../../core/patterns.js";
import { buildFixupPrompt, buildPrompt, parseResult, type ParsedResult } from "../../../core/prompts.js";
import type { StepAction, StepOutcome } from "../../../core/state-machine.js";
import type { FileState, Task } from "../../../core/state-schema.js";
import type { ChangeCheckpoint, OrchestratorPorts } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type StepEnvironment = {
  task: Task;
  ports: OrchestratorPorts;
  baseline: ReadonlySet<string>;
  // Resolved allowlists of every file in the task; see resolveSiblingAllowlist.
  siblingAllowlist: readonly string[];
};

export type StepReport = {
  action: StepAction;
  outcome: StepOutcome;
  error?: string;
  result?: ParsedResult;
  // Raw material for the failure log.
  command?: string;
  output?: string;
  promptText?: string;
  unauthorized?: string[];
};

// last_error keeps the tail of long verification output.
const MAX_ERROR_CHARS = 4_000;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPipelineStep(
  env: StepEnvironment,
  file: FileState,
  action: StepAction,
): Promise<StepReport> {
  try {
    switch (action) {
      case "claim":
        return { action, outcome: "none" };
      case "prompt":
        return await runPromptStep(env, file);
      case "verify":
        return await runVerifyStep(env, file);
      case "fixup":
        return await runFixupStep(env, file);
    }
  } catch (err) {
    if (err instanceof ExecutorError || err instanceof GitError) {
      return { action, outcome: "failure", error: err.message };
    }
    throw err;
  }
}

/**
 * Workers share one working tree, so a step may observe edits made concurrently for other
 * files of the same task. Those edits fall inside the other files' allowlists.
 */
export function resolveSiblingAllowlist(task: Task): string[] {
  const patterns = new Set<string>();
  for (const filePath of task.files.keys()) {
    patterns.add(resolveFileAllowlist(task, filePath));
  }
  return [...patterns];
}

export function resolveFileAllowlist(task: Task, filePath: string): string {
  return relativeToWorkingDir(task.working_dir, expandGlobPattern(task.allowlist_pattern, filePath));
}

// =============================================================================
// STEPS
// =============================================================================

async function runPromptStep(env: StepEnvironment, file: FileState): Promise<StepReport> {
  const { task, ports } = env;
  const promptText = buildPrompt({
    prompt: task.prompt,
    filePath: file.path,
    metadata: file.metadata,
    allowlistPattern: task.allowlist_pattern,
  });

  const checkpoint = await ports.changeTracker.checkpoint();
  const res = await ports.executor.run(promptText, file.path, file.metadata);

  const violation = await guardStep(env, file, checkpoint);
  if (violation) {
    return { action: "prompt", ...violation, output: res.output };
  }

  if (!res.success) {
    return {
      action: "prompt",
      outcome: "failure",
      error: `Prompt step exited unsuccessfully: ${tail(res.output, MAX_ERROR_CHARS)}`.trim(),
      output: res.output,
    };
  }

  return {
    action: "prompt",
    outcome: "success",
    result: parseResult(res.output) ?? undefined,
    output: res.output,
  };
}

async function runVerifyStep(env: StepEnvironment, file: FileState): Promise<StepReport> {
  const { task, ports } = env;
  if (!task.verify_command) {
    throw new Error(`Task ${task.id} has no verify command but ${file.path} is verifying`);
  }

  const command = await expandCommand(task.verify_command, file.path, {
    cwd: task.working_dir,
    allowlistPattern: task.allowlist_pattern,
  });
  const res = await ports.executor.verify(command);

  if (res.passed) {
    return { action: "verify", outcome: "success", command, output: res.output };
  }
  return {
    action: "verify",
    outcome: "failure",
    error: tail(res.output, MAX_ERROR_CHARS),
    command,
    output: res.output,
  };
}

async function runFixupStep(env: StepEnvironment, file: FileState): Promise<StepReport> {
  const { task, ports } = env;
  const promptText = buildFixupPrompt({
    fixupPrompt: task.fixup_prompt,
    filePath: file.path,
    errorOutput: file.last_error ?? "",
    allowlistPattern: task.allowlist_pattern,
  });

  const checkpoint = await ports.changeTracker.checkpoint();
  const res = await ports.executor.run(promptText, file.path, file.metadata);

  const violation = await guardStep(env, file, checkpoint);
  if (violation) {
    return { action: "fixup", ...violation, promptText, output: res.output };
  }

  // The fixup's own exit status does not matter; the next verification decides.
  return {
    action: "fixup",
    outcome: "success",
    result: parseResult(res.output) ?? undefined,
    promptText,
    output: res.output,
  };
}

// =============================================================================
// HELPERS
// =============================================================================

async function guardStep(
  env: StepEnvironment,
  file: FileState,
  checkpoint: ChangeCheckpoint,
): Promise<{ outcome: "unauthorized"; error: string; unauthorized: string[] } | null> {
  const { ports, task } = env;
  if (!ports.changeTracker.enabled) return null;

  const modified = await ports.changeTracker.diffSince(checkpoint);
  const decision = checkAuthorization({
    modified,
    allowlist: [resolveFileAllowlist(task, file.path), ...env.siblingAllowlist],
    baseline: env.baseline,
  });
  if (decision.authorized) return null;

  return {
    outcome: "unauthorized",
    error: describeViolation(decision.unauthorized),
    unauthorized: decision.unauthorized,
  };
}

function tail(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : text.slice(text.length - maxChars);
}
