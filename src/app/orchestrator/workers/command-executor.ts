/**
 * CommandExecutor runs the agent CLI for prompt/fixup steps and the verify command in a shell.
 * Purpose: the production Executor port.
 * Assumptions: the agent prints its answer on stdout; verify commands signal failure by exit code.
 * Usage: new CommandExecutor({ cwd, agent, timeoutSeconds }).run(prompt, file, metadata)
 */

import { execa } from "execa";

import { ExecutorError } from "../../../core/errors.js";
import type { JsonValue } from "../../../core/logger.js";
import type { AgentSettings } from "../../../core/state-schema.js";
import type { Executor, ExecutorRunResult, ExecutorVerifyResult } from "../ports.js";

export type CommandExecutorOptions = {
  cwd: string;
  agent: AgentSettings;
  timeoutSeconds?: number;
};

type CommandOutcome = {
  exitCode?: number;
  timedOut: boolean;
  isTerminated: boolean;
  signal?: string;
  stdout: string;
  stderr: string;
};

export const PROMPT_PLACEHOLDER = "{prompt}";

export class CommandExecutor implements Executor {
  constructor(private readonly options: CommandExecutorOptions) {}

  async run(promptText: string, filePath: string, metadata: JsonValue): Promise<ExecutorRunResult> {
    const { agent, cwd } = this.options;
    const args = buildAgentArgs(agent.args, promptText);

    const res = await execa(agent.command, args, {
      cwd,
      reject: false,
      stdin: "ignore",
      timeout: this.timeoutMs(),
      env: {
        FILELOOP_FILE: filePath,
        FILELOOP_METADATA: JSON.stringify(metadata),
      },
    });

    const outcome = toOutcome(res);
    if (outcome.timedOut) {
      throw new ExecutorError(
        `${agent.command} timed out after ${this.options.timeoutSeconds ?? 0}s for ${filePath}`,
      );
    }
    if (outcome.exitCode === undefined) {
      throw new ExecutorError(
        `${agent.command} did not finish for ${filePath}: ${describeAbnormalExit(outcome)}`,
      );
    }

    return {
      success: outcome.exitCode === 0,
      output: outcome.exitCode === 0 ? outcome.stdout : joinOutput(outcome),
    };
  }

  async verify(command: string): Promise<ExecutorVerifyResult> {
    const res = await execa(command, {
      cwd: this.options.cwd,
      shell: true,
      reject: false,
      stdin: "ignore",
      timeout: this.timeoutMs(),
    });

    const outcome = toOutcome(res);
    if (outcome.timedOut) {
      return {
        passed: false,
        output: `Verification timed out after ${this.options.timeoutSeconds ?? 0}s\n${joinOutput(outcome)}`.trim(),
      };
    }
    if (outcome.exitCode === undefined) {
      throw new ExecutorError(`Verify command could not run: ${describeAbnormalExit(outcome)}`);
    }

    return { passed: outcome.exitCode === 0, output: joinOutput(outcome) };
  }

  private timeoutMs(): number | undefined {
    const seconds = this.options.timeoutSeconds;
    return seconds ? seconds * 1000 : undefined;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function buildAgentArgs(template: readonly string[], promptText: string): string[] {
  const args = template.map((arg) => arg.replaceAll(PROMPT_PLACEHOLDER, promptText));
  // Without a placeholder the prompt goes last.
  return template.some((arg) => arg.includes(PROMPT_PLACEHOLDER)) ? args : [...args, promptText];
}

function toOutcome(res: {
  exitCode?: number;
  timedOut: boolean;
  isTerminated: boolean;
  signal?: string;
  stdout: unknown;
  stderr: unknown;
}): CommandOutcome {
  return {
    exitCode: res.exitCode,
    timedOut: res.timedOut,
    isTerminated: res.isTerminated,
    signal: res.signal,
    stdout: typeof res.stdout === "string" ? res.stdout : "",
    stderr: typeof res.stderr === "string" ? res.stderr : "",
  };
}

function joinOutput(outcome: CommandOutcome): string {
  return `${outcome.stdout}\n${outcome.stderr}`.trim();
}

function describeAbnormalExit(outcome: CommandOutcome): string {
  if (outcome.isTerminated) {
    return `terminated by ${outcome.signal ?? "signal"}`;
  }
  const detail = outcome.stderr.trim();
  return detail.length > 0 ? detail : "process failed to start";
}
