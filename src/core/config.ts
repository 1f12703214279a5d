import { z } from "zod";

export const DEFAULT_ALLOWLIST = "{file_stem}*";
export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_COMMIT_MESSAGE = "fileloop: {file_name}";
export const DEFAULT_AGENT_ARGS = ["-p", "{prompt}", "--dangerously-skip-permissions"];

const AgentSchema = z
  .object({
    command: z.string().min(1).default("claude"),
    // "{prompt}" is replaced by the full prompt text of the step.
    args: z.array(z.string()).default(DEFAULT_AGENT_ARGS),
  })
  .strict();

const GitSchema = z
  .object({
    enabled: z.boolean().default(false),
    auto_branch: z.boolean().default(false),
    auto_commit: z.boolean().default(false),
    commit_message: z.string().min(1).default(DEFAULT_COMMIT_MESSAGE),
  })
  .strict();

export const RunnerConfigSchema = z
  .object({
    // Falls back to FILELOOP_TASKS_DIR, then ./fileloop-tasks; see paths.ts.
    tasks_dir: z.string().min(1).optional(),
    concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
    max_retries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
    allowlist: z.string().min(1).default(DEFAULT_ALLOWLIST),
    max_files: z.number().int().positive().optional(),
    step_timeout_seconds: z.number().int().positive().optional(),
    agent: AgentSchema.default({}),
    git: GitSchema.default({}),
  })
  .strict();

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
export type AgentConfig = z.infer<typeof AgentSchema>;
export type GitConfig = z.infer<typeof GitSchema>;

export function defaultRunnerConfig(): RunnerConfig {
  return RunnerConfigSchema.parse({});
}
