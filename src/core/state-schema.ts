import { z } from "zod";

import type { JsonValue } from "./logger.js";

// =============================================================================
// STATUS ENUMS
// =============================================================================

export const FileStatusSchema = z.enum([
  "pending",
  "prompt_in_progress",
  "awaiting_verification",
  "verify_in_progress",
  "fixup_in_progress",
  "completed",
  "failed",
]);
export type FileStatus = z.infer<typeof FileStatusSchema>;

export const TERMINAL_STATUSES: readonly FileStatus[] = ["completed", "failed"];

export function isTerminalStatus(status: FileStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// =============================================================================
// OPAQUE PAYLOADS
// =============================================================================

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

// =============================================================================
// FILE STATE
// =============================================================================

export const FileStateSchema = z
  .object({
    path: z.string().min(1),
    status: FileStatusSchema,
    retry_count: z.number().int().nonnegative(),
    last_error: z.string().optional(),
    metadata: JsonValueSchema,
    result: JsonValueSchema.optional(),
    result_raw: z.boolean().optional(),
    started_at: z.string().optional(),
    completed_at: z.string().optional(),
  })
  .strict();
export type FileState = z.infer<typeof FileStateSchema>;

// =============================================================================
// TASK RECORD
// =============================================================================

export const TaskGitStateSchema = z
  .object({
    enabled: z.boolean(),
    auto_branch: z.boolean(),
    auto_commit: z.boolean(),
    commit_message: z.string(),
    original_branch: z.string().optional(),
    task_branch: z.string().optional(),
    baseline: z.array(z.string()),
  })
  .strict();
export type TaskGitState = z.infer<typeof TaskGitStateSchema>;

export const AgentSettingsSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()),
  })
  .strict();
export type AgentSettings = z.infer<typeof AgentSettingsSchema>;

export const TASK_RECORD_SCHEMA_VERSION = 1;

const TaskRecordBaseSchema = z
  .object({
    schema_version: z.literal(TASK_RECORD_SCHEMA_VERSION),
    id: z.string().min(1),
    prompt: z.string(),
    fixup_prompt: z.string().optional(),
    verify_command: z.string().optional(),
    allowlist_pattern: z.string().min(1),
    max_retries: z.number().int().nonnegative(),
    concurrency: z.number().int().positive(),
    max_files: z.number().int().positive().optional(),
    step_timeout_seconds: z.number().int().positive().optional(),
    working_dir: z.string().min(1),
    input_file: z.string().optional(),
    agent: AgentSettingsSchema,
    git: TaskGitStateSchema,
    created_at: z.string(),
    updated_at: z.string(),
    files: z.array(FileStateSchema),
  })
  .strict();

export const TaskRecordSchema = TaskRecordBaseSchema.superRefine((record, ctx) => {
  const seen = new Set<string>();
  record.files.forEach((file, index) => {
    if (seen.has(file.path)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["files", index, "path"],
        message: `Duplicate file path ${file.path}`,
      });
    }
    seen.add(file.path);

    if (file.retry_count > record.max_retries) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["files", index, "retry_count"],
        message: `retry_count ${file.retry_count} exceeds max_retries ${record.max_retries}`,
      });
    }
  });
});
export type TaskRecord = z.infer<typeof TaskRecordSchema>;

// In memory the files are keyed by path; Map keeps insertion order for any key.
export type Task = Omit<TaskRecord, "files"> & {
  files: Map<string, FileState>;
};
