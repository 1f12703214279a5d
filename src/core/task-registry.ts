import fse from "fs-extra";
import { z } from "zod";

import { formatErrorMessage } from "./error-format.js";
import { PersistenceError, ResumeInconsistencyError } from "./errors.js";
import { registryPath, stateFileName, type PathsContext } from "./paths.js";
import { isMissingFile, isoNow, SerialQueue, writeJsonFileAtomic } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export const RegistryStatusSchema = z.enum(["incomplete", "complete"]);
export type RegistryStatus = z.infer<typeof RegistryStatusSchema>;

const RegistryCountsSchema = z
  .object({
    total: z.number().int().nonnegative(),
    completed: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
  })
  .strict();
export type RegistryCounts = z.infer<typeof RegistryCountsSchema>;

const RegistryEntrySchema = z
  .object({
    task_id: z.string().min(1),
    state_file: z.string().min(1),
    status_summary: RegistryStatusSchema,
    working_dir: z.string(),
    description: z.string(),
    created_at: z.string(),
    updated_at: z.string(),
    counts: RegistryCountsSchema.optional(),
  })
  .strict();
export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;

const RegistryIndexSchema = z
  .object({
    schema_version: z.number().int().positive(),
    next_id: z.number().int().nonnegative(),
    tasks: z.array(RegistryEntrySchema),
  })
  .strict();
export type RegistryIndex = z.infer<typeof RegistryIndexSchema>;

const REGISTRY_SCHEMA_VERSION = 1;
const DESCRIPTION_LIMIT = 50;
const DESCRIPTION_KEEP = 47;

// =============================================================================
// REGISTRY
// =============================================================================

/**
 * Index of every task created under one tasks directory, in creation order.
 *
 * Entries are appended once and only their summary fields change afterwards.
 */
export class TaskRegistry {
  private readonly queue = new SerialQueue();

  constructor(private readonly paths: PathsContext) {}

  get filePath(): string {
    return registryPath(this.paths);
  }

  async load(): Promise<RegistryIndex> {
    let raw: string;
    try {
      raw = await fse.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return emptyIndex();
      throw new ResumeInconsistencyError(
        `Task registry ${this.filePath} cannot be read: ${formatErrorMessage(err)}`,
        err,
      );
    }

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (err) {
      throw new ResumeInconsistencyError(`Task registry ${this.filePath} is not valid JSON`, err);
    }

    const parsed = RegistryIndexSchema.safeParse(doc);
    if (!parsed.success) {
      throw new ResumeInconsistencyError(
        `Invalid task registry at ${this.filePath}: ${parsed.error.toString()}`,
        parsed.error,
      );
    }
    return parsed.data;
  }

  async list(): Promise<RegistryEntry[]> {
    return (await this.load()).tasks;
  }

  async find(taskId: string): Promise<RegistryEntry | null> {
    const index = await this.load();
    return index.tasks.find((entry) => entry.task_id === taskId) ?? null;
  }

  async firstIncomplete(): Promise<RegistryEntry | null> {
    const index = await this.load();
    return index.tasks.find((entry) => entry.status_summary !== "complete") ?? null;
  }

  /** Reserves the next task id without writing an entry yet. */
  async allocate(): Promise<{ taskId: string; stateFile: string }> {
    return this.queue.run(async () => {
      const index = await this.load();
      const sequence = index.next_id;
      index.next_id = sequence + 1;
      await this.write(index);
      return { taskId: `task_${sequence}`, stateFile: stateFileName(sequence) };
    });
  }

  async register(input: {
    taskId: string;
    stateFile: string;
    workingDir: string;
    prompt: string;
  }): Promise<RegistryEntry> {
    return this.queue.run(async () => {
      const index = await this.load();
      if (index.tasks.some((entry) => entry.task_id === input.taskId)) {
        throw new PersistenceError(
          `Task ${input.taskId} is already registered in ${this.filePath}`,
          this.filePath,
        );
      }

      const now = isoNow();
      const entry: RegistryEntry = {
        task_id: input.taskId,
        state_file: input.stateFile,
        status_summary: "incomplete",
        working_dir: input.workingDir,
        description: describePrompt(input.prompt),
        created_at: now,
        updated_at: now,
      };
      index.tasks.push(entry);
      await this.write(index);
      return entry;
    });
  }

  async markCompleted(taskId: string, counts: RegistryCounts): Promise<void> {
    await this.queue.run(async () => {
      const index = await this.load();
      const entry = index.tasks.find((candidate) => candidate.task_id === taskId);
      if (!entry) {
        throw new ResumeInconsistencyError(`Task ${taskId} is not in registry ${this.filePath}`);
      }

      entry.status_summary = "complete";
      entry.counts = counts;
      entry.updated_at = isoNow();
      await this.write(index);
    });
  }

  private async write(index: RegistryIndex): Promise<void> {
    try {
      await writeJsonFileAtomic(this.filePath, index);
    } catch (err) {
      throw new PersistenceError(
        `Failed to write task registry ${this.filePath}: ${formatErrorMessage(err)}`,
        this.filePath,
        err,
      );
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function describePrompt(prompt: string): string {
  const singleLine = prompt.replace(/\s+/g, " ").trim();
  if (singleLine.length <= DESCRIPTION_LIMIT) return singleLine;
  return `${singleLine.slice(0, DESCRIPTION_KEEP)}...`;
}

function emptyIndex(): RegistryIndex {
  return { schema_version: REGISTRY_SCHEMA_VERSION, next_id: 0, tasks: [] };
}
