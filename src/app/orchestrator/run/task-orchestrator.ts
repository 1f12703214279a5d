/**
 * TaskOrchestrator drives one task's files to a terminal state or to a graceful stop.
 * Purpose: be the single writer of task state. Workers report step outcomes; this class
 * applies each transition and persists it before anything else may happen to that file.
 * Assumptions: the task was created or loaded by run-engine.ts and its registry entry exists.
 * Usage: await new TaskOrchestrator({ task, store, registry, paths, ports, logger }).run()
 */

import { formatErrorMessage } from "../../../core/error-format.js";
import { PersistenceError } from "../../../core/errors.js";
import { FailureLog } from "../../../core/failure-log.js";
import { logTaskEvent, logTaskResume, type JsonlLogger } from "../../../core/logger.js";
import type { PathsContext } from "../../../core/paths.js";
import { expandPattern } from "../../../core/patterns.js";
import { nextTransition, plannedAction, type Transition } from "../../../core/state-machine.js";
import {
  applyTransition,
  countFileStatuses,
  isTaskDone,
  recoverInterruptedFiles,
  requireFile,
  type TransitionDetails,
} from "../../../core/state-mutations.js";
import {
  isTerminalStatus,
  type FileState,
  type FileStatus,
  type Task,
} from "../../../core/state-schema.js";
import {
  summarizeTask,
  type TaskStateStore,
  type TaskStatusSummary,
} from "../../../core/state-store.js";
import type { TaskRegistry } from "../../../core/task-registry.js";
import { SerialQueue } from "../../../core/utils.js";
import type { OrchestratorPorts } from "../ports.js";

import {
  resolveSiblingAllowlist,
  runPipelineStep,
  type StepEnvironment,
  type StepReport,
} from "./pipeline-step.js";
import { WorkerPool, type ClaimContext, type ClaimDisposition } from "./worker-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type TransitionEvent = {
  taskId: string;
  file: string;
  workerId: number | null;
  from: FileStatus;
  to: FileStatus;
  retryCount: number;
};

export type TaskOrchestratorOptions = {
  task: Task;
  store: TaskStateStore;
  registry: TaskRegistry;
  paths: PathsContext;
  ports: OrchestratorPorts;
  logger: JsonlLogger;
  stopSignal?: AbortSignal;
  // Set when the task was loaded from disk rather than just created.
  resumed?: boolean;
  onTransition?: (event: TransitionEvent) => void;
};

export type TaskStopInfo = {
  reason: "signal";
  signal?: string;
};

export type TaskRunResult = {
  taskId: string;
  done: boolean;
  summary: TaskStatusSummary;
  stopped?: TaskStopInfo;
  // Files left for a later run because of max_files.
  deferred: number;
};

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class TaskOrchestrator {
  private readonly task: Task;
  private readonly writer = new SerialQueue();
  private readonly commits = new SerialQueue();
  private readonly failureLog: FailureLog;
  private readonly env: StepEnvironment;
  private fatal: PersistenceError | null = null;

  constructor(private readonly options: TaskOrchestratorOptions) {
    this.task = options.task;
    this.failureLog = new FailureLog(options.paths, options.task.id);
    this.env = {
      task: options.task,
      ports: options.ports,
      baseline: new Set(options.task.git.baseline),
      siblingAllowlist: resolveSiblingAllowlist(options.task),
    };
  }

  async run(): Promise<TaskRunResult> {
    const { logger } = this.options;

    await this.recover();

    const pending = [...this.task.files.values()].filter((file) => !isTerminalStatus(file.status));
    const limit = this.task.max_files ?? pending.length;
    const scheduled = pending.slice(0, limit).map((file) => file.path);

    logTaskEvent(logger, "task.start", {
      payload: {
        concurrency: this.task.concurrency,
        max_retries: this.task.max_retries,
        scheduled_files: scheduled.length,
        deferred_files: pending.length - scheduled.length,
      },
    });

    const pool = new WorkerPool({
      concurrency: this.task.concurrency,
      ready: scheduled,
      handler: (filePath, context) => this.driveFile(filePath, context),
      stopSignal: this.options.stopSignal,
    });

    let poolResult: Awaited<ReturnType<WorkerPool["run"]>>;
    try {
      poolResult = await pool.run();
    } catch (err) {
      if (err instanceof PersistenceError) {
        logTaskEvent(logger, "task.persist_failed", {
          payload: { path: err.targetPath, message: err.message },
        });
        await this.finalFlush();
      }
      throw err;
    }

    const done = isTaskDone(this.task);
    const summary = summarizeTask(this.task);

    if (done) {
      const counts = countFileStatuses(this.task);
      await this.options.registry.markCompleted(this.task.id, {
        total: counts.total,
        completed: counts.completed,
        failed: counts.failed,
      });
      logTaskEvent(logger, "task.complete", {
        payload: { completed: counts.completed, failed: counts.failed },
      });
    }

    const result: TaskRunResult = {
      taskId: this.task.id,
      done,
      summary,
      deferred: pending.length - scheduled.length,
    };

    if (poolResult.stopped && !done) {
      result.stopped = { reason: "signal", signal: poolResult.stopped.signal };
      const remaining = summary.counts.total - summary.counts.completed - summary.counts.failed;
      const payload = { reason: "signal", remaining_files: remaining };
      logTaskEvent(logger, "task.stop", {
        payload: poolResult.stopped.signal
          ? { ...payload, signal: poolResult.stopped.signal }
          : payload,
      });
    }

    return result;
  }

  // ===========================================================================
  // RECOVERY
  // ===========================================================================

  private async recover(): Promise<void> {
    const recovered = recoverInterruptedFiles(this.task);
    for (const entry of recovered) {
      logTaskEvent(this.options.logger, "task.recover", {
        file: entry.path,
        payload: { from: entry.from, to: entry.to },
      });
    }
    if (recovered.length > 0) {
      await this.persist();
    }

    if (this.options.resumed) {
      const counts = countFileStatuses(this.task);
      const terminal = counts.completed + counts.failed;
      logTaskResume(this.options.logger, {
        recovered: recovered.length,
        remaining: counts.total - terminal,
        terminal,
      });
    }
  }

  // ===========================================================================
  // PIPELINE DRIVER
  // ===========================================================================

  /**
   * Runs steps for one claimed file until it rests in an idle status or becomes terminal. A stop
   * only prevents new claims; a claim keeps the file while it is in an in-flight status.
   */
  private async driveFile(filePath: string, context: ClaimContext): Promise<ClaimDisposition> {
    let ranStep = false;

    for (;;) {
      const file = requireFile(this.task, filePath);
      const action = plannedAction(file.status);
      if (action === null) {
        return "release";
      }

      if (action === "claim") {
        if (ranStep) return "requeue";
        if (context.stopRequested()) return "release";
        await this.applyOutcome(filePath, { action, outcome: "none" }, context.workerId);
        continue;
      }

      // An in-flight status is owned by this claim: a fixup entered from a failed verification
      // runs even after a stop, so what is on disk never skips it.
      const report = await runPipelineStep(this.env, structuredClone(file), action);
      ranStep = true;
      const transition = await this.applyOutcome(filePath, report, context.workerId);
      await this.afterTransition(file, report, transition);
    }
  }

  /** The only place task state changes. Transitions are applied and persisted one at a time. */
  private async applyOutcome(
    filePath: string,
    report: StepReport,
    workerId: number | null,
  ): Promise<Transition> {
    return this.writer.run(async () => {
      if (this.fatal) throw this.fatal;

      const file = requireFile(this.task, filePath);
      const transition = nextTransition({
        status: file.status,
        retryCount: file.retry_count,
        maxRetries: this.task.max_retries,
        hasVerifyCommand: Boolean(this.task.verify_command),
        outcome: report.outcome,
      });

      const details: TransitionDetails = {};
      if (report.error !== undefined) details.error = report.error;
      if (report.result) details.result = report.result;
      applyTransition(file, transition, details, this.options.ports.clock.isoNow());

      await this.persist();
      this.emitTransition(file, transition, workerId);
      return transition;
    });
  }

  private async persist(): Promise<void> {
    try {
      await this.options.store.save(this.task);
    } catch (err) {
      const error =
        err instanceof PersistenceError
          ? err
          : new PersistenceError(
              `Failed to persist task ${this.task.id}: ${formatErrorMessage(err)}`,
              this.options.store.statePath,
              err,
            );
      this.fatal = error;
      throw error;
    }
  }

  private async finalFlush(): Promise<void> {
    try {
      await this.options.store.save(this.task);
      logTaskEvent(this.options.logger, "task.flush", { payload: { status: "ok" } });
    } catch (err) {
      logTaskEvent(this.options.logger, "task.flush", {
        payload: { status: "failed", message: formatErrorMessage(err) },
      });
    }
  }

  private emitTransition(file: FileState, transition: Transition, workerId: number | null): void {
    const event: TransitionEvent = {
      taskId: this.task.id,
      file: file.path,
      workerId,
      from: transition.from,
      to: transition.to,
      retryCount: file.retry_count,
    };

    const payload = { from: event.from, to: event.to, retry_count: event.retryCount };
    logTaskEvent(this.options.logger, "file.transition", {
      file: file.path,
      ...(workerId === null ? {} : { worker: workerId }),
      payload:
        transition.to === "failed" && file.last_error
          ? { ...payload, last_error: file.last_error }
          : payload,
    });
    this.options.onTransition?.(event);
  }

  // ===========================================================================
  // SIDE EFFECTS
  // ===========================================================================

  private async afterTransition(
    file: FileState,
    report: StepReport,
    transition: Transition,
  ): Promise<void> {
    await this.recordFailureDetails(file, report, transition);

    if (transition.to === "completed" && this.task.git.auto_commit) {
      await this.commits.run(() => this.commitFile(file));
    }
  }

  private async recordFailureDetails(
    file: FileState,
    report: StepReport,
    transition: Transition,
  ): Promise<void> {
    const entries: string[] = [];

    if (report.action === "verify" && report.outcome === "failure") {
      entries.push(
        [
          `VERIFICATION FAILED (retries used ${file.retry_count}/${this.task.max_retries})`,
          `Command: ${report.command ?? ""}`,
          "",
          "Output:",
          report.output ?? "",
        ].join("\n"),
      );
    }
    if (report.action === "fixup" && report.promptText !== undefined) {
      entries.push(`FIXUP PROMPT SENT:\n${report.promptText}`);
      if (report.output) entries.push(`FIXUP RESPONSE:\n${report.output}`);
    }
    if (transition.to === "failed") {
      entries.push(`FINAL STATUS: FAILED\n${file.last_error ?? ""}`.trim());
    }

    for (const entry of entries) {
      try {
        await this.failureLog.append(file.path, entry, this.options.ports.clock.isoNow());
      } catch (err) {
        logTaskEvent(this.options.logger, "failure_log.write_failed", {
          file: file.path,
          payload: { message: formatErrorMessage(err) },
        });
      }
    }
  }

  private async commitFile(file: FileState): Promise<void> {
    const message = expandPattern(this.task.git.commit_message, file.path).replaceAll(
      "{task_id}",
      this.task.id,
    );

    try {
      const commitId = await this.options.ports.changeTracker.commit(file.path, message);
      logTaskEvent(this.options.logger, "file.commit", {
        file: file.path,
        payload: { commit: commitId, message },
      });
    } catch (err) {
      // The file stays Completed; a failed commit leaves its changes in the working tree.
      logTaskEvent(this.options.logger, "file.commit_failed", {
        file: file.path,
        payload: { message: formatErrorMessage(err) },
      });
    }
  }
}
