/**
 * Orchestrator test fakes.
 * Purpose: provide deterministic adapters for task orchestrator and run-engine tests.
 * Assumptions: fakes are in-memory; outcomes are scripted per file or per command.
 * Usage: pass `ports()` of a FakeWorld as the portsFactory, or to a TaskOrchestrator.
 */

import { ExecutorError, PersistenceError } from "../../../core/errors.js";
import type { JsonValue } from "../../../core/logger.js";
import type { Task } from "../../../core/state-schema.js";
import { TaskStateStore } from "../../../core/state-store.js";
import type {
  ChangeCheckpoint,
  ChangeTracker,
  Clock,
  Executor,
  ExecutorRunResult,
  ExecutorVerifyResult,
  OrchestratorPorts,
} from "../ports.js";

// =============================================================================
// EXECUTOR
// =============================================================================

export type RunCall = {
  promptText: string;
  filePath: string;
  metadata: JsonValue;
};

type RunScript = ExecutorRunResult | ExecutorError;

export class FakeExecutor implements Executor {
  readonly runCalls: RunCall[] = [];
  readonly verifyCalls: string[] = [];

  private readonly runQueue = new Map<string, RunScript[]>();
  private readonly verifyQueue = new Map<string, ExecutorVerifyResult[]>();

  // Called before every run returns; lets a test touch files or hold a step open.
  onRun: (call: RunCall) => Promise<void> | void = () => undefined;
  onVerify: (command: string) => Promise<void> | void = () => undefined;
  // Decides verify results that were not queued.
  verifyDefault: (command: string) => ExecutorVerifyResult = () => ({ passed: true, output: "ok" });

  queueRun(filePath: string, ...results: RunScript[]): void {
    const queue = this.runQueue.get(filePath) ?? [];
    queue.push(...results);
    this.runQueue.set(filePath, queue);
  }

  queueVerify(command: string, ...results: ExecutorVerifyResult[]): void {
    const queue = this.verifyQueue.get(command) ?? [];
    queue.push(...results);
    this.verifyQueue.set(command, queue);
  }

  async run(promptText: string, filePath: string, metadata: JsonValue): Promise<ExecutorRunResult> {
    const call = { promptText, filePath, metadata };
    this.runCalls.push(call);
    await this.onRun(call);

    const next = this.runQueue.get(filePath)?.shift();
    if (next instanceof ExecutorError) throw next;
    return next ?? { success: true, output: 'RESULT: "done"' };
  }

  async verify(command: string): Promise<ExecutorVerifyResult> {
    this.verifyCalls.push(command);
    await this.onVerify(command);
    return this.verifyQueue.get(command)?.shift() ?? this.verifyDefault(command);
  }
}

// =============================================================================
// CHANGE TRACKER
// =============================================================================

export type CommitCall = {
  filePath: string;
  message: string;
};

/** Tracks "dirty" paths as version counters; touching a path bumps its fingerprint. */
export class FakeChangeTracker implements ChangeTracker {
  readonly commits: CommitCall[] = [];
  commitError: Error | null = null;

  private readonly versions = new Map<string, number>();

  constructor(
    readonly enabled: boolean = true,
    private readonly baseline: string[] = [],
  ) {}

  touch(...paths: string[]): void {
    for (const file of paths) {
      this.versions.set(file, (this.versions.get(file) ?? 0) + 1);
    }
  }

  async captureBaseline(): Promise<string[]> {
    return [...new Set([...this.baseline, ...this.versions.keys()])].sort();
  }

  async checkpoint(): Promise<ChangeCheckpoint> {
    const fingerprints = new Map<string, string>();
    for (const [file, version] of this.versions) fingerprints.set(file, `${version}`);
    return { fingerprints };
  }

  async diffSince(checkpoint: ChangeCheckpoint): Promise<string[]> {
    const changed: string[] = [];
    for (const [file, version] of this.versions) {
      if (checkpoint.fingerprints.get(file) !== `${version}`) changed.push(file);
    }
    return changed.sort();
  }

  async commit(filePath: string, message: string): Promise<string | null> {
    if (this.commitError) throw this.commitError;
    this.commits.push({ filePath, message });
    return `c0ffee${this.commits.length}`;
  }
}

// =============================================================================
// CLOCK
// =============================================================================

export const FIXED_ISO = "2024-01-01T00:00:00.000Z";

export const fixedClock: Clock = {
  now: () => new Date(FIXED_ISO),
  isoNow: () => FIXED_ISO,
};

// =============================================================================
// WORLD
// =============================================================================

/**
 * Executor and tracker shared across runs, standing in for the agent and the working tree that
 * outlive a process restart.
 */
export class FakeWorld {
  readonly executor = new FakeExecutor();
  readonly tracker: FakeChangeTracker;

  constructor(options: { trackChanges?: boolean; baseline?: string[] } = {}) {
    this.tracker = new FakeChangeTracker(options.trackChanges ?? false, options.baseline);
  }

  ports(): (task: Task) => OrchestratorPorts {
    return () => ({ executor: this.executor, changeTracker: this.tracker, clock: fixedClock });
  }
}

// =============================================================================
// STORES
// =============================================================================

/** Accepts `allowedSaves` writes, then fails every later one as if the process had died. */
export class CrashingStateStore extends TaskStateStore {
  private saves = 0;

  constructor(
    statePath: string,
    private allowedSaves: number = Number.POSITIVE_INFINITY,
  ) {
    super(statePath);
  }

  get crashed(): boolean {
    return this.saves >= this.allowedSaves;
  }

  // Everything persisted so far stays on disk; nothing after this call does.
  crash(): void {
    this.allowedSaves = this.saves;
  }

  override async save(task: Task): Promise<void> {
    if (this.crashed) {
      throw new PersistenceError("simulated crash", this.statePath);
    }
    this.saves += 1;
    await super.save(task);
  }
}
