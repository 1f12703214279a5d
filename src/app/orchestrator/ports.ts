/**
 * Orchestrator ports define the boundary between the task engine and its adapters.
 * Purpose: keep the agent CLI, the verify shell and git out of the engine so tests can fake them.
 * Assumptions: every port operates on the task's working directory.
 * Usage: build real adapters with `createDefaultPorts` in `run-engine.ts`, or pass fakes.
 */

import type { JsonValue } from "../../core/logger.js";

// =============================================================================
// EXECUTOR
// =============================================================================

export type ExecutorRunResult = {
  success: boolean;
  output: string;
};

export type ExecutorVerifyResult = {
  passed: boolean;
  output: string;
};

export interface Executor {
  /** Runs a prompt or fixup step. Throws ExecutorError when the step could not run to completion. */
  run(promptText: string, filePath: string, metadata: JsonValue): Promise<ExecutorRunResult>;
  /** Runs a resolved verify command. Throws ExecutorError when the command could not be started. */
  verify(command: string): Promise<ExecutorVerifyResult>;
}

// =============================================================================
// CHANGE TRACKING
// =============================================================================

// Opaque to the engine; only the tracker that produced it reads it.
export type ChangeCheckpoint = {
  readonly fingerprints: ReadonlyMap<string, string>;
};

export interface ChangeTracker {
  readonly enabled: boolean;
  captureBaseline(): Promise<string[]>;
  checkpoint(): Promise<ChangeCheckpoint>;
  diffSince(checkpoint: ChangeCheckpoint): Promise<string[]>;
  /** Returns the new commit id, or null when there was nothing to commit. */
  commit(filePath: string, message: string): Promise<string | null>;
}

// =============================================================================
// CLOCK
// =============================================================================

export interface Clock {
  now(): Date;
  isoNow(): string;
}

export const systemClock: Clock = {
  now: () => new Date(),
  isoNow: () => new Date().toISOString(),
};

export type OrchestratorPorts = {
  executor: Executor;
  changeTracker: ChangeTracker;
  clock: Clock;
};
