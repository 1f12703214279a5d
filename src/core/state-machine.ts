import { InvalidTransitionError } from "./errors.js";
import type { FileStatus } from "./state-schema.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * What the last step reported back.
 *
 * - `none`: no external operation ran (a worker claimed the file).
 * - `success` / `failure`: the prompt, verify or fixup step finished either way.
 * - `unauthorized`: the change guard rejected what a mutating step touched.
 */
export type StepOutcome = "none" | "success" | "failure" | "unauthorized";

export type TransitionInput = {
  status: FileStatus;
  retryCount: number;
  maxRetries: number;
  hasVerifyCommand: boolean;
  outcome: StepOutcome;
};

export type Transition = {
  from: FileStatus;
  to: FileStatus;
  consumesRetry: boolean;
};

export type StepAction = "claim" | "prompt" | "verify" | "fixup";

// =============================================================================
// TRANSITIONS
// =============================================================================

export function nextTransition(input: TransitionInput): Transition {
  const { status, outcome } = input;
  const move = (to: FileStatus, consumesRetry = false): Transition => ({
    from: status,
    to,
    consumesRetry,
  });

  switch (status) {
    case "pending":
      if (outcome === "none") return move("prompt_in_progress");
      break;

    case "prompt_in_progress":
      if (outcome === "success") {
        return move(input.hasVerifyCommand ? "awaiting_verification" : "completed");
      }
      if (outcome === "failure" || outcome === "unauthorized") return move("failed");
      break;

    case "awaiting_verification":
      if (outcome === "none") return move("verify_in_progress");
      break;

    case "verify_in_progress":
      if (outcome === "success") return move("completed");
      if (outcome === "failure") {
        return input.retryCount < input.maxRetries
          ? move("fixup_in_progress", true)
          : move("failed");
      }
      break;

    case "fixup_in_progress":
      // A fixup that ran counts as done whatever it exited with; verification decides.
      if (outcome === "success") return move("awaiting_verification");
      if (outcome === "failure" || outcome === "unauthorized") return move("failed");
      break;

    case "completed":
    case "failed":
      throw new InvalidTransitionError(`File is already terminal (${status})`);
  }

  throw new InvalidTransitionError(`No transition from ${status} on outcome ${outcome}`);
}

export function plannedAction(status: FileStatus): StepAction | null {
  switch (status) {
    case "pending":
    case "awaiting_verification":
      return "claim";
    case "prompt_in_progress":
      return "prompt";
    case "verify_in_progress":
      return "verify";
    case "fixup_in_progress":
      return "fixup";
    case "completed":
    case "failed":
      return null;
  }
}

/**
 * An in-flight status found on disk means the step never finished. Prompt and verify restart
 * from their claim. A fixup already consumed its retry when it was entered, so it stays put and
 * the fixup runs again.
 */
export function recoveryStatus(status: FileStatus): FileStatus {
  switch (status) {
    case "prompt_in_progress":
      return "pending";
    case "verify_in_progress":
      return "awaiting_verification";
    default:
      return status;
  }
}
