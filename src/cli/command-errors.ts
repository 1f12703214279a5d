import { formatErrorMessage } from "../core/error-format.js";
import {
  ConfigError,
  GitError,
  PersistenceError,
  ResumeInconsistencyError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorCode,
} from "../core/errors.js";

type ErrorClass = abstract new (...args: never[]) => Error;

type KnownFailure = {
  type: ErrorClass;
  code: UserFacingErrorCode;
  hint?: string;
};

// First match wins.
const KNOWN_FAILURES: KnownFailure[] = [
  { type: ConfigError, code: USER_FACING_ERROR_CODES.config },
  { type: GitError, code: USER_FACING_ERROR_CODES.git },
  {
    type: PersistenceError,
    code: USER_FACING_ERROR_CODES.persistence,
    hint: "Check free disk space and permissions on the tasks directory, then resume the task.",
  },
  {
    type: ResumeInconsistencyError,
    code: USER_FACING_ERROR_CODES.resume,
    hint: "Inspect the tasks directory with `fileloop tasks`, or pass a task id.",
  },
];

function classify(error: unknown): KnownFailure | undefined {
  return KNOWN_FAILURES.find((entry) => error instanceof entry.type);
}

/**
 * Wraps whatever a command threw in a UserFacingError titled for that command. An error that is
 * already user facing keeps its code and text; its cause decides the hint when it has none.
 */
export function normalizeCommandError(error: unknown, title: string): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title,
      message: error.message,
      hint: error.hint ?? classify(error.cause)?.hint,
      next: error.next,
      cause: error.cause ?? error,
    });
  }

  const known = classify(error);
  return new UserFacingError({
    code: known?.code ?? USER_FACING_ERROR_CODES.unknown,
    title,
    message: formatErrorMessage(error),
    hint: known?.hint,
    cause: error,
  });
}
