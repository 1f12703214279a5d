import { describe, expect, it } from "vitest";

import {
  ConfigError,
  PersistenceError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";

import { normalizeCommandError } from "./command-errors.js";

describe("normalizeCommandError", () => {
  it("maps persistence failures to a code and hint", () => {
    const cause = new PersistenceError("disk full", "/tasks/state_0.json");

    const error = normalizeCommandError(cause, "Run command failed.");

    expect(error.title).toBe("Run command failed.");
    expect(error.code).toBe(USER_FACING_ERROR_CODES.persistence);
    expect(error.message).toBe("disk full");
    expect(error.hint).toBe(
      "Check free disk space and permissions on the tasks directory, then resume the task.",
    );
    expect(error.cause).toBe(cause);
  });

  it("retitles user-facing errors and keeps their text", () => {
    const original = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config file invalid.",
      message: "concurrency: Number must be greater than 0",
      next: "Edit fileloop.yaml",
      cause: new ConfigError("bad"),
    });

    const error = normalizeCommandError(original, "Resume command failed.");

    expect(error.title).toBe("Resume command failed.");
    expect(error.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(error.message).toBe("concurrency: Number must be greater than 0");
    expect(error.hint).toBeUndefined();
    expect(error.next).toBe("Edit fileloop.yaml");
  });

  it("falls back to the unknown code", () => {
    const error = normalizeCommandError(new Error("boom"), "Tasks command failed.");
    expect(error.code).toBe(USER_FACING_ERROR_CODES.unknown);
    expect(error.hint).toBeUndefined();
  });
});
