import { describe, expect, it } from "vitest";

import { GitError } from "../core/errors.js";

import { extractGitErrorOutput, isNothingToCommitError } from "./git.js";

describe("isNothingToCommitError", () => {
  it("detects a clean-tree commit attempt", () => {
    const err = new GitError("git commit -m x failed", {
      stdout: "On branch main\nnothing to commit, working tree clean\n",
      stderr: "",
    });

    expect(isNothingToCommitError(err)).toBe(true);
  });

  it("ignores other git failures and non-git errors", () => {
    const err = new GitError("git commit failed", {
      stdout: "",
      stderr: "fatal: unable to auto-detect email address\n",
    });

    expect(isNothingToCommitError(err)).toBe(false);
    expect(isNothingToCommitError(new Error("nothing to commit"))).toBe(false);
  });
});

describe("extractGitErrorOutput", () => {
  it("returns empty output when the cause carries none", () => {
    expect(extractGitErrorOutput(new GitError("boom"))).toEqual({ stdout: "", stderr: "" });
  });
});
