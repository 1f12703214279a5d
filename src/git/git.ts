import { execa, ExecaError } from "execa";

import { GitError } from "../core/errors.js";

export type GitOutput = {
  stdout: string;
  stderr: string;
};

export async function git(cwd: string, args: string[]): Promise<GitOutput & { exitCode: number }> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      stripFinalNewline: true,
    });
    return { stdout: res.stdout, stderr: res.stderr, exitCode: res.exitCode ?? 0 };
  } catch (err) {
    const output = extractExecaOutput(err);
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${output.stderr}`, output);
  }
}

export async function isInsideWorkTree(cwd: string): Promise<boolean> {
  try {
    const res = await git(cwd, ["rev-parse", "--is-inside-work-tree"]);
    return res.stdout.trim() === "true";
  } catch (err) {
    if (err instanceof GitError) return false;
    throw err;
  }
}

export async function repoRoot(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--show-toplevel"]);
  return res.stdout.trim();
}

export async function currentBranch(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--abbrev-ref", "HEAD"]);
  return res.stdout.trim();
}

export async function shortHeadSha(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--short", "HEAD"]);
  return res.stdout.trim();
}

export async function checkoutNewBranch(cwd: string, branch: string): Promise<void> {
  await git(cwd, ["checkout", "-b", branch]);
}

export async function statusPorcelain(cwd: string): Promise<string> {
  const res = await git(cwd, ["status", "--porcelain", "--untracked-files=all"]);
  return res.stdout;
}

export function isNothingToCommitError(err: unknown): boolean {
  if (!(err instanceof GitError)) return false;

  const { stdout, stderr } = extractGitErrorOutput(err);
  const output = `${stdout}\n${stderr}`.toLowerCase();
  return output.includes("nothing to commit") || output.includes("no changes added to commit");
}

export function extractGitErrorOutput(err: GitError): GitOutput {
  const cause = err.cause;
  if (cause && typeof cause === "object" && "stdout" in cause && "stderr" in cause) {
    return { stdout: String(cause.stdout ?? ""), stderr: String(cause.stderr ?? "") };
  }
  return { stdout: "", stderr: "" };
}

function extractExecaOutput(err: unknown): GitOutput {
  if (err instanceof ExecaError) {
    const execaErr: ExecaError = err;
    return {
      stdout: typeof execaErr.stdout === "string" ? execaErr.stdout : "",
      stderr: typeof execaErr.stderr === "string" && execaErr.stderr.length > 0 ? execaErr.stderr : execaErr.shortMessage,
    };
  }
  return { stdout: "", stderr: err instanceof Error ? err.message : String(err) };
}
