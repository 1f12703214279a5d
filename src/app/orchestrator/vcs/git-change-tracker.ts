/**
 * Git-backed change tracker.
 * Purpose: report which paths a step touched and commit finished files.
 * Assumptions: the working directory is inside a git work tree; paths are relative to it.
 * Usage: createChangeTracker({ enabled, cwd, allowlistPattern, baseline, tasksDir }) and pass as a port.
 */

import path from "node:path";

import fse from "fs-extra";

import {
  matchesAllowlist,
  normalizeRelativePath,
  relativeToWorkingDir,
} from "../../../core/authorization.js";
import { expandGlobPattern } from "../../../core/patterns.js";
import { listDirtyFiles } from "../../../git/changes.js";
import { git, isNothingToCommitError, shortHeadSha } from "../../../git/git.js";
import type { ChangeCheckpoint, ChangeTracker } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type ChangeTrackerOptions = {
  enabled: boolean;
  cwd: string;
  allowlistPattern: string;
  // Dirty paths recorded earlier for this task; never committed on a file's behalf.
  baseline?: Iterable<string>;
  // Where state files and logs are written. Paths under it are never reported or committed.
  tasksDir?: string;
};

const MISSING = "missing";

// =============================================================================
// PUBLIC API
// =============================================================================

export function createChangeTracker(options: ChangeTrackerOptions): ChangeTracker {
  return options.enabled ? new GitChangeTracker(options) : new DisabledChangeTracker();
}

export class GitChangeTracker implements ChangeTracker {
  readonly enabled = true;
  private readonly baseline: Set<string>;
  private readonly excludedPrefix: string | null;

  constructor(private readonly options: Omit<ChangeTrackerOptions, "enabled">) {
    this.baseline = new Set([...(options.baseline ?? [])].map(normalizeRelativePath));
    this.excludedPrefix = options.tasksDir ? tasksDirPrefix(options.cwd, options.tasksDir) : null;
  }

  async captureBaseline(): Promise<string[]> {
    const dirty = await this.listChanges();
    for (const file of dirty) {
      this.baseline.add(file);
    }
    return [...this.baseline].sort();
  }

  async checkpoint(): Promise<ChangeCheckpoint> {
    const dirty = await this.listChanges();
    const fingerprints = new Map<string, string>();
    await Promise.all(
      dirty.map(async (file) => {
        fingerprints.set(file, await this.fingerprint(file));
      }),
    );
    return { fingerprints };
  }

  // Paths that became dirty, changed again, or were reverted since the checkpoint.
  async diffSince(checkpoint: ChangeCheckpoint): Promise<string[]> {
    const dirty = await this.listChanges();
    const changed = new Set<string>();

    for (const file of dirty) {
      const before = checkpoint.fingerprints.get(file);
      if (before === undefined || before !== (await this.fingerprint(file))) {
        changed.add(file);
      }
    }

    const stillDirty = new Set(dirty);
    for (const file of checkpoint.fingerprints.keys()) {
      if (!stillDirty.has(file)) changed.add(file);
    }

    return [...changed].sort();
  }

  async commit(filePath: string, message: string): Promise<string | null> {
    const { cwd, allowlistPattern } = this.options;
    const target = relativeToWorkingDir(cwd, filePath);
    const pattern = relativeToWorkingDir(cwd, expandGlobPattern(allowlistPattern, filePath));

    const dirty = await this.listChanges();
    const related = dirty.filter(
      (file) =>
        !this.baseline.has(file) && (file === target || matchesAllowlist(file, pattern)),
    );
    if (related.length === 0) {
      return null;
    }

    await git(cwd, ["add", "--", ...related]);
    try {
      await git(cwd, ["commit", "-m", message]);
    } catch (err) {
      if (isNothingToCommitError(err)) return null;
      throw err;
    }

    return shortHeadSha(cwd);
  }

  private async listChanges(): Promise<string[]> {
    const dirty = await listDirtyFiles(this.options.cwd);
    const prefix = this.excludedPrefix;
    return prefix === null ? dirty : dirty.filter((file) => !file.startsWith(prefix));
  }

  private async fingerprint(file: string): Promise<string> {
    try {
      const stat = await fse.stat(path.join(this.options.cwd, file));
      return `${stat.size}:${stat.mtimeMs}`;
    } catch {
      // Deleted paths still show up in porcelain output.
      return MISSING;
    }
  }
}

// `dir/` relative to cwd, or null when the tasks dir lies outside the working tree.
function tasksDirPrefix(cwd: string, tasksDir: string): string | null {
  const relative = path.relative(path.resolve(cwd), path.resolve(cwd, tasksDir));
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    return null;
  }
  return `${normalizeRelativePath(relative)}/`;
}

export class DisabledChangeTracker implements ChangeTracker {
  readonly enabled = false;

  async captureBaseline(): Promise<string[]> {
    return [];
  }

  async checkpoint(): Promise<ChangeCheckpoint> {
    return { fingerprints: new Map() };
  }

  async diffSince(_checkpoint: ChangeCheckpoint): Promise<string[]> {
    return [];
  }

  async commit(_filePath: string, _message: string): Promise<string | null> {
    return null;
  }
}
