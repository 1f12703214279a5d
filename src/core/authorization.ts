import path from "node:path";

import { minimatch } from "minimatch";

import { toPosixPath } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type AuthorizationInput = {
  // Paths touched by the step, relative to the working directory.
  modified: Iterable<string>;
  // Fully resolved allowlist patterns; a path matching any one of them is permitted.
  allowlist: readonly string[];
  // Paths that were already dirty before the task started.
  baseline: ReadonlySet<string>;
};

export type AuthorizationDecision =
  | { authorized: true; unauthorized: [] }
  | { authorized: false; unauthorized: string[] };

// =============================================================================
// MATCHING
// =============================================================================

export function normalizeRelativePath(input: string): string {
  let value = toPosixPath(input);
  while (value.startsWith("./")) {
    value = value.slice(2);
  }
  return value;
}

/**
 * Glob match with dotfiles included. A pattern without a `/` is matched against the
 * base name, so `foo*` permits `src/foo.ts` and `src/foo.test.ts`.
 */
export function matchesAllowlist(filePath: string, pattern: string): boolean {
  const target = normalizeRelativePath(filePath);
  const normalizedPattern = normalizeRelativePath(pattern);
  if (normalizedPattern.length === 0) return false;

  return minimatch(target, normalizedPattern, {
    dot: true,
    matchBase: !normalizedPattern.includes("/"),
  });
}

// Input files may be given as absolute paths; guard inputs are compared relative to the working dir.
export function relativeToWorkingDir(workingDir: string, value: string): string {
  const posix = toPosixPath(value);
  if (!path.posix.isAbsolute(posix)) {
    return normalizeRelativePath(posix);
  }
  return normalizeRelativePath(path.posix.relative(toPosixPath(workingDir), posix));
}

// =============================================================================
// DECISION
// =============================================================================

export function checkAuthorization(input: AuthorizationInput): AuthorizationDecision {
  const unauthorized = new Set<string>();

  for (const raw of input.modified) {
    const modified = normalizeRelativePath(raw);
    if (input.baseline.has(modified)) continue;
    if (input.allowlist.some((pattern) => matchesAllowlist(modified, pattern))) continue;
    unauthorized.add(modified);
  }

  if (unauthorized.size === 0) {
    return { authorized: true, unauthorized: [] };
  }
  return { authorized: false, unauthorized: [...unauthorized].sort() };
}

export function describeViolation(unauthorized: readonly string[]): string {
  return `Unauthorized changes outside allowlist: ${unauthorized.join(", ")}`;
}
