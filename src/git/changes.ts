import fs from "node:fs/promises";
import path from "node:path";

import { repoRoot, statusPorcelain } from "./git.js";

/**
 * Dirty paths (modified, staged, deleted or untracked) relative to `cwd`, sorted.
 *
 * Porcelain output is relative to the repository root, so paths are rebased when `cwd` is a
 * subdirectory. Paths outside `cwd` keep their `../` prefix.
 */
export async function listDirtyFiles(cwd: string): Promise<string[]> {
  const [root, output, base] = await Promise.all([
    repoRoot(cwd),
    statusPorcelain(cwd),
    fs.realpath(cwd),
  ]);
  const files = new Set<string>();

  for (const line of output.split("\n")) {
    const repoRelative = parseStatusPath(line);
    if (!repoRelative) continue;

    const absolute = path.join(root, repoRelative);
    files.add(normalizePath(path.relative(base, absolute)));
  }

  return Array.from(files)
    .filter((file) => file.length > 0 && !file.endsWith("/"))
    .sort();
}

// =============================================================================
// INTERNALS
// =============================================================================

// "XY path" or "XY old -> new"; git quotes paths with unusual characters.
export function parseStatusPath(line: string): string | null {
  if (line.trim().length === 0 || line.length < 4) return null;

  const rest = line.slice(3);
  const arrowIndex = rest.indexOf(" -> ");
  const target = arrowIndex === -1 ? rest : rest.slice(arrowIndex + 4);
  const unquoted = unquote(target.trim());
  return unquoted.length > 0 ? unquoted : null;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(["\\])/g, "$1");
  }
  return value;
}

function normalizePath(filePath: string): string {
  return filePath.split(path.sep).join("/");
}
