import path from "node:path";

import fg from "fast-glob";
import { minimatch } from "minimatch";

import { toPosixPath } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type FileComponents = {
  file: string;
  fileName: string;
  fileStem: string;
  fileDir: string;
};

const TEST_SUFFIXES = [".test", ".spec"];

const TEST_PATH_MARKERS = [
  ".test.",
  ".spec.",
  "_test.",
  "_spec.",
  "/test/",
  "/tests/",
  "/__tests__/",
];

const LISTING_PLACEHOLDERS = ["{all_files}", "{test_files}", "{created_files}"];

// =============================================================================
// COMPONENTS
// =============================================================================

export function fileComponents(filePath: string): FileComponents {
  const file = toPosixPath(filePath);
  const fileName = path.posix.basename(file);
  return {
    file,
    fileName,
    fileStem: extractFileStem(file),
    fileDir: path.posix.dirname(file),
  };
}

/** `src/foo.test.ts` and `src/foo.ts` share the stem `foo`. */
export function extractFileStem(filePath: string): string {
  const baseName = path.posix.basename(toPosixPath(filePath));
  const stem = baseName.slice(0, baseName.length - path.posix.extname(baseName).length);

  for (const suffix of TEST_SUFFIXES) {
    if (stem.endsWith(suffix) && stem.length > suffix.length) {
      return stem.slice(0, -suffix.length);
    }
  }
  return stem;
}

// =============================================================================
// EXPANSION
// =============================================================================

export function expandPattern(template: string, filePath: string): string {
  return substitute(template, fileComponents(filePath), (value) => value);
}

/**
 * For templates that become globs (allowlists): the substituted path parts are escaped, so
 * `pages/[id].tsx` yields `\[id\]*` and matches its own name rather than a character class.
 */
export function expandGlobPattern(template: string, filePath: string): string {
  return substitute(template, fileComponents(filePath), (value) => minimatch.escape(value));
}

function substitute(
  template: string,
  parts: FileComponents,
  encode: (value: string) => string,
): string {
  return template
    .replaceAll("{file}", encode(parts.file))
    .replaceAll("{file_name}", encode(parts.fileName))
    .replaceAll("{file_stem}", encode(parts.fileStem))
    .replaceAll("{file_dir}", encode(parts.fileDir));
}

export function needsFileListing(template: string): boolean {
  return LISTING_PLACEHOLDERS.some((placeholder) => template.includes(placeholder));
}

/**
 * Resolves a verify command for one file.
 *
 * Besides the path placeholders, `{all_files}` lists the file plus everything its allowlist
 * matches on disk, `{test_files}` the test-looking subset of those, and `{created_files}` all
 * matches except the file itself. Lists are space separated.
 */
export async function expandCommand(
  template: string,
  filePath: string,
  options: { cwd: string; allowlistPattern: string },
): Promise<string> {
  let command = expandPattern(template, filePath);
  if (!needsFileListing(template)) {
    return command;
  }

  const source = fileComponents(filePath).file;
  const matches = await findAllowlistMatches(filePath, options);
  const allFiles = matches.includes(source) ? matches : [source, ...matches];
  const testFiles = allFiles.filter((f) => f !== source && looksLikeTestFile(f));
  const createdFiles = matches.filter((f) => f !== source);

  command = command
    .replaceAll("{all_files}", allFiles.join(" "))
    .replaceAll("{test_files}", testFiles.join(" "))
    .replaceAll("{created_files}", createdFiles.join(" "));
  return command;
}

export function looksLikeTestFile(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return TEST_PATH_MARKERS.some((marker) => lower.includes(marker));
}

// A bare-name allowlist (no directory) is searched beside the file.
export function allowlistSearchGlob(filePath: string, allowlistPattern: string): string {
  const expanded = expandGlobPattern(allowlistPattern, filePath);
  if (expanded.includes("/")) {
    return expanded;
  }

  const dir = fileComponents(filePath).fileDir;
  return dir === "." ? expanded : `${minimatch.escape(dir)}/${expanded}`;
}

async function findAllowlistMatches(
  filePath: string,
  options: { cwd: string; allowlistPattern: string },
): Promise<string[]> {
  const pattern = allowlistSearchGlob(filePath, options.allowlistPattern);
  const matches = await fg(pattern, {
    cwd: options.cwd,
    dot: true,
    onlyFiles: true,
    ignore: ["**/node_modules/**", "**/.git/**"],
  });
  return matches.sort();
}
