/**
 * Loads `fileloop.yaml`: locate, parse, substitute `${VAR}` references, validate.
 * Every failure inside the file surfaces as one "Config file invalid." UserFacingError.
 */

import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { RunnerConfigSchema, defaultRunnerConfig, type RunnerConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const CONFIG_FILE_NAME = "fileloop.yaml";

export type LoadedRunnerConfig = {
  config: RunnerConfig;
  configPath: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * An explicit path must exist. Without one, `<workingDir>/fileloop.yaml` is read when present
 * and the built-in defaults apply otherwise.
 */
export function loadRunnerConfig(input: {
  workingDir: string;
  explicitPath?: string;
}): LoadedRunnerConfig {
  const configPath = locateConfigFile(input.workingDir, input.explicitPath);
  if (configPath === null) {
    return { config: defaultRunnerConfig(), configPath: null };
  }
  return { config: loadRunnerConfigFile(configPath), configPath };
}

export function loadRunnerConfigFile(configPath: string): RunnerConfig {
  try {
    const document = parseYaml(readConfigText(configPath), configPath);
    // An empty file loads as undefined.
    const substituted = substituteEnv(document ?? {}, configPath, []);
    return validate(substituted, configPath);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config file invalid.",
      message: err.message,
      hint: "Fix the config file and rerun, or delete it to use the defaults.",
      next: `Edit ${configPath}`,
      cause: err,
    });
  }
}

/** One line per issue, prefixed with the dotted key path (`<root>` for the document itself). */
export function formatIssues(issues: ZodIssue[]): string {
  return issues.map(describeIssue).join("\n");
}

// =============================================================================
// STAGES
// =============================================================================

function locateConfigFile(workingDir: string, explicitPath?: string): string | null {
  if (!explicitPath) {
    const implicitPath = path.join(workingDir, CONFIG_FILE_NAME);
    return fs.existsSync(implicitPath) ? implicitPath : null;
  }

  const resolved = path.resolve(workingDir, explicitPath);
  if (fs.existsSync(resolved)) return resolved;

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config file missing.",
    message: `Config file not found at ${resolved}.`,
    hint: `Check the --config path, or drop the flag to use ./${CONFIG_FILE_NAME} when present.`,
  });
}

function readConfigText(configPath: string): string {
  try {
    return fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${configPath}`, err);
  }
}

function parseYaml(text: string, configPath: string): unknown {
  try {
    return yaml.load(text);
  } catch (err) {
    let where = "";
    if (err instanceof yaml.YAMLException) {
      where = ` (line ${err.mark.line + 1}, column ${err.mark.column + 1})`;
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML config at ${configPath}${where}: ${detail}`, err);
  }
}

function validate(document: unknown, configPath: string): RunnerConfig {
  const parsed = RunnerConfigSchema.safeParse(document);
  if (parsed.success) return parsed.data;
  throw new ConfigError(
    `Invalid config at ${configPath}:\n${formatIssues(parsed.error.issues)}`,
    parsed.error,
  );
}

// =============================================================================
// HELPERS
// =============================================================================

const ENV_REFERENCE = /\$\{([A-Za-z0-9_]+)(?::-([^}]*))?\}/g;

/**
 * Replaces `${VAR}` in every string value. `${VAR:-fallback}` uses the fallback when VAR is
 * unset; a bare reference to an unset variable is an error naming its key path.
 */
function substituteEnv(node: unknown, configPath: string, keyPath: string[]): unknown {
  if (typeof node === "string") {
    return node.replace(ENV_REFERENCE, (_match, name: string, fallback: string | undefined) => {
      const value = process.env[name] ?? fallback;
      if (value !== undefined) return value;
      throw new ConfigError(
        `Environment variable ${name} is not set but is referenced in ${configPath} (${joinKeyPath(keyPath)}).`,
      );
    });
  }
  if (Array.isArray(node)) {
    return node.map((item, index) => substituteEnv(item, configPath, [...keyPath, String(index)]));
  }
  if (node !== null && typeof node === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(node)) {
      out[key] = substituteEnv(value, configPath, [...keyPath, key]);
    }
    return out;
  }
  return node;
}

function describeIssue(issue: ZodIssue): string {
  const where = joinKeyPath(issue.path.map(String));
  switch (issue.code) {
    case "invalid_type":
      return `${where}: Expected ${issue.expected}, received ${issue.received}`;
    case "unrecognized_keys":
      return `${where}: Unrecognized keys: ${issue.keys.join(", ")}`;
    default:
      return `${where}: ${issue.message}`;
  }
}

function joinKeyPath(keyPath: string[]): string {
  return keyPath.length > 0 ? keyPath.join(".") : "<root>";
}
