import type { JsonValue } from "./logger.js";
import { expandPattern } from "./patterns.js";

export const DEFAULT_FIXUP_PROMPT = "Fix the issues with the file";

export const RESULT_MARKER = "RESULT:";

const RESULT_INSTRUCTION = [
  `When you are done, report structured data as JSON on one line starting with "${RESULT_MARKER}".`,
  `Example: ${RESULT_MARKER} {"coverage": 78.5}`,
  `With nothing to report, print: ${RESULT_MARKER} "done"`,
].join("\n");

// Verification output pasted into a fixup prompt is cut to its tail.
const MAX_ERROR_CHARS = 8_000;

// =============================================================================
// PROMPTS
// =============================================================================

export function buildPrompt(input: {
  prompt: string;
  filePath: string;
  metadata: JsonValue;
  allowlistPattern: string;
}): string {
  const allowlist = expandPattern(input.allowlistPattern, input.filePath);

  return [
    expandPattern(input.prompt, input.filePath),
    "",
    allowlistNotice(allowlist),
    "",
    `File: ${input.filePath}`,
    `Metadata: ${JSON.stringify(input.metadata, null, 2)}`,
    "",
    RESULT_INSTRUCTION,
  ].join("\n");
}

export function buildFixupPrompt(input: {
  fixupPrompt?: string;
  filePath: string;
  errorOutput: string;
  allowlistPattern: string;
}): string {
  const allowlist = expandPattern(input.allowlistPattern, input.filePath);
  const base = input.fixupPrompt ?? DEFAULT_FIXUP_PROMPT;

  return [
    expandPattern(base, input.filePath),
    "",
    allowlistNotice(allowlist),
    "",
    `File: ${input.filePath}`,
    "",
    "Verification failed with this output:",
    "```",
    tail(input.errorOutput, MAX_ERROR_CHARS),
    "```",
    "",
    RESULT_INSTRUCTION,
  ].join("\n");
}

function allowlistNotice(allowlist: string): string {
  return `Only read and modify files matching: ${allowlist}\nDo not edit any other file.`;
}

function tail(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : text.slice(text.length - maxChars);
}

// =============================================================================
// RESULTS
// =============================================================================

export type ParsedResult = {
  value: JsonValue;
  raw: boolean;
};

/** Reads the last non-empty `RESULT:` line; text that is not JSON is kept as a raw string. */
export function parseResult(output: string): ParsedResult | null {
  const lines = output.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    const trimmed = lines[i].trim();
    if (!trimmed.startsWith(RESULT_MARKER)) continue;

    const payload = trimmed.slice(RESULT_MARKER.length).trim();
    if (payload.length === 0) continue;

    return parseJsonPayload(payload);
  }
  return null;
}

function parseJsonPayload(payload: string): ParsedResult {
  try {
    const value: JsonValue = JSON.parse(payload);
    return { value, raw: false };
  } catch {
    return { value: payload, raw: true };
  }
}
