import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { formatIssues } from "./config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import type { JsonValue } from "./logger.js";
import { JsonValueSchema } from "./state-schema.js";

const InputMappingSchema = z.record(JsonValueSchema);

export type InputFileEntry = [path: string, metadata: JsonValue];

/**
 * Reads the input mapping: a JSON object whose keys are file paths and whose values are
 * opaque metadata handed to the executor unchanged. Entry order is the scheduling order.
 */
export async function loadTaskInput(inputPath: string): Promise<InputFileEntry[]> {
  const absolutePath = path.resolve(inputPath);

  let raw: string;
  try {
    raw = await fse.readFile(absolutePath, "utf8");
  } catch (err) {
    throw inputError(`Input file ${absolutePath} cannot be read.`, err);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw inputError(`Input file ${absolutePath} is not valid JSON.`, err);
  }

  return parseTaskInput(doc, absolutePath, topLevelKeys(raw));
}

/**
 * Validates a parsed mapping. `keyOrder` is the order keys appear in the document; without it
 * entries follow property order, which puts integer-like keys such as "10" first.
 */
export function parseTaskInput(
  doc: unknown,
  source: string,
  keyOrder?: readonly string[],
): InputFileEntry[] {
  if (doc === null || typeof doc !== "object" || Array.isArray(doc)) {
    throw inputError(`Input ${source} must be a JSON object mapping file paths to metadata.`);
  }

  const parsed = InputMappingSchema.safeParse(doc);
  if (!parsed.success) {
    throw inputError(
      `Input ${source} has invalid metadata:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  const entries = keyOrder ? inDocumentOrder(parsed.data, keyOrder) : Object.entries(parsed.data);
  const blank = entries.find(([key]) => key.trim().length === 0);
  if (blank) {
    throw inputError(`Input ${source} contains an empty file path.`);
  }
  return entries;
}

function inDocumentOrder(
  record: Record<string, JsonValue>,
  keyOrder: readonly string[],
): InputFileEntry[] {
  const values = new Map(Object.entries(record));
  const entries: InputFileEntry[] = [];
  for (const key of keyOrder) {
    const value = values.get(key);
    if (value === undefined) continue;
    entries.push([key, value]);
    values.delete(key);
  }
  // Anything the scan missed keeps property order at the end.
  return [...entries, ...values.entries()];
}

// Keys of the outermost object as written. Expects text JSON.parse already accepted.
export function topLevelKeys(raw: string): string[] {
  const keys: string[] = [];
  let depth = 0;
  let expectKey = false;

  for (let i = 0; i < raw.length; i += 1) {
    const char = raw[i];
    if (char === '"') {
      let end = i + 1;
      while (end < raw.length && raw[end] !== '"') {
        end += raw[end] === "\\" ? 2 : 1;
      }
      if (depth === 1 && expectKey) {
        const key: unknown = JSON.parse(raw.slice(i, end + 1));
        if (typeof key === "string") keys.push(key);
        expectKey = false;
      }
      i = end;
    } else if (char === "{" || char === "[") {
      depth += 1;
      if (depth === 1) expectKey = char === "{";
    } else if (char === "}" || char === "]") {
      depth -= 1;
    } else if (char === "," && depth === 1) {
      expectKey = true;
    }
  }

  return keys;
}

function inputError(message: string, cause?: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.input,
    title: "Input mapping invalid.",
    message,
    hint: 'Pass a JSON object such as {"src/a.ts": {"owner": "web"}}.',
    cause,
  });
}
