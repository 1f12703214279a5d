import path from "node:path";

import fse from "fs-extra";

import { failureLogPath, type PathsContext } from "./paths.js";
import { isoNow } from "./utils.js";

const SEPARATOR = "=".repeat(80);

/**
 * Human-readable history of what went wrong for one file: verification output, the fixup
 * prompts sent and the final verdict. Appended, never rewritten.
 */
export class FailureLog {
  constructor(
    private readonly paths: PathsContext,
    private readonly taskId: string,
  ) {}

  pathFor(filePath: string): string {
    return failureLogPath(this.paths, this.taskId, filePath);
  }

  async append(filePath: string, message: string, now: string = isoNow()): Promise<void> {
    const target = this.pathFor(filePath);
    await fse.ensureDir(path.dirname(target));
    await fse.appendFile(target, `\n${SEPARATOR}\n[${now}]\n${message}\n`, "utf8");
  }
}
