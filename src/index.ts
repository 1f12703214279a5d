#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { CommanderError } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { resolveDebugFlagFromArgv } from "./core/logger.js";

// Commander exits with these after printing help or the version; they are not failures.
const QUIET_EXIT_CODES = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  // Errors are rendered below, so Commander must neither print them nor call process.exit.
  program.configureOutput({ outputError: () => undefined });
  program.exitOverride();
  program.commands.forEach((command) => command.exitOverride());

  try {
    await program.parseAsync(argv);
  } catch (error) {
    const commanderExit = error instanceof CommanderError ? error.exitCode : undefined;
    if (error instanceof CommanderError && QUIET_EXIT_CODES.has(error.code)) {
      process.exitCode = commanderExit;
      return;
    }

    const debug =
      resolveDebugFlagFromArgv(argv) ?? program.opts<{ debug?: boolean }>().debug === true;
    console.error(renderCliError(error, { debug }));
    process.exitCode = commanderExit && commanderExit > 0 ? commanderExit : 1;
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    // An entry path that cannot be resolved is not this module.
    return false;
  }
}

if (invokedDirectly()) {
  void main(process.argv);
}
