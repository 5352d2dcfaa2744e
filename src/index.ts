#!/usr/bin/env node

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import type { CleanCommandDeps } from "./cli/clean.js";
import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "./core/errors.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

const USAGE_HINT = "Run `trec-sweep --help` for usage.";

// Commander reports these by throwing once the text is already printed.
const INFORMATIONAL_EXITS = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

function silenceCommanderErrors(program: Command): void {
  // main() renders parse errors itself.
  program.configureOutput({ outputError: () => undefined });
  program.exitOverride();
}

function toUsageError(error: CommanderError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.usage,
    title: "Invalid arguments.",
    message: error.message.replace(/^error:\s*/i, ""),
    hint: USAGE_HINT,
    cause: error,
  });
}

function wantsDebugOutput(argv: string[]): boolean {
  const end = argv.indexOf("--");
  return (end === -1 ? argv : argv.slice(0, end)).includes("--debug");
}

export async function main(argv: string[], deps: CleanCommandDeps = {}): Promise<void> {
  const program = buildCli(deps);
  silenceCommanderErrors(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && INFORMATIONAL_EXITS.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }

    const rendered = error instanceof CommanderError ? toUsageError(error) : error;
    console.error(renderCliError(rendered, { debug: wantsDebugOutput(argv) }));
    const exitCode = error instanceof CommanderError ? error.exitCode : 1;
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return import.meta.url === pathToFileURL(realpathSync(entry)).href;
}

// Allow `node dist/src/index.js` and the installed bin link
if (isDirectExecution()) {
  void main(process.argv);
}
