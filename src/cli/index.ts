import { Command } from "commander";

import { AUXILIARY_EXTENSION, PROJECT_EXTENSION, parseCleanupOptions } from "../core/config.js";

import { cleanCommand, type CleanCommandDeps } from "./clean.js";

export type CliFlags = {
  sendToTrash: boolean;
  allUnused: boolean;
  listUsed: boolean;
  recursive: boolean;
  logFile?: string;
  debug: boolean;
  color: boolean;
};

export function buildCli(deps: CleanCommandDeps = {}): Command {
  const program = new Command();

  program
    .name("trec-sweep")
    .description(
      `Find ${AUXILIARY_EXTENSION} recordings and other files no longer referenced by a ${PROJECT_EXTENSION} project`,
    )
    .version("0.1.0")
    .argument("<path>", `Project directory or the ${PROJECT_EXTENSION} file itself`)
    .option("--send-to-trash", "Move unused files to the trash (otherwise just report)", false)
    .option("--all-unused", `Consider every unused file, not just ${AUXILIARY_EXTENSION} files`, false)
    .option("--list-used", "Also list every file the project references", false)
    .option("--recursive", `Process every ${PROJECT_EXTENSION} file below the path`, false)
    .option("--log-file <path>", "Append JSONL sweep events to this file")
    .option("--debug", "Show stack traces for errors", false)
    .option("--no-color", "Disable colored output")
    .action(async (target: string) => {
      const flags = program.opts<CliFlags>();
      const options = parseCleanupOptions({
        path: target,
        mode: flags.allUnused ? "all-unused" : "typed-only",
        dryRun: !flags.sendToTrash,
        listUsed: flags.listUsed,
        recursive: flags.recursive,
        logFile: flags.logFile,
        debug: flags.debug,
        color: flags.color,
      });

      await cleanCommand(options, deps);
    });

  return program;
}
