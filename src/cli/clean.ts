import {
  buildCleanupPlan,
  executeCleanupPlan,
  type CleanupPlan,
  type FileOutcome,
  type TrashFile,
} from "../core/cleanup.js";
import { PROJECT_EXTENSION, type CleanupOptions } from "../core/config.js";
import type { Diagnostic } from "../core/diagnostics.js";
import { discoverProjects } from "../core/discovery.js";
import { JsonlLogger, noopLogger, type EventLogger } from "../core/logger.js";
import type { AnsiFormatter } from "../core/error-format.js";

import { createCliFormatter, renderDiagnostic } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CleanCommandDeps = {
  trash?: TrashFile;
};

export type CleanCommandSummary = {
  processed: number;
  skipped: number;
  wouldTrash: number;
  trashed: number;
  failed: number;
};

type SweepContext = {
  options: CleanupOptions;
  logger: EventLogger;
  format: AnsiFormatter;
  trash?: TrashFile;
  summary: CleanCommandSummary;
};

const BANNER = "=".repeat(60);

// =============================================================================
// COMMAND
// =============================================================================

export async function cleanCommand(
  options: CleanupOptions,
  deps: CleanCommandDeps = {},
): Promise<CleanCommandSummary> {
  const fileLogger = options.logFile
    ? new JsonlLogger(options.logFile, { debug: options.debug })
    : undefined;

  const ctx: SweepContext = {
    options,
    logger: fileLogger ?? noopLogger,
    format: createCliFormatter({ useColor: options.color }),
    trash: deps.trash,
    summary: { processed: 0, skipped: 0, wouldTrash: 0, trashed: 0, failed: 0 },
  };

  try {
    if (options.recursive) {
      await sweepRecursively(ctx);
    } else {
      await sweepProject(ctx, options.path);
    }

    ctx.logger.log({ type: "sweep.complete", payload: { ...ctx.summary } });
    return ctx.summary;
  } finally {
    fileLogger?.close();
  }
}

async function sweepRecursively(ctx: SweepContext): Promise<void> {
  const basePath = ctx.options.path;
  console.log(`Starting recursive processing in ${basePath}`);

  const projects = await discoverProjects(basePath);
  const single = projects.length === 1 && projects[0] === basePath;

  for (const projectPath of projects) {
    if (!single) {
      console.log(`\n${BANNER}\nProcessing: ${projectPath}\n${BANNER}`);
    }
    await sweepProject(ctx, projectPath);
  }

  if (ctx.summary.processed === 0 && !single) {
    console.log(`No ${PROJECT_EXTENSION} files found in ${basePath} or its subdirectories`);
  }
  console.log(`\nProcessed ${ctx.summary.processed} ${PROJECT_EXTENSION} files recursively`);
}

async function sweepProject(ctx: SweepContext, target: string): Promise<void> {
  const result = await buildCleanupPlan(target, {
    mode: ctx.options.mode,
    listUsed: ctx.options.listUsed,
    logger: ctx.logger,
  });

  if (result.status === "skipped") {
    printDiagnostics(ctx, result.diagnostics);
    ctx.summary.skipped += 1;
    return;
  }

  const { plan } = result;
  printDiagnostics(ctx, plan.diagnostics);
  printUsedFiles(plan);
  if (plan.summary) {
    printDiagnostics(ctx, [plan.summary]);
  }

  const outcomes = await executeCleanupPlan(plan, {
    dryRun: ctx.options.dryRun,
    trash: ctx.trash,
    report: (diagnostic) => printDiagnostics(ctx, [diagnostic]),
    logger: ctx.logger,
  });

  ctx.summary.processed += 1;
  tallyOutcomes(ctx.summary, outcomes);
}

// =============================================================================
// OUTPUT
// =============================================================================

function printDiagnostics(ctx: SweepContext, diagnostics: readonly Diagnostic[]): void {
  for (const diagnostic of diagnostics) {
    const line = renderDiagnostic(diagnostic, ctx.format);
    if (diagnostic.severity === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

function printUsedFiles(plan: CleanupPlan): void {
  if (!plan.usedFiles) return;

  console.log(`Files used in project ${plan.project.fileName}:`);
  for (const used of plan.usedFiles) {
    const suffix = used.present ? "" : " (referenced but not found in directory)";
    console.log(`  ${used.name}${suffix}`);
  }
}

function tallyOutcomes(summary: CleanCommandSummary, outcomes: FileOutcome[]): void {
  for (const outcome of outcomes) {
    if (outcome.status === "would-trash") summary.wouldTrash += 1;
    else if (outcome.status === "trashed") summary.trashed += 1;
    else summary.failed += 1;
  }
}
