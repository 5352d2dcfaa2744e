import path from "node:path";

import trash from "trash";

import { AUXILIARY_EXTENSION, type CleanupMode } from "./config.js";
import { errorDiagnostic, info, type Diagnostic } from "./diagnostics.js";
import { formatErrorMessage } from "./error-format.js";
import { DeletionError, PathResolutionError } from "./errors.js";
import { isFile, listDirectoryFiles } from "./inventory.js";
import { noopLogger, type EventLogger } from "./logger.js";
import { readProjectDocument } from "./project-document.js";
import { locateProject, type LocatedProject, type LocateProjectResult } from "./project-locator.js";
import { EMPTY_REFERENCES, extractReferences, type ReferenceSets } from "./references.js";
import {
  countAuxiliaryFiles,
  listUsedFiles,
  resolveDeletionSet,
  type UsedFile,
} from "./resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export type TrashFile = (filePath: string) => Promise<void>;

export type CleanupPlan = {
  project: LocatedProject;
  mode: CleanupMode;
  inventory: string[];
  references: ReferenceSets;
  /** Present when the used-file listing was requested. */
  usedFiles?: UsedFile[];
  deletions: string[];
  diagnostics: Diagnostic[];
  /** Found/none line for the deletion set; absent when the scan stopped early. */
  summary?: Diagnostic;
};

export type BuildCleanupPlanResult =
  | { status: "planned"; plan: CleanupPlan }
  | { status: "skipped"; error: PathResolutionError; diagnostics: Diagnostic[] };

export type BuildCleanupPlanOptions = {
  mode?: CleanupMode;
  listUsed?: boolean;
  logger?: EventLogger;
};

export type FileOutcome =
  | { file: string; status: "would-trash" }
  | { file: string; status: "trashed" }
  | { file: string; status: "failed"; error: DeletionError };

export type ExecuteCleanupOptions = {
  dryRun?: boolean;
  trash?: TrashFile;
  report?: (diagnostic: Diagnostic) => void;
  logger?: EventLogger;
};

// =============================================================================
// PLAN
// =============================================================================

export async function buildCleanupPlan(
  target: string,
  opts: BuildCleanupPlanOptions = {},
): Promise<BuildCleanupPlanResult> {
  const mode = opts.mode ?? "typed-only";
  const logger = opts.logger ?? noopLogger;

  const located = await locateOrSkip(target);
  if (!located.ok) {
    return skip(located.error, logger);
  }

  const { project } = located;
  const fileKind = mode === "typed-only" ? `${AUXILIARY_EXTENSION} files` : "files";
  const diagnostics: Diagnostic[] = [
    ...located.diagnostics,
    info("project-scan", `Processing project file: ${project.fileName}`),
    info("project-scan", `Looking for unused ${fileKind} in directory: ${project.directory}`),
  ];

  let inventory: string[];
  try {
    inventory = await listDirectoryFiles(project.directory);
  } catch (err) {
    const error = new PathResolutionError(
      project.directory,
      `Cannot list directory ${project.directory}: ${formatErrorMessage(err)}`,
      err,
    );
    return skip(error, logger, diagnostics);
  }

  logger.log({
    type: "project.scan",
    project: project.documentPath,
    payload: { directory: project.directory, mode, files: inventory.length },
  });

  // Nothing to offer and nothing to list: the document is never opened.
  if (mode === "typed-only" && !opts.listUsed && countAuxiliaryFiles(inventory) === 0) {
    diagnostics.push(
      info("no-auxiliary-files", `No ${AUXILIARY_EXTENSION} files found in ${project.directory}`),
    );
    return {
      status: "planned",
      plan: { project, mode, inventory, references: EMPTY_REFERENCES, deletions: [], diagnostics },
    };
  }

  const references = await readReferences(project, diagnostics, logger);
  const deletions = resolveDeletionSet({
    inventory,
    references,
    projectFileName: project.fileName,
    mode,
  });

  const summary =
    deletions.length === 0
      ? info("no-unused-files", `No unused ${fileKind} found in ${project.directory}`)
      : info(
          "unused-files-found",
          `Found ${deletions.length} unused ${fileKind} in ${project.directory}:`,
        );

  const plan: CleanupPlan = {
    project,
    mode,
    inventory,
    references,
    deletions,
    diagnostics,
    summary,
  };
  if (opts.listUsed) {
    plan.usedFiles = await listUsedFiles(references, project.fileName, (name) =>
      referencedFileExists(project.directory, name),
    );
  }

  return { status: "planned", plan };
}

// =============================================================================
// EXECUTE
// =============================================================================

export async function executeCleanupPlan(
  plan: CleanupPlan,
  opts: ExecuteCleanupOptions = {},
): Promise<FileOutcome[]> {
  const dryRun = opts.dryRun ?? true;
  const trashFile = opts.trash ?? moveToTrash;
  const report = opts.report ?? (() => undefined);
  const logger = opts.logger ?? noopLogger;
  const project = plan.project.documentPath;

  const outcomes: FileOutcome[] = [];

  for (const file of plan.deletions) {
    if (dryRun) {
      report(info("file-would-trash", `Would send to trash: ${file}`));
      logger.log({ type: "file.would_trash", project, payload: { file } });
      outcomes.push({ file, status: "would-trash" });
      continue;
    }

    report(info("file-trashing", `Sending to trash: ${file}`));
    const filePath = path.join(plan.project.directory, file);
    try {
      await trashFile(filePath);
    } catch (err) {
      const message = formatErrorMessage(err);
      const error = new DeletionError(filePath, message, err);
      report(errorDiagnostic("file-trash-failed", `Error sending ${file} to trash: ${message}`, error));
      logger.log({ type: "file.trash_failed", project, payload: { file, message } });
      outcomes.push({ file, status: "failed", error });
      continue;
    }

    logger.log({ type: "file.trashed", project, payload: { file } });
    outcomes.push({ file, status: "trashed" });
  }

  return outcomes;
}

export async function moveToTrash(filePath: string): Promise<void> {
  await trash(filePath, { glob: false });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function locateOrSkip(target: string): Promise<LocateProjectResult> {
  try {
    return await locateProject(target);
  } catch (err) {
    return {
      ok: false,
      error: new PathResolutionError(target, `Cannot inspect ${target}: ${formatErrorMessage(err)}`, err),
    };
  }
}

async function readReferences(
  project: LocatedProject,
  diagnostics: Diagnostic[],
  logger: EventLogger,
): Promise<ReferenceSets> {
  const result = await readProjectDocument(project.documentPath);
  if (result.ok) {
    return extractReferences(result.document);
  }

  diagnostics.push(
    errorDiagnostic(
      "document-read-error",
      `Error processing ${project.fileName}: ${result.error.message}`,
      result.error,
    ),
  );
  logger.log({
    type: "document.read_error",
    project: project.documentPath,
    payload: { message: result.error.message },
  });
  return EMPTY_REFERENCES;
}

async function referencedFileExists(directory: string, name: string): Promise<boolean> {
  try {
    return await isFile(path.resolve(directory, name));
  } catch {
    // A reference that cannot be inspected is reported as not found.
    return false;
  }
}

function skip(
  error: PathResolutionError,
  logger: EventLogger,
  diagnostics: Diagnostic[] = [],
): BuildCleanupPlanResult {
  logger.log({
    type: "project.skipped",
    payload: { target: error.targetPath, message: error.message },
  });
  const failure = errorDiagnostic("path-resolution-error", `Error: ${error.message}`, error);
  return { status: "skipped", error, diagnostics: [...diagnostics, failure] };
}
