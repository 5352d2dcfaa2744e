import path from "node:path";

import { PROJECT_EXTENSION, hasExtension } from "./config.js";
import { info, type Diagnostic } from "./diagnostics.js";
import { PathResolutionError } from "./errors.js";
import { isDirectory, isFile, listDirectoryFiles } from "./inventory.js";

export type LocatedProject = {
  documentPath: string;
  directory: string;
  fileName: string;
};

export type LocateProjectResult =
  | { ok: true; project: LocatedProject; diagnostics: Diagnostic[] }
  | { ok: false; error: PathResolutionError };

/**
 * Accepts a project document or a directory. For a directory, a document
 * named after the directory wins; otherwise the first document by name.
 */
export async function locateProject(target: string): Promise<LocateProjectResult> {
  if (await isDirectory(target)) {
    return locateInDirectory(target);
  }

  if (await isFile(target)) {
    if (!hasExtension(target, PROJECT_EXTENSION)) {
      return fail(target, `${target} is not a ${PROJECT_EXTENSION} file`);
    }
    return {
      ok: true,
      project: {
        documentPath: target,
        directory: path.dirname(target),
        fileName: path.basename(target),
      },
      diagnostics: [],
    };
  }

  return fail(target, `${target} is not a valid directory or file`);
}

async function locateInDirectory(directory: string): Promise<LocateProjectResult> {
  const dirName = path.basename(path.normalize(directory));
  const matchingName = hasExtension(dirName, PROJECT_EXTENSION)
    ? dirName
    : `${dirName}${PROJECT_EXTENSION}`;
  const matchingPath = path.join(directory, matchingName);

  if (await isFile(matchingPath)) {
    return {
      ok: true,
      project: { documentPath: matchingPath, directory, fileName: matchingName },
      diagnostics: [info("project-located", `Found matching tscproj file: ${matchingName}`)],
    };
  }

  const files = await listDirectoryFiles(directory);
  const first = files.find((name) => hasExtension(name, PROJECT_EXTENSION));
  if (first === undefined) {
    return fail(directory, `No ${PROJECT_EXTENSION} file found in ${directory}`);
  }

  return {
    ok: true,
    project: { documentPath: path.join(directory, first), directory, fileName: first },
    diagnostics: [info("project-located", `Using first tscproj file found: ${first}`)],
  };
}

function fail(target: string, message: string): LocateProjectResult {
  return { ok: false, error: new PathResolutionError(target, message) };
}
