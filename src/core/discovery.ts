import path from "node:path";

import fg from "fast-glob";

import { PROJECT_EXTENSION, hasExtension } from "./config.js";
import { isFile } from "./inventory.js";
import { sortNames } from "./resolver.js";

/**
 * Project documents at or below `basePath`. A base path that is itself a
 * project document yields just that document.
 */
export async function discoverProjects(basePath: string): Promise<string[]> {
  if (hasExtension(basePath, PROJECT_EXTENSION) && (await isFile(basePath))) {
    return [basePath];
  }

  const matches = await fg(`**/*${PROJECT_EXTENSION}`, {
    cwd: basePath,
    onlyFiles: true,
    dot: true,
    caseSensitiveMatch: false,
    suppressErrors: true,
  });

  return sortNames(matches).map((relative) => path.join(basePath, relative));
}
