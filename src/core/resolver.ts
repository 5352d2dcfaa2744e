import {
  AUXILIARY_EXTENSION,
  KEPT_EXTENSIONS,
  hasExtension,
  type CleanupMode,
} from "./config.js";
import type { ReferenceSets } from "./references.js";

export type ResolveDeletionSetInput = {
  inventory: Iterable<string>;
  references: ReferenceSets;
  projectFileName: string;
  mode: CleanupMode;
};

export type UsedFile = {
  name: string;
  present: boolean;
};

export function resolveDeletionSet(input: ResolveDeletionSetInput): string[] {
  const { references, projectFileName, mode } = input;
  const deletions = new Set<string>();

  for (const name of input.inventory) {
    if (name === projectFileName) continue;

    if (mode === "typed-only") {
      if (hasExtension(name, AUXILIARY_EXTENSION) && !references.typed.has(name)) {
        deletions.add(name);
      }
      continue;
    }

    if (references.all.has(name)) continue;
    if (KEPT_EXTENSIONS.some((ext) => hasExtension(name, ext))) continue;
    deletions.add(name);
  }

  return sortNames(deletions);
}

/**
 * Every name the project keeps, including the project document itself.
 * `exists` decides presence: a reference may point into a sub-folder or
 * elsewhere on disk.
 */
export async function listUsedFiles(
  references: ReferenceSets,
  projectFileName: string,
  exists: (name: string) => Promise<boolean>,
): Promise<UsedFile[]> {
  const used = new Set(references.all);
  used.add(projectFileName);

  const listed: UsedFile[] = [];
  for (const name of sortNames(used)) {
    listed.push({ name, present: await exists(name) });
  }
  return listed;
}

export function countAuxiliaryFiles(inventory: Iterable<string>): number {
  let count = 0;
  for (const name of inventory) {
    if (hasExtension(name, AUXILIARY_EXTENSION)) count += 1;
  }
  return count;
}

export function sortNames(names: Iterable<string>): string[] {
  return [...names].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
