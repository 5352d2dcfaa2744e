import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import { sortNames } from "./resolver.js";

const MISSING_TARGET_CODES = new Set(["ENOENT", "ENOTDIR", "ELOOP"]);

/**
 * Plain files directly inside `directory`, sorted. Symlinks count when they
 * point at a file; dangling ones are left out.
 */
export async function listDirectoryFiles(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const names: string[] = [];

  for (const entry of entries) {
    if (entry.isFile()) {
      names.push(entry.name);
    } else if (entry.isSymbolicLink() && (await isFile(path.join(directory, entry.name)))) {
      names.push(entry.name);
    }
  }

  return sortNames(names);
}

export async function isFile(target: string): Promise<boolean> {
  const stats = await statOrNull(target);
  return stats?.isFile() ?? false;
}

export async function isDirectory(target: string): Promise<boolean> {
  const stats = await statOrNull(target);
  return stats?.isDirectory() ?? false;
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (err) {
    if (isMissingTargetError(err)) return null;
    throw err;
  }
}

function isMissingTargetError(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    MISSING_TARGET_CODES.has(err.code)
  );
}
