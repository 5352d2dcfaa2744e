import { AUXILIARY_EXTENSION, hasExtension } from "./config.js";
import type { ProjectDocument } from "./project-document.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReferenceSets = {
  /** Referenced names carrying the auxiliary recording extension. Always a subset of `all`. */
  typed: ReadonlySet<string>;
  all: ReadonlySet<string>;
};

export const EMPTY_REFERENCES: ReferenceSets = {
  typed: new Set<string>(),
  all: new Set<string>(),
};

// =============================================================================
// EXTRACTION
// =============================================================================

export function extractReferences(document: ProjectDocument): ReferenceSets {
  const typed = new Set<string>();
  const all = new Set<string>();

  const add = (name: string): void => {
    all.add(name);
    if (hasExtension(name, AUXILIARY_EXTENSION)) {
      typed.add(name);
    }
  };

  for (const source of document.sourceBin) {
    if (source.src !== undefined) {
      add(source.src);
    }

    for (const track of source.sourceTracks) {
      if (track.metaData === undefined || !track.metaData.includes(";")) continue;
      for (const name of splitMetadataNames(track.metaData)) {
        add(name);
      }
    }
  }

  return { typed, all };
}

/**
 * Track metadata may hold a `;`-separated list of recording file names.
 * Pieces are trimmed and empty ones dropped.
 */
export function splitMetadataNames(metadata: string): string[] {
  return metadata
    .split(";")
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0);
}
