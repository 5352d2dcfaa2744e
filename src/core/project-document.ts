import fse from "fs-extra";
import { z } from "zod";

import { formatErrorMessage } from "./error-format.js";
import { DocumentReadError } from "./errors.js";

// =============================================================================
// SCHEMA
//
// Only the fields the reference pass reads are modelled. Each one decodes to
// "absent" (or an empty list) when it is missing or has the wrong shape, so a
// malformed entry drops out instead of failing the whole document.
// =============================================================================

function lenientArray<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((values) => {
      const parsed: z.output<T>[] = [];
      for (const value of values) {
        const result = item.safeParse(value);
        if (result.success) {
          parsed.push(result.data);
        }
      }
      return parsed;
    });
}

export const TrackEntrySchema = z.object({
  metaData: z.string().optional().catch(undefined),
});
export type TrackEntry = z.infer<typeof TrackEntrySchema>;

export const SourceEntrySchema = z.object({
  src: z.string().optional().catch(undefined),
  sourceTracks: lenientArray(TrackEntrySchema),
});
export type SourceEntry = z.infer<typeof SourceEntrySchema>;

export const ProjectDocumentSchema = z.object({
  sourceBin: lenientArray(SourceEntrySchema),
});
export type ProjectDocument = z.infer<typeof ProjectDocumentSchema>;

const EMPTY_DOCUMENT: ProjectDocument = { sourceBin: [] };

export function parseProjectDocument(raw: unknown): ProjectDocument {
  const parsed = ProjectDocumentSchema.safeParse(raw);
  return parsed.success ? parsed.data : EMPTY_DOCUMENT;
}

// =============================================================================
// READING
// =============================================================================

export type ReadProjectDocumentResult =
  | { ok: true; document: ProjectDocument }
  | { ok: false; error: DocumentReadError };

const UTF8_BOM = "\uFEFF";

export async function readProjectDocument(documentPath: string): Promise<ReadProjectDocumentResult> {
  let raw: string;
  try {
    raw = await fse.readFile(documentPath, "utf8");
  } catch (err) {
    return {
      ok: false,
      error: new DocumentReadError(documentPath, `Failed to read file: ${formatErrorMessage(err)}`, err),
    };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw.startsWith(UTF8_BOM) ? raw.slice(UTF8_BOM.length) : raw);
  } catch (err) {
    return {
      ok: false,
      error: new DocumentReadError(documentPath, `Invalid JSON: ${formatErrorMessage(err)}`, err),
    };
  }

  return { ok: true, document: parseProjectDocument(json) };
}
