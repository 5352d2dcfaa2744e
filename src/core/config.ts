import { z, type ZodIssue } from "zod";

import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// FILE TYPES
// =============================================================================

export const AUXILIARY_EXTENSION = ".trec";
export const PROJECT_EXTENSION = ".tscproj";

// Never offered for deletion in all-unused mode, referenced or not.
export const KEPT_EXTENSIONS: readonly string[] = [".json", PROJECT_EXTENSION];

export function hasExtension(fileName: string, extension: string): boolean {
  return fileName.toLowerCase().endsWith(extension.toLowerCase());
}

// =============================================================================
// RUN OPTIONS
// =============================================================================

export const CleanupModeSchema = z.enum(["typed-only", "all-unused"]);
export type CleanupMode = z.infer<typeof CleanupModeSchema>;

export const CleanupOptionsSchema = z
  .object({
    // Not trimmed: spaces at either end are part of the name.
    path: z
      .string()
      .refine((value) => value.trim().length > 0, "A project file or directory path is required"),
    mode: CleanupModeSchema.default("typed-only"),
    dryRun: z.boolean().default(true),
    listUsed: z.boolean().default(false),
    recursive: z.boolean().default(false),
    logFile: z.string().min(1).optional(),
    debug: z.boolean().default(false),
    color: z.boolean().default(true),
  })
  .strict();

export type CleanupOptions = z.infer<typeof CleanupOptionsSchema>;
export type CleanupOptionsInput = z.input<typeof CleanupOptionsSchema>;

const INVALID_OPTIONS_HINT = "Run `trec-sweep --help` to see the supported options.";

export function parseCleanupOptions(raw: unknown): CleanupOptions {
  const parsed = CleanupOptionsSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  const details = formatIssues(parsed.error.issues);
  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid options.",
    message: details,
    hint: INVALID_OPTIONS_HINT,
    cause: new ConfigError(`Invalid options:\n${details}`),
  });
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}
