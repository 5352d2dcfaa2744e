/*
Purpose: turn thrown values into ordered, typed lines for terminal or log output.
Assumptions: UserFacingError carries a title and hint; everything else is rendered from its message.
Usage: formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(useColor).
*/

import { USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const UNKNOWN_ERROR_TITLE = "Unexpected error.";

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
  } else {
    lines.push({ kind: "title", text: UNKNOWN_ERROR_TITLE });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (mode === "short") {
    return lines;
  }

  const code =
    error instanceof UserFacingError ? error.code : USER_FACING_ERROR_CODES.unknown;
  lines.push({ kind: "code", text: code });

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
  env?: NodeJS.ProcessEnv;
}): boolean {
  if (!options.stream?.isTTY) {
    return false;
  }

  const env = options.env ?? process.env;
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") {
    return false;
  }

  return options.useColor ?? true;
}

export function createAnsiFormatter(useColor: boolean): AnsiFormatter {
  if (!useColor) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveCause(error: unknown): unknown {
  if (error && typeof error === "object" && "cause" in error) {
    return error.cause;
  }
  return undefined;
}
