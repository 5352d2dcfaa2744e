/*
Purpose: render thrown errors and per-project diagnostics for the terminal.
Assumptions: stderr is the default stream; non-TTY output and NO_COLOR disable color.
Usage: console.error(renderCliError(err, { debug })); console.log(renderDiagnostic(d, format));
*/

import type { Diagnostic } from "../core/diagnostics.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = formatErrorLines(error, { mode });

  const stream = options.stream ?? process.stderr;
  const useColor = resolveColorEnabled({ stream, useColor: options.useColor });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

export function createCliFormatter(
  options: Pick<CliErrorFormatOptions, "useColor" | "stream"> = {},
): AnsiFormatter {
  const stream = options.stream ?? process.stdout;
  return createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
}

export function renderDiagnostic(diagnostic: Diagnostic, format: AnsiFormatter): string {
  return diagnostic.severity === "error" ? format(diagnostic.message, ["red"]) : diagnostic.message;
}

// =============================================================================
// INTERNALS
// =============================================================================

// Debug-only lines share one dim "Label: value" layout.
const DETAIL_LABELS: Partial<Record<ErrorFormatLine["kind"], string>> = {
  code: "Code:",
  name: "Name:",
  cause: "Cause:",
};

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "hint") {
    return `${format("Hint:", ["yellow"])} ${line.text}`;
  }
  if (line.kind === "stack") {
    const indented = line.text.replace(/^/gm, "  ");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const label = DETAIL_LABELS[line.kind];
  return label ? `${format(label, ["dim"])} ${format(line.text, ["dim"])}` : line.text;
}
