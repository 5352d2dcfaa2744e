export type DiagnosticSeverity = "info" | "error";

export type DiagnosticCode =
  | "project-located"
  | "project-scan"
  | "document-read-error"
  | "path-resolution-error"
  | "no-auxiliary-files"
  | "no-unused-files"
  | "unused-files-found"
  | "file-would-trash"
  | "file-trashing"
  | "file-trash-failed";

export type Diagnostic = {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  cause?: unknown;
};

export function info(code: DiagnosticCode, message: string): Diagnostic {
  return { severity: "info", code, message };
}

export function errorDiagnostic(code: DiagnosticCode, message: string, cause?: unknown): Diagnostic {
  const diagnostic: Diagnostic = { severity: "error", code, message };
  if (cause !== undefined) {
    diagnostic.cause = cause;
  }
  return diagnostic;
}
