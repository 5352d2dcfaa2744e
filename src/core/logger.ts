import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type SweepEventType =
  | "project.scan"
  | "project.skipped"
  | "document.read_error"
  | "file.would_trash"
  | "file.trashed"
  | "file.trash_failed"
  | "sweep.complete";

export type LogEvent = {
  ts: string;
  type: SweepEventType;
  project?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: SweepEventType;
  project?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type EventLogger = {
  log(event: LogEventInput): void;
};

export type JsonlLoggerOptions = {
  debug?: boolean;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    options: JsonlLoggerOptions = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = options.debug ?? false;
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

export const noopLogger: EventLogger = {
  log: () => undefined,
};

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput): LogEvent {
  const { project, payload, ts, type } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : new Date().toISOString();

  const result: LogEvent = { ts: normalizedTs, type };

  if (project) {
    result.project = project;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}
