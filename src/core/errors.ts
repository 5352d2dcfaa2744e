export class SweepError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SweepError";
  }
}

export class ConfigError extends SweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DocumentReadError extends SweepError {
  constructor(
    public readonly documentPath: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "DocumentReadError";
  }
}

export class PathResolutionError extends SweepError {
  constructor(
    public readonly targetPath: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "PathResolutionError";
  }
}

export class DeletionError extends SweepError {
  constructor(
    public readonly filePath: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "DeletionError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  usage: "USAGE_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.cause = input.cause;
  }
}
