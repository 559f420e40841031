export class ReleaseGateError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ReleaseGateError";
  }
}

export class ConfigError extends ReleaseGateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends ReleaseGateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class VersionError extends ReleaseGateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "VersionError";
  }
}

export class TagHelperError extends ReleaseGateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TagHelperError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  version: "VERSION_ERROR",
  precondition: "PRECONDITION_ERROR",
  tagging: "TAGGING_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;
  readonly exitCode: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
    this.exitCode = input.exitCode ?? 1;
  }
}
