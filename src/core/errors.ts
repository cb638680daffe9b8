export class CacheRefreshError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CacheRefreshError";
  }
}

export class ConfigError extends CacheRefreshError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class LockError extends CacheRefreshError {
  constructor(
    message: string,
    public readonly lockPath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "LockError";
  }
}

export class NotifyError extends CacheRefreshError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "NotifyError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  lock: "LOCK_ERROR",
  unknown: "UNKNOWN_ERROR",
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
  readonly exitCode?: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.exitCode = input.exitCode;
  }
}

export function getErrorCode(error: unknown): string | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }

  if (!("code" in error)) {
    return undefined;
  }

  return typeof error.code === "string" ? error.code : undefined;
}
