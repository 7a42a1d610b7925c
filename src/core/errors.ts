export class HarnessError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "HarnessError";
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class StorageError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "StorageError";
  }
}

export class NotFoundError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "NotFoundError";
  }
}

// A (task, session) row already exists. Only reachable when two drivers write the same
// session concurrently, which is unsupported.
export class DuplicateKeyError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DuplicateKeyError";
  }
}

export class JudgeSpawnError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "JudgeSpawnError";
  }
}

export class ProcessSpawnError extends HarnessError {
  constructor(
    message: string,
    cause?: unknown,
    /** System error code from the failed spawn, e.g. ENOENT. */
    public readonly code?: string,
  ) {
    super(message, cause);
    this.name = "ProcessSpawnError";
  }
}

export class BatchStoppedError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "BatchStoppedError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  storage: "STORAGE_ERROR",
  notFound: "NOT_FOUND",
  judge: "JUDGE_ERROR",
  process: "PROCESS_ERROR",
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
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

export function resolveUserFacingErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) return error.code;
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof NotFoundError) return USER_FACING_ERROR_CODES.notFound;
  if (error instanceof StorageError || error instanceof DuplicateKeyError) {
    return USER_FACING_ERROR_CODES.storage;
  }
  if (error instanceof JudgeSpawnError) return USER_FACING_ERROR_CODES.judge;
  if (error instanceof ProcessSpawnError) return USER_FACING_ERROR_CODES.process;
  return USER_FACING_ERROR_CODES.unknown;
}
