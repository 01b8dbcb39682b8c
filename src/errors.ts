export enum ProfileErrorCode {
  PROFILE_NOT_FOUND = "PROFILE_NOT_FOUND",
  PROFILE_UNREADABLE = "PROFILE_UNREADABLE",
  PROFILE_MALFORMED = "PROFILE_MALFORMED",
  MISSING_FIELD = "MISSING_FIELD",
  INVALID_FIELD = "INVALID_FIELD",
  WRITE_FAILED = "WRITE_FAILED",
}

export class ProfileError extends Error {
  readonly code: ProfileErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ProfileErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ProfileError";
    this.code = code;
    this.context = context;
  }
}

export enum DeployErrorCode {
  MISSING_TOOL = "MISSING_TOOL",
  DOCKER_DOWN = "DOCKER_DOWN",
  COMMAND_FAILED = "COMMAND_FAILED",
  INVALID_USERNAME = "INVALID_USERNAME",
  ALREADY_BOUND = "ALREADY_BOUND",
  VALUES_NOT_FOUND = "VALUES_NOT_FOUND",
  VALUES_MALFORMED = "VALUES_MALFORMED",
  CANCELLED = "CANCELLED",
}

export class DeployError extends Error {
  readonly code: DeployErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: DeployErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "DeployError";
    this.code = code;
    this.context = context;
  }
}

/**
 * Error message for display, without the stack
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
