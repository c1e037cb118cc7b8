export enum ProfileErrorCode {
  FRAGMENT_NOT_FOUND = "FRAGMENT_NOT_FOUND",
  FRAGMENT_CYCLE = "FRAGMENT_CYCLE",
  DUPLICATE_FRAGMENT = "DUPLICATE_FRAGMENT",
  INVALID_TOOL_NAME = "INVALID_TOOL_NAME",
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
