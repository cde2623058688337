export type ErrorCode = "LAUNCH_FAILED" | "HANDOFF_ABANDONED" | "INVALID_CONFIG";

export class SounderError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The worker process could not be started. */
export class LaunchError extends SounderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("LAUNCH_FAILED", message, options);
  }
}

/** A clarifying round ended without answers reaching the worker. */
export class HandoffError extends SounderError {
  constructor(message: string) {
    super("HANDOFF_ABANDONED", message);
  }
}

export class ConfigError extends SounderError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
