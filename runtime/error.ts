import {
  ConfigurationError,
  describeError,
  STORAGE_ERROR_CODES,
  StorageError,
} from "../src/core/errors/errors";

export const RUNTIME_ERROR_CODES = Object.freeze({
  USAGE_ERROR: "USAGE_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  STORAGE_UNAVAILABLE: "STORAGE_UNAVAILABLE",
  STORAGE_REJECTED: "STORAGE_REJECTED",
  RUNTIME_FAILED: "RUNTIME_FAILED",
} as const);

export type RuntimeErrorCode = (typeof RUNTIME_ERROR_CODES)[keyof typeof RUNTIME_ERROR_CODES];

export class RuntimeError extends Error {
  readonly errorCode: RuntimeErrorCode;
  readonly guideMessage: string;

  constructor(
    message: string,
    input: {
      readonly errorCode: RuntimeErrorCode;
      readonly guideMessage: string;
      readonly cause?: unknown;
    }
  ) {
    super(message);
    this.name = "RuntimeError";
    this.errorCode = input.errorCode;
    this.guideMessage = input.guideMessage;
    if ("cause" in input) {
      this.cause = input.cause;
    }
  }
}

export function createUsageError(message: string, usage: string): RuntimeError {
  return new RuntimeError(`USAGE_ERROR ${message}`, {
    errorCode: RUNTIME_ERROR_CODES.USAGE_ERROR,
    guideMessage: usage,
  });
}

export function toRuntimeError(error: unknown): RuntimeError {
  if (error instanceof RuntimeError) {
    return error;
  }

  const message = describeError(error);
  if (error instanceof ConfigurationError) {
    return new RuntimeError(message, {
      errorCode: RUNTIME_ERROR_CODES.CONFIGURATION_ERROR,
      guideMessage: "check BEAUTY_STANDARD_EMBEDDING* and AGENT_STATE_* variables",
      cause: error,
    });
  }

  if (error instanceof StorageError) {
    const unavailable = error.code === STORAGE_ERROR_CODES.STORAGE_UNAVAILABLE;
    return new RuntimeError(message, {
      errorCode: unavailable
        ? RUNTIME_ERROR_CODES.STORAGE_UNAVAILABLE
        : RUNTIME_ERROR_CODES.STORAGE_REJECTED,
      guideMessage: unavailable
        ? "verify the database path is reachable and writable"
        : "fix the input or the target path and retry",
      cause: error,
    });
  }

  return new RuntimeError(message, {
    errorCode: RUNTIME_ERROR_CODES.RUNTIME_FAILED,
    guideMessage: "unexpected failure; rerun with the same arguments after checking logs",
    cause: error,
  });
}
