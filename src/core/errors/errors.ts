export const STORAGE_ERROR_CODES = Object.freeze({
  STORAGE_UNAVAILABLE: "STORAGE_UNAVAILABLE",
  STORAGE_INVALID_INPUT: "STORAGE_INVALID_INPUT",
  STORAGE_VERSION_MISMATCH: "STORAGE_VERSION_MISMATCH",
  STORAGE_SCHEMA_CORRUPTED: "STORAGE_SCHEMA_CORRUPTED",
  STORAGE_READONLY_WRITE_BLOCKED: "STORAGE_READONLY_WRITE_BLOCKED",
  STORAGE_WRITE_FAILED: "STORAGE_WRITE_FAILED",
} as const);

export type StorageErrorCode = (typeof STORAGE_ERROR_CODES)[keyof typeof STORAGE_ERROR_CODES];

interface ErrorOptions {
  readonly cause?: unknown;
}

function attachCause(error: Error, options?: ErrorOptions): void {
  if (options && "cause" in options) {
    error.cause = options.cause;
  }
}

/** Invalid caller input or invalid runtime configuration. */
export class ConfigurationError extends Error {
  readonly kind = "ConfigurationError";

  constructor(message: string, options?: ErrorOptions) {
    super(message);
    this.name = "ConfigurationError";
    attachCause(this, options);
  }
}

/**
 * Raised by both persistence paths (embedding file writes and the agent
 * state table). The message always starts with the code so log lines stay
 * greppable.
 */
export class StorageError extends Error {
  readonly kind = "StorageError";
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, detail: string, options?: ErrorOptions) {
    super(`${code} ${detail}`);
    this.name = "StorageError";
    this.code = code;
    attachCause(this, options);
  }
}

export class StateSyncError extends Error {
  readonly kind = "StateSyncError";

  constructor(message: string, options?: ErrorOptions) {
    super(message);
    this.name = "StateSyncError";
    attachCause(this, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
