/**
 * Error codes used by the monitor.
 * ConfigError is user-correctable and exits with code 2; the fatal runtime
 * errors exit with code 1. FetchError and DecodeError never abort a run.
 */
export type ErrorCode = "ConfigError" | "FetchError" | "DecodeError" | "StoreError" | "RenderError";

export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all monitor errors.
 *
 * @example
 * ```typescript
 * throw new StoreError("Cannot write state file", { cause: err, details: { path } });
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown> | string;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/** Missing or invalid settings. Raised before any fetch is attempted. */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("ConfigError", message, options);
  }
}

export type FetchFailure = "timeout" | "connection" | "http_status" | "tls";

/** The target could not be retrieved. Recovered into a FETCH_ERROR report. */
export class FetchError extends AppError {
  public readonly failure: FetchFailure;
  public readonly status?: number;

  constructor(failure: FetchFailure, message: string, options: AppErrorOptions & { status?: number } = {}) {
    super("FetchError", message, options);
    this.failure = failure;
    this.status = options.status;
  }
}

/** The response body could not be decoded to text. Handled like FetchError. */
export class DecodeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("DecodeError", message, options);
  }
}

/** The state file could not be written. Fatal. */
export class StoreError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("StoreError", message, options);
  }
}

/** The report artifacts could not be written. Fatal. */
export class RenderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("RenderError", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigError) return 2;
  return 1;
}
