/**
 * Restore error taxonomy.
 *
 * Every component throws one of these; the runner and the CLI turn them
 * into outcomes and exit codes.
 */

export type RestoreErrorKind =
  | "validation"
  | "not-found"
  | "api"
  | "auth"
  | "task-failed"
  | "too-many-results";

export abstract class RestoreError extends Error {
  abstract readonly kind: RestoreErrorKind;
}

/**
 * Malformed or missing input, detected before any network call
 */
export class ValidationError extends RestoreError {
  readonly kind = "validation";

  constructor(message: string, public field?: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * No matching environment, bucket, protection group or asset
 */
export class NotFoundError extends RestoreError {
  readonly kind = "not-found";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/**
 * The backup service answered with a non-success status
 */
export class ApiError extends RestoreError {
  readonly kind = "api";

  constructor(
    message: string,
    public statusCode: number,
    public reason: string,
    public content: string,
    public retryAfterSeconds?: number,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

/**
 * Credentials were missing or rejected
 */
export class AuthError extends RestoreError {
  readonly kind = "auth";

  constructor(message: string, public statusCode?: number) {
    super(message);
    this.name = "AuthError";
  }
}

/**
 * A restore task ended in a failed or aborted state
 */
export class TaskFailedError extends RestoreError {
  readonly kind = "task-failed";

  constructor(public taskId: string, public status: string) {
    super(`Task ${taskId} failed with status ${status}`);
    this.name = "TaskFailedError";
  }
}

/**
 * Discovery matched more records than the configured ceiling
 */
export class TooManyResultsError extends RestoreError {
  readonly kind = "too-many-results";

  constructor(public count: number, public maxResults: number) {
    super(`Found ${count} backup records, more than the maximum of ${maxResults}`);
    this.name = "TooManyResultsError";
  }
}

export function isRestoreError(err: unknown): err is RestoreError {
  return err instanceof RestoreError;
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}
