/**
 * Error taxonomy shared by every component.
 *
 * - `ValidationError`: malformed input, rejected before anything is stored
 * - `NotFoundError`: the requested entity does not exist
 * - `TransientError`: an external dependency failed or timed out; retryable
 * - `IntegrityError`: a write violated a store constraint
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "invalid", false, context);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "not_found", false, context);
    this.name = "NotFoundError";
  }
}

export class TransientError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "transient", true, context);
    this.name = "TransientError";
  }
}

export class IntegrityError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "integrity", false, context);
    this.name = "IntegrityError";
  }
}

export type QueryErrorKind = "not_found" | "transient" | "invalid";

export interface QueryError {
  readonly kind: QueryErrorKind;
  readonly message: string;
}

export type Result<T> =
  | { readonly ok: true; readonly data: T }
  | { readonly ok: false; readonly error: QueryError };

export function ok<T>(data: T): Result<T> {
  return { ok: true, data };
}

export function fail<T>(kind: QueryErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

const TRANSIENT_SQLITE_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_IOERR"]);

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Classifies any thrown value into one of the three query error kinds. */
export function toQueryError(err: unknown): QueryError {
  if (err instanceof ValidationError) return { kind: "invalid", message: err.message };
  if (err instanceof NotFoundError) return { kind: "not_found", message: err.message };
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    const code = err.code;
    if ([...TRANSIENT_SQLITE_CODES].some((c) => code.startsWith(c))) {
      return { kind: "transient", message: err.message };
    }
  }
  return { kind: "transient", message: errorMessage(err) };
}

export function isTransient(err: unknown): boolean {
  return err instanceof TransientError;
}
