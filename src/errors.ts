export type ErrorCode =
  | "validation"
  | "auth"
  | "not_found"
  | "conflict"
  | "forbidden"
  | "transient"
  | "retry_exhausted"
  | "tag_budget_exceeded"
  | "naming_collision"
  | "cancelled"
  | "backend"
  | "config";

export class KvaultError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** Bad name, oversized metadata, disallowed characters. Never retried. */
export class ValidationError extends KvaultError {
  constructor(message: string) {
    super("validation", message);
  }
}

export class AuthError extends KvaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("auth", message, options);
  }
}

export class NotFoundError extends KvaultError {
  constructor(message: string) {
    super("not_found", message);
  }
}

export class ConflictError extends KvaultError {
  constructor(message: string) {
    super("conflict", message);
  }
}

export class ForbiddenError extends KvaultError {
  constructor(message: string) {
    super("forbidden", message);
  }
}

/** Overload, throttling or a transport failure. */
export class TransientBackendError extends KvaultError {
  readonly status: number | undefined;
  /** Server-suggested wait in milliseconds, from a Retry-After header. */
  readonly retryAfterMs: number | undefined;
  /**
   * True when the request may have been processed before the failure
   * (connection reset, timeout after send).
   */
  readonly outcomeUnknown: boolean;

  constructor(
    message: string,
    details: {
      status?: number;
      retryAfterMs?: number;
      outcomeUnknown?: boolean;
      cause?: unknown;
    } = {}
  ) {
    super("transient", message, { cause: details.cause });
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
    this.outcomeUnknown = details.outcomeUnknown ?? false;
  }
}

export class RetryExhaustedError extends KvaultError {
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    super(
      "retry_exhausted",
      `${operation} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${errorMessage(cause)}`,
      { cause }
    );
    this.attempts = attempts;
  }
}

export class TagBudgetExceededError extends KvaultError {
  readonly slotCount: number;
  readonly limit: number;

  constructor(slotCount: number, limit: number) {
    super(
      "tag_budget_exceeded",
      `Secret metadata needs ${slotCount} tag slots but the backend allows ${limit}`
    );
    this.slotCount = slotCount;
    this.limit = limit;
  }
}

export class NamingCollisionError extends KvaultError {
  readonly requestedName: string;
  readonly storedName: string;
  readonly backendId: string;

  constructor(requestedName: string, storedName: string, backendId: string) {
    super(
      "naming_collision",
      `Secret "${requestedName}" maps to "${backendId}", which already holds "${storedName}"`
    );
    this.requestedName = requestedName;
    this.storedName = storedName;
    this.backendId = backendId;
  }
}

export class CancelledError extends KvaultError {
  constructor(message = "Operation cancelled", options?: { cause?: unknown }) {
    super("cancelled", message, options);
  }
}

/** A backend failure outside the other categories, e.g. an unreadable response. */
export class BackendError extends KvaultError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super("backend", message, options);
    this.status = status;
  }
}

export class ConfigError extends KvaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
  }
}

export function isRetryable(err: unknown): err is TransientBackendError {
  return err instanceof TransientBackendError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Throws a CancelledError when the signal has fired. */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError("Operation cancelled", { cause: signal.reason });
  }
}
