import type { z } from "zod";

/**
 * Base class for every error raised by typed-request.
 * Subclasses carry a literal `_tag` so callers can switch on it exhaustively.
 */
export abstract class TypedRequestError extends Error {
  abstract readonly _tag: string;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "TypedRequestError";
  }
}

// ============================================================================
// Transport-level errors
// ============================================================================

/**
 * The request never produced a response (DNS, refused connection, reset socket...).
 */
export class NetworkError extends TypedRequestError {
  readonly _tag = "NetworkError" as const;

  constructor(
    public readonly url: string,
    public readonly method: string,
    cause?: unknown,
  ) {
    super(`Network error: ${cause instanceof Error ? cause.message : String(cause)}`, cause);
    this.name = "NetworkError";
  }
}

/**
 * The request did not complete within the configured timeout.
 */
export class TimeoutError extends TypedRequestError {
  readonly _tag = "TimeoutError" as const;

  constructor(
    public readonly timeout: number,
    public readonly url: string,
    public readonly method: string,
    cause?: unknown,
  ) {
    super(`Request timed out after ${timeout}ms`, cause);
    this.name = "TimeoutError";
  }
}

/**
 * The response status is outside the 2xx range.
 */
export class StatusCodeError extends TypedRequestError {
  readonly _tag = "StatusCodeError" as const;

  constructor(
    public readonly status: number,
    public readonly statusText: string,
  ) {
    super(`Response status code was unacceptable: ${status}${statusText ? ` ${statusText}` : ""}`);
    this.name = "StatusCodeError";
  }
}

/**
 * The response body could not be decoded into the declared shape.
 */
export class DecodingError extends TypedRequestError {
  readonly _tag = "DecodingError" as const;

  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = [],
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "DecodingError";
  }
}

/**
 * An outcome that should be impossible was observed.
 */
export class InternalError extends TypedRequestError {
  readonly _tag = "InternalError" as const;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InternalError";
  }
}

/**
 * Dispatcher options failed validation.
 */
export class ConfigurationError extends TypedRequestError {
  readonly _tag = "ConfigurationError" as const;

  constructor(
    message: string,
    public readonly issues: z.ZodIssue[],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

// ============================================================================
// Classified errors
// ============================================================================

/**
 * The server answered with a failure whose body decoded into the request's
 * declared backend error shape.
 */
export class BackendError<E = unknown> extends TypedRequestError {
  readonly _tag = "BackendError" as const;

  constructor(
    public readonly payload: E,
    public readonly status: number | undefined,
  ) {
    super(describeBackendPayload(payload, status));
    this.name = "BackendError";
  }
}

/**
 * Any failure where no backend error payload could be recovered.
 * The lower-level error is kept untouched in `cause`.
 */
export class TransportError extends TypedRequestError {
  readonly _tag = "TransportError" as const;

  constructor(
    public readonly cause: Error,
    public readonly status?: number,
  ) {
    super(cause.message, cause);
    this.name = "TransportError";
  }
}

/** What `send` rejects with and what `subscribe`/`observe` deliver as errors. */
export type DispatchError<E> = BackendError<E> | TransportError;

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Coerces whatever a transport rejected with into an Error, without touching
 * values that already are one.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new InternalError(`Non-error value thrown: ${String(value)}`, value);
}

function describeBackendPayload(payload: unknown, status: number | undefined): string {
  if (payload !== null && typeof payload === "object") {
    for (const key of ["message", "localizedDescription", "error", "code"]) {
      const value: unknown = Reflect.get(payload, key);
      if (typeof value === "string" && value.length > 0) return value;
    }
  }
  return status === undefined ? "Backend error" : `Backend error (status ${status})`;
}
