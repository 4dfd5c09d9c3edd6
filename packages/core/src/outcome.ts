import type { BackendError, TransportError } from "./errors.js";

// ============================================================================
// Transport result
// ============================================================================

/** The transport validated and decoded the response. */
export interface Ok<A> {
  readonly _tag: "Ok";
  readonly value: A;
}

/** The transport, status validation or decoding failed. */
export interface Err {
  readonly _tag: "Err";
  readonly error: Error;
}

/**
 * What the transport layer hands the classifier: either the decoded success
 * value or the error that stopped it.
 */
export type TransportResult<A> = Ok<A> | Err;

export function ok<A>(value: A): Ok<A> {
  return { _tag: "Ok", value };
}

export function err(error: Error): Err {
  return { _tag: "Err", error };
}

// ============================================================================
// Response outcome
// ============================================================================

export interface Success<T> {
  readonly _tag: "Success";
  readonly value: T;
}

export interface BackendFailure<E> {
  readonly _tag: "BackendFailure";
  readonly error: BackendError<E>;
}

export interface TransportFailure {
  readonly _tag: "TransportFailure";
  readonly error: TransportError;
}

/**
 * Classified result of one call. Exactly one variant is populated.
 *
 * @example
 * ```typescript
 * const outcome = await dispatcher.outcome(login);
 * switch (outcome._tag) {
 *   case "Success":
 *     return outcome.value.token;
 *   case "BackendFailure":
 *     return showMessage(outcome.error.payload.code);
 *   case "TransportFailure":
 *     return showMessage("Could not reach the server");
 * }
 * ```
 */
export type ResponseOutcome<T, E> = Success<T> | BackendFailure<E> | TransportFailure;

export function success<T>(value: T): Success<T> {
  return { _tag: "Success", value };
}

export function backendFailure<E>(error: BackendError<E>): BackendFailure<E> {
  return { _tag: "BackendFailure", error };
}

export function transportFailure(error: TransportError): TransportFailure {
  return { _tag: "TransportFailure", error };
}

export function isSuccess<T, E>(outcome: ResponseOutcome<T, E>): outcome is Success<T> {
  return outcome._tag === "Success";
}

/**
 * Pattern match on an outcome
 */
export function matchOutcome<T, E, R>(
  outcome: ResponseOutcome<T, E>,
  handlers: {
    success: (value: T) => R;
    backendError: (error: BackendError<E>) => R;
    transportError: (error: TransportError) => R;
  },
): R {
  switch (outcome._tag) {
    case "Success":
      return handlers.success(outcome.value);
    case "BackendFailure":
      return handlers.backendError(outcome.error);
    case "TransportFailure":
      return handlers.transportError(outcome.error);
  }
}

/**
 * Extract the value or throw the classified error
 *
 * @throws BackendError | TransportError
 */
export function unwrapOutcome<T, E>(outcome: ResponseOutcome<T, E>): T {
  if (outcome._tag === "Success") {
    return outcome.value;
  }
  throw outcome.error;
}
