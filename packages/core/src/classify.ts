import type { Decoder } from "./decoder.js";
import type { TransportResponse } from "./types.js";
import {
  BackendError,
  InternalError,
  StatusCodeError,
  TransportError,
  toError,
} from "./errors.js";
import {
  backendFailure,
  err,
  ok,
  success,
  transportFailure,
  type ResponseOutcome,
  type TransportResult,
} from "./outcome.js";

function isAcceptableStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Validates the status code and decodes the body as the success shape.
 * Non-2xx responses, undecodable bodies and decoders that throw become `Err`.
 */
export function decodeTransportResponse<T>(
  response: TransportResponse,
  decoder: Decoder<T>,
): TransportResult<T> {
  if (!isAcceptableStatus(response.status)) {
    return err(new StatusCodeError(response.status, response.statusText));
  }
  try {
    const decoded = decoder.decode(response.body ?? new Uint8Array());
    return decoded._tag === "Decoded" ? ok(decoded.value) : err(decoded.error);
  } catch (error: unknown) {
    return err(toError(error));
  }
}

/**
 * Turns a transport result into exactly one of Success, BackendFailure or
 * TransportFailure.
 *
 * On failure the body is tried against the backend error shape; when it fits the
 * outcome is a `BackendError` carrying the decoded payload, otherwise the
 * original failure is kept, unmodified, inside a `TransportError`. Successful
 * values are passed through as decoded by the transport. Never throws.
 */
export function classifyResponse<T, E>(
  body: Uint8Array | undefined,
  transportOutcome: TransportResult<T>,
  errorDecoder: Decoder<E>,
  status?: number,
): ResponseOutcome<T, E> {
  switch (transportOutcome._tag) {
    case "Ok":
      return success(transportOutcome.value);
    case "Err": {
      const payload = decodeBackendPayload(body, errorDecoder);
      if (payload !== undefined) {
        return backendFailure(new BackendError(payload.value, status));
      }
      return transportFailure(new TransportError(transportOutcome.error, status));
    }
    default:
      return transportFailure(
        new TransportError(
          new InternalError("Transport produced neither a value nor an error", transportOutcome),
          status,
        ),
      );
  }
}

function decodeBackendPayload<E>(
  body: Uint8Array | undefined,
  errorDecoder: Decoder<E>,
): { value: E } | undefined {
  if (body === undefined || body.byteLength === 0) return undefined;
  try {
    const decoded = errorDecoder.decode(body);
    return decoded._tag === "Decoded" ? { value: decoded.value } : undefined;
  } catch {
    // A throwing decoder is treated like a non-matching one.
    return undefined;
  }
}
