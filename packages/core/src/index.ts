// Dispatcher
export { RequestDispatcher } from "./dispatcher.js";
export type { DispatcherOptions, CallOptions } from "./dispatcher.js";

// Requests
export { RequestDescriptor } from "./descriptor.js";
export type { RequestDescriptorInit, RequestSnapshot } from "./descriptor.js";
export { defineRequest } from "./request.js";
export type {
  ApiRequest,
  DefineRequestOptions,
  InferResponse,
  InferBackendError,
} from "./request.js";

// Decoding & classification
export { jsonDecoder } from "./decoder.js";
export type { Decoder, DecodeResult, Decoded, DecodeFailed, InferDecoded } from "./decoder.js";
export { classifyResponse, decodeTransportResponse } from "./classify.js";
export {
  ok,
  err,
  success,
  backendFailure,
  transportFailure,
  isSuccess,
  matchOutcome,
  unwrapOutcome,
} from "./outcome.js";
export type {
  Ok,
  Err,
  TransportResult,
  Success,
  BackendFailure,
  TransportFailure,
  ResponseOutcome,
} from "./outcome.js";

// Multipart
export {
  FileExtension,
  appendMultipartFields,
  buildMultipartBody,
  mimeTypeOf,
} from "./multipart.js";
export type { FileKind, MultipartFieldValue, MultipartFields } from "./multipart.js";

// Encoding
export { toEncodedPairs, encodeFormBody, appendQuery } from "./url-encoding.js";

// Registry
export { PendingCallRegistry } from "./registry.js";

// Errors
export {
  TypedRequestError,
  BackendError,
  TransportError,
  NetworkError,
  TimeoutError,
  StatusCodeError,
  DecodingError,
  InternalError,
  ConfigurationError,
  isBackendError,
  isTransportError,
  toError,
} from "./errors.js";
export type { DispatchError } from "./errors.js";

// Logging
export { noopLogger } from "./logger.js";
export type { Logger, LogContext } from "./logger.js";

// Configuration
export { dispatcherConfigSchema, resolveDispatcherConfig } from "./config.js";
export type { DispatcherConfigInput, ResolvedDispatcherConfig } from "./config.js";

// Telemetry
export { initTelemetry, isTelemetryLoaded, resolveTelemetryConfig } from "./telemetry.js";
export type { TelemetryConfig, TelemetryOption, ResolvedTelemetryConfig } from "./telemetry.js";

// Types
export type {
  HttpMethod,
  ParameterScalar,
  ParameterValue,
  Parameters,
  ParameterEncoding,
  MultipartFormSink,
  ExecuteRequest,
  UploadRequest,
  TransportResponse,
  HttpTransport,
} from "./types.js";
