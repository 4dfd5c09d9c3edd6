// Dispatcher factory
export { createDispatcher } from "./client.js";
export type { FetchDispatcherOptions, FetchDispatcher } from "./client.js";

// Transport
export { FetchTransport } from "./transport.js";
export type { FetchTransportOptions } from "./transport.js";

// Re-export core
export {
  RequestDispatcher,
  RequestDescriptor,
  defineRequest,
  jsonDecoder,
  FileExtension,
  BackendError,
  TransportError,
  NetworkError,
  TimeoutError,
  StatusCodeError,
  DecodingError,
  isBackendError,
  isTransportError,
  matchOutcome,
} from "@typed-request/core";

export type {
  ApiRequest,
  CallOptions,
  Decoder,
  DispatchError,
  HttpMethod,
  Logger,
  MultipartFieldValue,
  MultipartFields,
  Parameters,
  ResponseOutcome,
} from "@typed-request/core";
