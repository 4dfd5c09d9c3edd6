// Dispatcher factory
export { createDispatcher } from "./client.js";
export type { KyDispatcherOptions, KyDispatcher, KyInstance, KyOptions, KyResponse } from "./client.js";

// Transport
export { KyTransport } from "./transport.js";
export type { KyTransportOptions } from "./transport.js";

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
