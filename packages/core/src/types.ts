// ============================================================================
// Parameters
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export type ParameterScalar = string | number | boolean | null;

export type ParameterValue =
  | ParameterScalar
  | ParameterValue[]
  | { [key: string]: ParameterValue };

export type Parameters = Record<string, ParameterValue>;

/**
 * Where the effective parameters of a request go.
 * - `queryString`: appended to the URL
 * - `httpBody`: sent as an `application/x-www-form-urlencoded` body
 */
export type ParameterEncoding = "queryString" | "httpBody";

// ============================================================================
// Multipart
// ============================================================================

/**
 * The subset of `FormData` the multipart builder writes to.
 * Native `FormData` satisfies it.
 */
export interface MultipartFormSink {
  append(name: string, value: string): void;
  append(name: string, value: Blob, fileName?: string): void;
}

// ============================================================================
// Transport
// ============================================================================

interface BaseTransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  /** Milliseconds; no timeout when undefined */
  timeout?: number;
}

export interface ExecuteRequest extends BaseTransportRequest {
  parameters: Parameters;
  encoding: ParameterEncoding;
}

export interface UploadRequest extends BaseTransportRequest {
  /** Fills the multipart body. Called once by the transport. */
  build: (form: MultipartFormSink) => void;
}

export interface TransportResponse<TRaw = unknown> {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  /** Undefined when the response carried no body at all */
  body: Uint8Array | undefined;
  raw: TRaw;
}

/**
 * Issues HTTP requests on behalf of the dispatcher.
 *
 * Implementations resolve with whatever response arrived, whatever its status,
 * and reject only when no response was obtained, with a `NetworkError` or a
 * `TimeoutError`.
 */
export interface HttpTransport<TRaw = unknown> {
  execute(request: ExecuteRequest, signal?: AbortSignal): Promise<TransportResponse<TRaw>>;
  upload(request: UploadRequest, signal?: AbortSignal): Promise<TransportResponse<TRaw>>;
}
