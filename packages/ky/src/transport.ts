import ky, { type KyInstance, type Options as KyOptions, type KyResponse } from "ky";
import type {
  ExecuteRequest,
  HttpTransport,
  TransportResponse,
  UploadRequest,
} from "@typed-request/core";
import {
  NetworkError,
  TimeoutError,
  appendQuery,
  encodeFormBody,
} from "@typed-request/core";

export interface KyTransportOptions {
  /**
   * Use a custom ky instance.
   * Useful for pre-configured ky instances with hooks, defaults, etc.
   */
  ky?: KyInstance;
  /**
   * Additional ky options to pass to every request.
   * These are merged with the request-specific options.
   */
  kyOptions?: Omit<
    KyOptions,
    "method" | "headers" | "body" | "timeout" | "signal" | "retry" | "throwHttpErrors"
  >;
}

const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded; charset=utf-8";

/**
 * HTTP transport using the ky library.
 * ky's own retries and HTTP error throwing are switched off; status handling
 * belongs to the dispatcher.
 */
export class KyTransport implements HttpTransport<KyResponse> {
  private readonly kyInstance: KyInstance;
  private readonly kyOptions: KyTransportOptions["kyOptions"];

  constructor(options: KyTransportOptions = {}) {
    this.kyInstance = options.ky ?? ky;
    this.kyOptions = options.kyOptions;
  }

  async execute(request: ExecuteRequest, signal?: AbortSignal): Promise<TransportResponse<KyResponse>> {
    if (request.encoding === "httpBody") {
      return this.send(
        request.url,
        request.method,
        { "Content-Type": FORM_CONTENT_TYPE, ...request.headers },
        encodeFormBody(request.parameters),
        request.timeout,
        signal,
      );
    }
    return this.send(
      appendQuery(request.url, request.parameters),
      request.method,
      request.headers,
      undefined,
      request.timeout,
      signal,
    );
  }

  async upload(request: UploadRequest, signal?: AbortSignal): Promise<TransportResponse<KyResponse>> {
    const form = new FormData();
    request.build(form);
    const headers = Object.fromEntries(
      Object.entries(request.headers).filter(([name]) => name.toLowerCase() !== "content-type"),
    );
    return this.send(request.url, request.method, headers, form, request.timeout, signal);
  }

  private async send(
    url: string,
    method: string,
    headers: Record<string, string>,
    body: string | FormData | undefined,
    timeout: number | undefined,
    signal: AbortSignal | undefined,
  ): Promise<TransportResponse<KyResponse>> {
    try {
      const response = await this.kyInstance(url, {
        ...this.kyOptions,
        method,
        headers,
        body,
        signal,
        timeout: timeout === undefined ? false : timeout,
        retry: 0,
        throwHttpErrors: false, // Handle errors ourselves
      });
      const bytes = new Uint8Array(await response.arrayBuffer());

      return {
        status: response.status,
        statusText: response.statusText,
        headers: Object.fromEntries(response.headers.entries()),
        body: bytes.byteLength > 0 ? bytes : undefined,
        raw: response,
      };
    } catch (error: unknown) {
      // Handle ky timeout errors
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new TimeoutError(timeout ?? 0, url, method, error);
      }
      throw new NetworkError(url, method, error);
    }
  }
}
