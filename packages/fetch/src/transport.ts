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

export interface FetchTransportOptions {
  /**
   * Additional fetch options to pass to every request.
   * These are merged with the request-specific options.
   */
  fetchOptions?: Omit<RequestInit, "method" | "headers" | "body" | "signal">;
}

const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded; charset=utf-8";

/**
 * HTTP transport using the native fetch API.
 * Exposes the raw Response object for advanced use cases.
 */
export class FetchTransport implements HttpTransport<Response> {
  constructor(private readonly options: FetchTransportOptions = {}) {}

  async execute(request: ExecuteRequest, signal?: AbortSignal): Promise<TransportResponse<Response>> {
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

  async upload(request: UploadRequest, signal?: AbortSignal): Promise<TransportResponse<Response>> {
    const form = new FormData();
    request.build(form);
    // fetch writes the multipart Content-Type with its boundary itself
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
  ): Promise<TransportResponse<Response>> {
    const controller = new AbortController();
    let timedOut = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    if (timeout !== undefined) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeout);
    }
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const fetchOptions: RequestInit = {
        ...this.options.fetchOptions,
        method,
        headers,
        signal: controller.signal,
      };

      if (body !== undefined) {
        fetchOptions.body = body;
      }

      const response = await fetch(url, fetchOptions);
      const bytes = new Uint8Array(await response.arrayBuffer());

      return {
        status: response.status,
        statusText: response.statusText,
        headers: Object.fromEntries(response.headers.entries()),
        body: bytes.byteLength > 0 ? bytes : undefined,
        raw: response,
      };
    } catch (error: unknown) {
      if (timedOut && timeout !== undefined) {
        throw new TimeoutError(timeout, url, method, error);
      }
      throw new NetworkError(url, method, error);
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
