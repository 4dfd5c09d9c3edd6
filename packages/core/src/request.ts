import type { z } from "zod";
import { jsonDecoder, type Decoder } from "./decoder.js";
import { RequestDescriptor, type RequestDescriptorInit } from "./descriptor.js";

/**
 * Everything the dispatcher needs to know about one kind of call:
 * where it goes, the success shape and the backend error shape.
 *
 * Implement it on your own request classes, or build one with `defineRequest`.
 */
export interface ApiRequest<T, E> {
  readonly networkRequest: RequestDescriptor;
  readonly response: Decoder<T>;
  readonly backendError: Decoder<E>;
}

export type InferResponse<TRequest> = TRequest extends ApiRequest<infer T, unknown> ? T : never;
export type InferBackendError<TRequest> =
  TRequest extends ApiRequest<unknown, infer E> ? E : never;

export interface DefineRequestOptions<
  TResponse extends z.ZodTypeAny,
  TError extends z.ZodTypeAny,
> extends RequestDescriptorInit {
  response: TResponse;
  backendError: TError;
}

/**
 * Builds an `ApiRequest` from descriptor fields and zod schemas, decoding both
 * shapes as JSON.
 *
 * @example
 * ```typescript
 * const login = defineRequest({
 *   host: "https://api.example.com",
 *   endpoint: "/login",
 *   method: "POST",
 *   body: { user: "a", pass: "b" },
 *   response: z.object({ token: z.string() }),
 *   backendError: z.object({ code: z.string() }),
 * });
 *
 * const { token } = await dispatcher.send(login);
 * ```
 */
export function defineRequest<TResponse extends z.ZodTypeAny, TError extends z.ZodTypeAny>(
  options: DefineRequestOptions<TResponse, TError>,
): ApiRequest<z.output<TResponse>, z.output<TError>> {
  const { response, backendError, ...init } = options;
  return {
    networkRequest: new RequestDescriptor(init),
    response: jsonDecoder(response),
    backendError: jsonDecoder(backendError),
  };
}
