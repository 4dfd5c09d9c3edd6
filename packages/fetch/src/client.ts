import {
  RequestDispatcher,
  type DispatcherConfigInput,
  type Logger,
} from "@typed-request/core";
import type { SchedulerLike } from "rxjs";
import { FetchTransport, type FetchTransportOptions } from "./transport.js";

/**
 * Options for creating a fetch-based dispatcher
 */
export interface FetchDispatcherOptions extends DispatcherConfigInput {
  /**
   * Optional logger used for internal dispatcher logging.
   */
  logger?: Logger;
  /**
   * Scheduler outcomes are delivered on.
   */
  scheduler?: SchedulerLike;
  /**
   * Additional fetch options to pass to every request.
   * Useful for credentials, cache, mode, etc.
   */
  fetchOptions?: FetchTransportOptions["fetchOptions"];
}

/**
 * Type alias for the fetch-based dispatcher.
 * The raw response type is the native Response object.
 */
export type FetchDispatcher = RequestDispatcher<Response>;

/**
 * Creates a dispatcher that sends requests with native fetch.
 *
 * @example
 * ```typescript
 * import { createDispatcher } from "@typed-request/fetch";
 *
 * const dispatcher = createDispatcher({
 *   timeout: 10_000,
 *   headers: { Accept: "application/json" },
 * });
 *
 * const { token } = await dispatcher.send(login);
 * ```
 */
export function createDispatcher(options: FetchDispatcherOptions = {}): FetchDispatcher {
  const transport = new FetchTransport({ fetchOptions: options.fetchOptions });

  return new RequestDispatcher({
    transport,
    timeout: options.timeout,
    headers: options.headers,
    telemetry: options.telemetry,
    logger: options.logger,
    scheduler: options.scheduler,
  });
}
