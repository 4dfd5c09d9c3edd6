import {
  RequestDispatcher,
  type DispatcherConfigInput,
  type Logger,
} from "@typed-request/core";
import type { KyInstance, Options as KyOptions, KyResponse } from "ky";
import type { SchedulerLike } from "rxjs";
import { KyTransport, type KyTransportOptions } from "./transport.js";

/**
 * Options for creating a ky-based dispatcher
 */
export interface KyDispatcherOptions extends DispatcherConfigInput {
  /**
   * Optional logger used for internal dispatcher logging.
   */
  logger?: Logger;
  scheduler?: SchedulerLike;
  /**
   * Use a custom ky instance.
   * Useful for pre-configured ky instances with hooks, defaults, etc.
   */
  ky?: KyInstance;
  /**
   * Additional ky options to pass to every request.
   * Useful for hooks, prefixUrl, etc.
   */
  kyOptions?: KyTransportOptions["kyOptions"];
}

/**
 * Type alias for the ky-based dispatcher.
 * The raw response type is the KyResponse object.
 */
export type KyDispatcher = RequestDispatcher<KyResponse>;

/**
 * Creates a dispatcher that sends requests with ky.
 *
 * @example
 * ```typescript
 * import { createDispatcher } from "@typed-request/ky";
 *
 * const dispatcher = createDispatcher({
 *   kyOptions: {
 *     hooks: {
 *       beforeRequest: [(request) => {
 *         request.headers.set("Authorization", `Bearer ${session.token}`);
 *       }],
 *     },
 *   },
 * });
 * ```
 */
export function createDispatcher(options: KyDispatcherOptions = {}): KyDispatcher {
  const transport = new KyTransport({
    ky: options.ky,
    kyOptions: options.kyOptions,
  });

  return new RequestDispatcher({
    transport,
    timeout: options.timeout,
    headers: options.headers,
    telemetry: options.telemetry,
    logger: options.logger,
    scheduler: options.scheduler,
  });
}

// Re-export ky types for convenience
export type { KyInstance, KyOptions, KyResponse };
