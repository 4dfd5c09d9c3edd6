import {
  asapScheduler,
  finalize,
  firstValueFrom,
  map,
  Observable,
  observeOn,
  type SchedulerLike,
  type Subscription,
} from "rxjs";
import type { ApiRequest } from "./request.js";
import type { HttpTransport, TransportResponse } from "./types.js";
import type { RequestSnapshot } from "./descriptor.js";
import { classifyResponse, decodeTransportResponse } from "./classify.js";
import { resolveDispatcherConfig, type DispatcherConfigInput, type ResolvedDispatcherConfig } from "./config.js";
import { TransportError, toError, type DispatchError } from "./errors.js";
import { noopLogger, type Logger } from "./logger.js";
import { appendMultipartFields, type MultipartFields } from "./multipart.js";
import { err, transportFailure, unwrapOutcome, type ResponseOutcome } from "./outcome.js";
import { PendingCallRegistry } from "./registry.js";
import {
  createClientSpan,
  endSpanOk,
  endSpanWithError,
  isTelemetryLoaded,
  type SpanLike,
} from "./telemetry.js";

// ============================================================================
// Types
// ============================================================================

export interface DispatcherOptions<TRaw = unknown> extends DispatcherConfigInput {
  transport: HttpTransport<TRaw>;
  /**
   * Optional logger used for internal dispatcher logging.
   */
  logger?: Logger;
  /**
   * Scheduler every outcome is delivered on. Defaults to `asapScheduler`,
   * so callbacks never run synchronously inside the call that issued them.
   */
  scheduler?: SchedulerLike;
}

export interface CallOptions {
  /**
   * Files to upload. When present the request goes out as multipart form data,
   * with the descriptor's parameters appended after the files.
   */
  multipart?: MultipartFields;
}

// ============================================================================
// RequestDispatcher Class
// ============================================================================

/**
 * Issues `ApiRequest`s through a transport and delivers their classified
 * outcome through one of three calling conventions:
 *
 * - `send`: a promise of the decoded value
 * - `subscribe`: success/error callbacks, tracked until completion
 * - `observe`: a cold RxJS observable, one call per subscription
 *
 * Failures are always a `BackendError` (the body matched the request's backend
 * error shape) or a `TransportError` (anything else).
 *
 * @example
 * ```typescript
 * const dispatcher = new RequestDispatcher({ transport: new FetchTransport() });
 *
 * try {
 *   const { token } = await dispatcher.send(login);
 * } catch (error) {
 *   if (isBackendError(error)) showMessage(error.payload.code);
 * }
 * ```
 */
export class RequestDispatcher<TRaw = unknown> {
  readonly pending = new PendingCallRegistry();
  private readonly transport: HttpTransport<TRaw>;
  private readonly config: ResolvedDispatcherConfig;
  private readonly logger: Logger;
  private readonly scheduler: SchedulerLike;

  constructor(options: DispatcherOptions<TRaw>) {
    this.transport = options.transport;
    this.config = resolveDispatcherConfig({
      timeout: options.timeout,
      headers: options.headers,
      telemetry: options.telemetry,
    });
    this.logger = options.logger ?? noopLogger;
    this.scheduler = options.scheduler ?? asapScheduler;

    if (this.config.telemetry.enabled && !isTelemetryLoaded()) {
      this.logger.debug("Telemetry enabled but @opentelemetry/api is not loaded yet", {
        serviceName: this.config.telemetry.serviceName,
        hint: "await initTelemetry() before issuing requests",
      });
    }
  }

  /** Number of callback and stream calls still in flight */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Resolves with the decoded value or rejects with `BackendError<E>` /
   * `TransportError`. Not tracked by the registry.
   */
  send<T, E>(request: ApiRequest<T, E>, options: CallOptions = {}): Promise<T> {
    return firstValueFrom(this.values(request, options));
  }

  /**
   * Resolves with the classified outcome instead of rejecting.
   */
  outcome<T, E>(request: ApiRequest<T, E>, options: CallOptions = {}): Promise<ResponseOutcome<T, E>> {
    return firstValueFrom(this.outcomes(request, options));
  }

  /**
   * Calls exactly one of the callbacks, once. The call stays in the registry
   * until it completes or `cancelAll` runs; unsubscribing the returned
   * subscription cancels just this call.
   */
  subscribe<T, E>(
    request: ApiRequest<T, E>,
    onSuccess: (value: T) => void,
    onError: (error: DispatchError<E>) => void,
    options: CallOptions = {},
  ): Subscription {
    const entry: Subscription = this.outcomes(request, options)
      .pipe(finalize(() => this.pending.remove(entry)))
      .subscribe({
        next: (outcome) => {
          if (outcome._tag === "Success") {
            onSuccess(outcome.value);
          } else {
            onError(outcome.error);
          }
        },
        error: (error: unknown) => onError(new TransportError(toError(error))),
      });
    if (!entry.closed) {
      this.pending.add(entry);
    }
    return entry;
  }

  /**
   * Cold observable: every subscription issues a fresh call and receives one
   * value then completion, or one error. Each subscription stays in the
   * registry until it finishes; unsubscribing aborts the call.
   */
  observe<T, E>(request: ApiRequest<T, E>, options: CallOptions = {}): Observable<T> {
    return new Observable<T>((subscriber) => {
      this.pending.add(subscriber);
      const inner = this.values(request, options).subscribe({
        next: (value) => subscriber.next(value),
        error: (error: unknown) => subscriber.error(error),
        complete: () => subscriber.complete(),
      });
      return () => {
        this.pending.remove(subscriber);
        inner.unsubscribe();
      };
    });
  }

  /**
   * Cancels every call issued through `subscribe` or `observe` that has not
   * completed yet. Nothing more is delivered to their callbacks or observers.
   */
  cancelAll(): number {
    const cancelled = this.pending.cancelAll();
    if (cancelled > 0) {
      this.logger.debug("Cancelled pending requests", { count: cancelled });
    }
    return cancelled;
  }

  private values<T, E>(request: ApiRequest<T, E>, options: CallOptions): Observable<T> {
    return this.outcomes(request, options).pipe(map((outcome) => unwrapOutcome(outcome)));
  }

  private outcomes<T, E>(
    request: ApiRequest<T, E>,
    options: CallOptions,
  ): Observable<ResponseOutcome<T, E>> {
    return new Observable<ResponseOutcome<T, E>>((subscriber) => {
      const controller = new AbortController();
      void this.perform(request, options, controller.signal).then(
        (outcome) => {
          subscriber.next(outcome);
          subscriber.complete();
        },
        (error: unknown) => {
          subscriber.next(transportFailure(new TransportError(toError(error))));
          subscriber.complete();
        },
      );
      return () => controller.abort();
    }).pipe(observeOn(this.scheduler));
  }

  /**
   * Internal request method
   */
  private async perform<T, E>(
    request: ApiRequest<T, E>,
    options: CallOptions,
    signal: AbortSignal,
  ): Promise<ResponseOutcome<T, E>> {
    const snapshot = request.networkRequest.snapshot();
    const span = createClientSpan(snapshot.method, snapshot.url, this.config.telemetry);
    this.logger.debug("Issuing request", {
      method: snapshot.method,
      url: snapshot.url,
      multipart: options.multipart !== undefined,
    });

    let response: TransportResponse<TRaw>;
    try {
      response = await this.issue(snapshot, options, signal);
    } catch (error: unknown) {
      const outcome = classifyResponse<T, E>(undefined, err(toError(error)), request.backendError);
      this.report(snapshot, outcome, span, signal);
      return outcome;
    }

    span?.setAttribute("http.response.status_code", response.status);
    const outcome = classifyResponse(
      response.body,
      decodeTransportResponse(response, request.response),
      request.backendError,
      response.status,
    );
    this.report(snapshot, outcome, span, signal);
    return outcome;
  }

  private issue(
    snapshot: RequestSnapshot,
    options: CallOptions,
    signal: AbortSignal,
  ): Promise<TransportResponse<TRaw>> {
    const headers = { ...this.config.headers, ...snapshot.headers };
    const { multipart } = options;

    if (multipart !== undefined) {
      return this.transport.upload(
        {
          url: snapshot.url,
          method: snapshot.method,
          headers,
          timeout: this.config.timeout,
          build: (form) => {
            appendMultipartFields(form, multipart, snapshot.parameters, this.logger);
          },
        },
        signal,
      );
    }

    return this.transport.execute(
      {
        url: snapshot.url,
        method: snapshot.method,
        parameters: { ...snapshot.parameters },
        encoding: snapshot.encoding,
        headers,
        timeout: this.config.timeout,
      },
      signal,
    );
  }

  private report<T, E>(
    snapshot: RequestSnapshot,
    outcome: ResponseOutcome<T, E>,
    span: SpanLike | undefined,
    signal: AbortSignal,
  ): void {
    const context = { method: snapshot.method, url: snapshot.url };
    span?.setAttribute("typed_request.outcome", outcome._tag);

    switch (outcome._tag) {
      case "Success":
        this.logger.debug("Request succeeded", context);
        endSpanOk(span);
        return;
      case "BackendFailure":
        this.logger.info("Backend returned an error payload", {
          ...context,
          status: outcome.error.status,
        });
        endSpanWithError(span, outcome.error);
        return;
      case "TransportFailure":
        if (signal.aborted) {
          this.logger.debug("Request cancelled", context);
        } else {
          this.logger.warn("Request failed", {
            ...context,
            status: outcome.error.status,
            error: outcome.error.cause.message,
          });
        }
        endSpanWithError(span, outcome.error);
        return;
    }
  }
}
