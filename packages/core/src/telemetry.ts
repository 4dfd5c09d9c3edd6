/**
 * OpenTelemetry integration for dispatchers.
 * Each call becomes a CLIENT span when telemetry is enabled and
 * `@opentelemetry/api` is installed.
 */

export type { Span, SpanStatusCode } from "@opentelemetry/api";

/** Configuration for telemetry */
export interface TelemetryConfig {
  enabled: boolean;
  /** Tracer name (defaults to "typed-request") */
  serviceName?: string;
}

/** Telemetry option: boolean shorthand or full config */
export type TelemetryOption = boolean | TelemetryConfig;

export interface ResolvedTelemetryConfig {
  enabled: boolean;
  serviceName: string;
}

const DEFAULT_SERVICE_NAME = "typed-request";

/** Normalize TelemetryOption to full config */
export function resolveTelemetryConfig(
  option: TelemetryOption | undefined,
): ResolvedTelemetryConfig {
  if (option === undefined || option === false) {
    return { enabled: false, serviceName: DEFAULT_SERVICE_NAME };
  }
  if (option === true) {
    return { enabled: true, serviceName: DEFAULT_SERVICE_NAME };
  }
  return {
    enabled: option.enabled,
    serviceName: option.serviceName ?? DEFAULT_SERVICE_NAME,
  };
}

// Lazy-loaded OpenTelemetry API
let otelApi: typeof import("@opentelemetry/api") | null = null;
let otelLoaded = false;

async function getOtelApi(): Promise<typeof import("@opentelemetry/api") | null> {
  if (otelLoaded) return otelApi;
  otelLoaded = true;
  try {
    otelApi = await import("@opentelemetry/api");
  } catch {
    // @opentelemetry/api not installed - telemetry disabled
    otelApi = null;
  }
  return otelApi;
}

/** Initialize telemetry (call once at startup) */
export async function initTelemetry(): Promise<boolean> {
  const api = await getOtelApi();
  return api !== null;
}

/** Whether `initTelemetry()` has loaded the OpenTelemetry API */
export function isTelemetryLoaded(): boolean {
  return otelApi !== null;
}

/** Span interface matching @opentelemetry/api Span */
export interface SpanLike {
  setAttribute(key: string, value: string | number | boolean): this;
  setStatus(status: { code: number; message?: string }): this;
  recordException(exception: Error | string): void;
  end(): void;
}

/** Create a span for one outgoing call */
export function createClientSpan(
  method: string,
  url: string,
  config: ResolvedTelemetryConfig,
): SpanLike | undefined {
  if (!config.enabled || !otelApi) return undefined;

  const tracer = otelApi.trace.getTracer(config.serviceName);
  return tracer.startSpan(`HTTP ${method}`, {
    kind: otelApi.SpanKind.CLIENT,
    attributes: {
      "http.request.method": method,
      "url.full": url,
    },
  });
}

/** End a span with error status */
export function endSpanWithError(span: SpanLike | undefined, error: unknown): void {
  if (!span || !otelApi) return;

  span.setStatus({ code: otelApi.SpanStatusCode.ERROR });
  span.recordException(error instanceof Error ? error : String(error));
  span.end();
}

/** End a span with OK status */
export function endSpanOk(span: SpanLike | undefined): void {
  if (!span || !otelApi) return;
  span.setStatus({ code: otelApi.SpanStatusCode.OK });
  span.end();
}
