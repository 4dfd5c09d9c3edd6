import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { resolveTelemetryConfig, type ResolvedTelemetryConfig } from "./telemetry.js";

const telemetrySchema = z.union([
  z.boolean(),
  z.object({
    enabled: z.boolean(),
    serviceName: z.string().min(1).optional(),
  }),
]);

export const dispatcherConfigSchema = z.object({
  /** Per-request timeout in milliseconds */
  timeout: z.number().int().positive().optional(),
  /** Sent with every request; a request's own headers win on conflict */
  headers: z.record(z.string()).default({}),
  telemetry: telemetrySchema.optional(),
});

export type DispatcherConfigInput = z.input<typeof dispatcherConfigSchema>;

export interface ResolvedDispatcherConfig {
  timeout: number | undefined;
  headers: Record<string, string>;
  telemetry: ResolvedTelemetryConfig;
}

/**
 * Validates dispatcher options and fills in defaults.
 *
 * @throws ConfigurationError when an option has the wrong shape
 */
export function resolveDispatcherConfig(input: DispatcherConfigInput = {}): ResolvedDispatcherConfig {
  const parsed = dispatcherConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid dispatcher options: ${details}`, parsed.error.issues);
  }
  return {
    timeout: parsed.data.timeout,
    headers: parsed.data.headers,
    telemetry: resolveTelemetryConfig(parsed.data.telemetry),
  };
}
