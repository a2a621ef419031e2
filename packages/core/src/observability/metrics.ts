import type { MeterProvider, PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import type { Capability } from "../authz/permissions.js";
import { logger } from "./logger.js";

export type AuthzDecisionEffect = "allow" | "deny";

export type AuthzDecisionReason =
  | "ALLOW_LISTED"
  | "ADMIN"
  | "VALIDATOR_PASSED"
  | "VALIDATOR_FAILED"
  | "AUTHENTICATED_ONLY"
  | "UNMATCHED_ALLOWED"
  | "UNMATCHED_DENIED"
  | "UNAUTHENTICATED"
  | "MALFORMED_PATH"
  | "ERROR";

export type AuthzDecisionMetric = {
  operation: string;
  httpMethod: string;
  effect: AuthzDecisionEffect;
  reason: AuthzDecisionReason;
  capability?: Capability;
  durationMs?: number;
};

export type AuthzFilterMetric = {
  operation: string;
  refetches: number;
  removed: number;
};

export type AuthzMetricsOptions = {
  /** Full OTLP/HTTP endpoint URL. Defaults to http://localhost:4318/v1/metrics when not provided. */
  url?: string;
  /** Additional headers to send with OTLP requests. */
  headers?: Record<string, string>;
  /** Service name reported in resource attributes. Defaults to "trackward". */
  serviceName?: string;
  serviceNamespace?: string;
  serviceInstanceId?: string;
  /** Name used when registering the meter. Defaults to "trackward-authz". */
  meterName?: string;
  exportIntervalMillis?: number;
  exportTimeoutMillis?: number;
  /** When true, enable console diagnostics for OpenTelemetry SDK warnings. */
  enableDiagnostics?: boolean;
};

const DEFAULT_EXPORT_INTERVAL = 10_000;
const DEFAULT_EXPORT_TIMEOUT = 30_000;
const DEFAULT_OTLP_URL = "http://localhost:4318/v1/metrics" as const;

type OtelCounter = { add(value: number, attributes?: Record<string, string | number>): void };
type OtelHistogram = { record(value: number, attributes?: Record<string, string | number>): void };

type AuthzMetricsState = {
  metricReader: PeriodicExportingMetricReader;
  meterProvider: MeterProvider;
  decisionCounter: OtelCounter;
  decisionDuration: OtelHistogram;
  filterRefetchCounter: OtelCounter;
  filterRemovedCounter: OtelCounter;
};

let state: AuthzMetricsState | null = null;

async function loadOtelDependencies() {
  const [api, exporter, metricsSdk, resources, semconv] = await Promise.all([
    import("@opentelemetry/api"),
    import("@opentelemetry/exporter-metrics-otlp-http"),
    import("@opentelemetry/sdk-metrics"),
    import("@opentelemetry/resources"),
    import("@opentelemetry/semantic-conventions"),
  ]);
  return { api, exporter, metricsSdk, resources, semconv };
}

export type AuthzMetricsHandle = {
  shutdown: () => Promise<void>;
};

export async function initializeAuthzMetrics(
  options: AuthzMetricsOptions = {},
): Promise<AuthzMetricsHandle | null> {
  if (state) {
    return { shutdown: shutdownAuthzMetrics };
  }

  try {
    const { api, exporter, metricsSdk, resources, semconv } = await loadOtelDependencies();

    if (options.enableDiagnostics) {
      api.diag.setLogger(new api.DiagConsoleLogger(), api.DiagLogLevel.INFO);
    }

    const resource = resources.Resource.default().merge(
      new resources.Resource(
        sanitizeAttributes({
          [semconv.SemanticResourceAttributes.SERVICE_NAME]: options.serviceName ?? "trackward",
          [semconv.SemanticResourceAttributes.SERVICE_NAMESPACE]: options.serviceNamespace,
          [semconv.SemanticResourceAttributes.SERVICE_INSTANCE_ID]: options.serviceInstanceId,
        }),
      ),
    );

    const meterProvider = new metricsSdk.MeterProvider({ resource });
    const metricReader = new metricsSdk.PeriodicExportingMetricReader({
      exporter: new exporter.OTLPMetricExporter({
        url: options.url ?? DEFAULT_OTLP_URL,
        headers: options.headers,
      }),
      exportIntervalMillis: options.exportIntervalMillis ?? DEFAULT_EXPORT_INTERVAL,
      exportTimeoutMillis: options.exportTimeoutMillis ?? DEFAULT_EXPORT_TIMEOUT,
    });

    meterProvider.addMetricReader(metricReader);
    api.metrics.setGlobalMeterProvider(meterProvider);

    const meter = meterProvider.getMeter(options.meterName ?? "trackward-authz");

    state = {
      metricReader,
      meterProvider,
      decisionCounter: meter.createCounter("authz_decision_total", {
        description: "Total number of authorization decisions taken by the gateway.",
      }),
      decisionDuration: meter.createHistogram("authz_decision_duration_ms", {
        description: "Latency of before-request authorization in milliseconds.",
        unit: "ms",
      }),
      filterRefetchCounter: meter.createCounter("authz_filter_refetch_total", {
        description: "Upstream re-queries issued to backfill filtered search pages.",
      }),
      filterRemovedCounter: meter.createCounter("authz_filter_removed_total", {
        description: "Search results removed because the caller cannot read them.",
      }),
    };

    return { shutdown: shutdownAuthzMetrics };
  } catch (err) {
    logger.warn(
      { error: messageOf(err) },
      "Failed to initialize OpenTelemetry for authz metrics",
    );
    state = null;
    return null;
  }
}

export async function shutdownAuthzMetrics() {
  if (!state) return;
  const { metricReader, meterProvider } = state;
  state = null;
  await Promise.all([
    metricReader.shutdown().catch((err: unknown) => {
      logger.warn({ error: messageOf(err) }, "Metric reader shutdown failed");
    }),
    meterProvider.shutdown().catch((err: unknown) => {
      logger.warn({ error: messageOf(err) }, "Meter provider shutdown failed");
    }),
  ]);
}

export function recordAuthzDecision(metric: AuthzDecisionMetric) {
  if (!state) return;
  const attrs = sanitizeAttributes({
    operation: metric.operation,
    http_method: metric.httpMethod,
    effect: metric.effect,
    reason: metric.reason,
    capability: metric.capability,
  });
  state.decisionCounter.add(1, attrs);
  if (metric.durationMs != null) {
    state.decisionDuration.record(metric.durationMs, attrs);
  }
}

export function recordAuthzFilter(metric: AuthzFilterMetric) {
  if (!state) return;
  const attrs = sanitizeAttributes({ operation: metric.operation });
  if (metric.refetches > 0) state.filterRefetchCounter.add(metric.refetches, attrs);
  if (metric.removed > 0) state.filterRemovedCounter.add(metric.removed, attrs);
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sanitizeAttributes(input: Record<string, string | number | undefined>) {
  const attrs: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined && value !== null) {
      attrs[key] = value;
    }
  }
  return attrs;
}
