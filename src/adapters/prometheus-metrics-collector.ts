import type { MetricsCollector, MetricsEventType } from "../interfaces/metrics.js";

type PromClient = typeof import("prom-client");

/**
 * Prometheus-backed MetricsCollector using a private registry.
 * Takes the prom-client module at construction time so embedders control the import.
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly registry: InstanceType<PromClient["Registry"]>;

  // Counters
  private readonly sessionsCreatedTotal: InstanceType<PromClient["Counter"]>;
  private readonly sessionsTerminatedTotal: InstanceType<PromClient["Counter"]>;
  private readonly sessionsReapedTotal: InstanceType<PromClient["Counter"]>;
  private readonly fragmentsServedTotal: InstanceType<PromClient["Counter"]>;
  private readonly pollsTotal: InstanceType<PromClient["Counter"]>;
  private readonly requestsRejectedTotal: InstanceType<PromClient["Counter"]>;
  private readonly errorsTotal: InstanceType<PromClient["Counter"]>;

  // Gauges
  private readonly sessionsActive: InstanceType<PromClient["Gauge"]>;

  // Histograms
  private readonly operationDuration: InstanceType<PromClient["Histogram"]>;

  constructor(
    promClient: PromClient,
    options?: { prefix?: string; defaultLabels?: Record<string, string> },
  ) {
    const prefix = options?.prefix ?? "xcdelta_";
    this.registry = new promClient.Registry();

    if (options?.defaultLabels) {
      this.registry.setDefaultLabels(options.defaultLabels);
    }

    this.sessionsCreatedTotal = new promClient.Counter({
      name: `${prefix}sessions_created_total`,
      help: "Total number of sessions created",
      registers: [this.registry],
    });

    this.sessionsTerminatedTotal = new promClient.Counter({
      name: `${prefix}sessions_terminated_total`,
      help: "Total sessions that reached a terminal state",
      labelNames: ["state"],
      registers: [this.registry],
    });

    this.sessionsReapedTotal = new promClient.Counter({
      name: `${prefix}sessions_reaped_total`,
      help: "Total terminal sessions evicted after retention",
      registers: [this.registry],
    });

    this.fragmentsServedTotal = new promClient.Counter({
      name: `${prefix}fragments_served_total`,
      help: "Total result fragments delivered to pollers",
      registers: [this.registry],
    });

    this.pollsTotal = new promClient.Counter({
      name: `${prefix}polls_total`,
      help: "Total successful polls",
      registers: [this.registry],
    });

    this.requestsRejectedTotal = new promClient.Counter({
      name: `${prefix}requests_rejected_total`,
      help: "Total rejected start/poll/terminate requests",
      labelNames: ["operation", "code"],
      registers: [this.registry],
    });

    this.errorsTotal = new promClient.Counter({
      name: `${prefix}errors_total`,
      help: "Total errors recorded",
      labelNames: ["severity", "source"],
      registers: [this.registry],
    });

    this.sessionsActive = new promClient.Gauge({
      name: `${prefix}sessions_active`,
      help: "Number of sessions not yet terminal",
      registers: [this.registry],
    });

    this.operationDuration = new promClient.Histogram({
      name: `${prefix}operation_duration_seconds`,
      help: "Duration of session operations in seconds",
      labelNames: ["operation"],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 30],
      registers: [this.registry],
    });
  }

  recordEvent(event: MetricsEventType): void {
    switch (event.type) {
      case "session:created":
        this.sessionsCreatedTotal.inc();
        this.sessionsActive.inc();
        break;
      case "session:terminated":
        this.sessionsTerminatedTotal.inc({ state: event.state });
        this.sessionsActive.dec();
        break;
      case "session:reaped":
        this.sessionsReapedTotal.inc();
        break;
      case "delta:served":
        this.pollsTotal.inc();
        this.fragmentsServedTotal.inc(event.fragmentCount);
        break;
      case "request:rejected":
        this.requestsRejectedTotal.inc({ operation: event.operation, code: event.code });
        break;
      case "error":
        this.errorsTotal.inc({ severity: event.severity, source: event.source });
        break;
      case "latency":
        this.operationDuration.observe({ operation: event.operation }, event.durationMs / 1000);
        break;
    }
  }

  async getMetricsOutput(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}
