import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector, MetricsEventType, MetricsStats } from "../interfaces/metrics.js";

/**
 * Logger-backed metrics collector.
 * Logs lifecycle events and keeps running totals for the health endpoint.
 */
export class ConsoleMetricsCollector implements MetricsCollector {
  private activeSessions = new Set<string>();
  private totalSessions = 0;
  private fragmentsServed = 0;
  private terminatedByState: Record<string, number> = {};
  private errorCounts = { warning: 0, error: 0, critical: 0, total: 0 };

  constructor(private logger: Logger) {}

  recordEvent(event: MetricsEventType): void {
    switch (event.type) {
      case "session:created":
        this.totalSessions++;
        this.activeSessions.add(event.sessionId);
        this.logger.info("Session created", { component: "metrics", sessionId: event.sessionId });
        break;

      case "session:terminated":
        this.activeSessions.delete(event.sessionId);
        this.terminatedByState[event.state] = (this.terminatedByState[event.state] ?? 0) + 1;
        this.logger.info("Session terminated", {
          component: "metrics",
          sessionId: event.sessionId,
          state: event.state,
          fragmentCount: event.fragmentCount,
        });
        break;

      case "session:reaped":
        this.logger.debug?.("Session reaped", { component: "metrics", sessionId: event.sessionId });
        break;

      case "delta:served":
        this.fragmentsServed += event.fragmentCount;
        this.logger.debug?.("Delta served", {
          component: "metrics",
          sessionId: event.sessionId,
          fragmentCount: event.fragmentCount,
          logBytes: event.logBytes,
        });
        break;

      case "request:rejected":
        this.logger.warn("Request rejected", {
          component: "metrics",
          sessionId: event.sessionId,
          operation: event.operation,
          code: event.code,
        });
        break;

      case "error":
        this.errorCounts[event.severity]++;
        this.errorCounts.total++;
        this.logger.error("Error recorded", {
          component: "metrics",
          sessionId: event.sessionId,
          source: event.source,
          error: event.error,
          severity: event.severity,
        });
        break;

      case "latency":
        this.logger.debug?.("Latency", {
          component: "metrics",
          sessionId: event.sessionId,
          operation: event.operation,
          durationMs: event.durationMs,
        });
        break;
    }
  }

  getStats(): MetricsStats {
    return {
      totalSessions: this.totalSessions,
      activeSessions: this.activeSessions.size,
      terminatedByState: { ...this.terminatedByState },
      fragmentsServed: this.fragmentsServed,
      errors: { ...this.errorCounts },
    };
  }

  reset(): void {
    this.activeSessions.clear();
    this.totalSessions = 0;
    this.fragmentsServed = 0;
    this.terminatedByState = {};
    this.errorCounts = { warning: 0, error: 0, critical: 0, total: 0 };
  }
}
