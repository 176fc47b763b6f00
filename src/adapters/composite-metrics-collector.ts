import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector, MetricsEventType, MetricsStats } from "../interfaces/metrics.js";

const EMPTY_STATS: MetricsStats = {
  totalSessions: 0,
  activeSessions: 0,
  terminatedByState: {},
  fragmentsServed: 0,
  errors: { warning: 0, error: 0, critical: 0, total: 0 },
};

/**
 * Fans out recordEvent() to N collectors.
 * Delegates getStats to the first collector that implements it.
 */
export class CompositeMetricsCollector implements MetricsCollector {
  constructor(
    private readonly collectors: MetricsCollector[],
    private readonly logger?: Logger,
  ) {}

  recordEvent(event: MetricsEventType): void {
    for (const c of this.collectors) {
      try {
        c.recordEvent(event);
      } catch (error) {
        // One failing sink must not suppress the others
        this.logger?.warn("Metrics collector failed to record an event", { type: event.type, error });
      }
    }
  }

  getStats(): MetricsStats {
    for (const c of this.collectors) {
      if (c.getStats) return c.getStats();
    }
    return { ...EMPTY_STATS, terminatedByState: {}, errors: { ...EMPTY_STATS.errors } };
  }

  reset(): void {
    for (const c of this.collectors) {
      c.reset?.();
    }
  }
}
