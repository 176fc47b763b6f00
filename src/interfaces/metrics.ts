/**
 * Metrics collection interface for observability and monitoring.
 * The delta update manager reports session lifecycle and polling activity here.
 */

import type { SessionState } from "../core/session-lifecycle.js";

export interface MetricsEvent {
  timestamp: number; // Unix timestamp in milliseconds
  type: string;
  sessionId?: string;
  [key: string]: unknown;
}

/** Session lifecycle events */
export interface SessionCreatedEvent extends MetricsEvent {
  type: "session:created";
  sessionId: string;
}

export interface SessionTerminatedEvent extends MetricsEvent {
  type: "session:terminated";
  sessionId: string;
  state: SessionState;
  fragmentCount: number;
}

export interface SessionReapedEvent extends MetricsEvent {
  type: "session:reaped";
  sessionId: string;
}

/** Polling events */
export interface DeltaServedEvent extends MetricsEvent {
  type: "delta:served";
  sessionId: string;
  fragmentCount: number;
  logBytes: number;
}

export interface RequestRejectedEvent extends MetricsEvent {
  type: "request:rejected";
  operation: "start" | "poll" | "terminate";
  code: string;
}

/** Error events */
export interface ErrorEvent extends MetricsEvent {
  type: "error";
  source: string; // Component that emitted the error
  error: string;
  severity: "warning" | "error" | "critical";
}

/** Performance events */
export interface LatencyEvent extends MetricsEvent {
  type: "latency";
  sessionId: string;
  operation: string; // e.g., "operation_start"
  durationMs: number;
}

/** Union of all metrics events */
export type MetricsEventType =
  | SessionCreatedEvent
  | SessionTerminatedEvent
  | SessionReapedEvent
  | DeltaServedEvent
  | RequestRejectedEvent
  | ErrorEvent
  | LatencyEvent;

/**
 * Metrics collector interface.
 * Implementations can collect, aggregate, export metrics.
 */
export interface MetricsCollector {
  recordEvent(event: MetricsEventType): void;

  /** Current statistics (optional). */
  getStats?(): MetricsStats;

  /** Reset metrics (optional). */
  reset?(): void;
}

export interface MetricsStats {
  totalSessions: number;
  activeSessions: number;
  terminatedByState: Record<string, number>;
  fragmentsServed: number;
  errors: { warning: number; error: number; critical: number; total: number };
}
