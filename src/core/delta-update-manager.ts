import { randomUUID } from "node:crypto";
import { z } from "zod";
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { InvalidRequestError, NotFoundError, XcdeltaError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector, RequestRejectedEvent } from "../interfaces/metrics.js";
import type { OperationFactory, OperationHandle } from "../interfaces/operation.js";
import type { ManagerConfig, ResolvedConfig } from "../types/config.js";
import { resolveConfig } from "../types/config.js";
import type { CancelReason, DeltaCursorInput, DeltaSnapshot, SessionInfo } from "../types/delta.js";
import type { DeltaSession, SessionStateChange } from "./delta-session.js";
import { InMemorySessionRegistry } from "./in-memory-session-registry.js";
import type { SessionRegistry } from "./interfaces/session-registry.js";
import { isTerminalState, type TerminalSessionState } from "./session-lifecycle.js";
import { TerminalSessionReaper } from "./session-reaper.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export const sessionIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._:-]+$/, "may only contain letters, digits, '.', '_', ':' and '-'");

export interface DeltaUpdateManagerEventMap {
  "session:started": { sessionId: string };
  "session:state": SessionStateChange;
  "session:terminated": { sessionId: string; state: TerminalSessionState; error: Error | null };
  "session:timeout": { sessionId: string; lifetimeMs: number };
  "session:reaped": { sessionId: string };
}

export interface DeltaUpdateManagerOptions<
  TRequest,
  TFragment,
  THandle extends OperationHandle = OperationHandle,
> {
  /** Binds requests to running operations. */
  operation: OperationFactory<TRequest, TFragment, THandle>;
  config?: ManagerConfig;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Defaults to an InMemorySessionRegistry capped at `config.maxConcurrentSessions`. */
  registry?: SessionRegistry<TFragment, THandle>;
  generateSessionId?: () => string;
}

export interface StartSessionOptions {
  /** Explicit identifier; one is generated when absent. */
  sessionId?: string;
}

/**
 * Starts operations under session identifiers and serves incremental deltas of
 * what they report.
 *
 * Producer side: each operation writes into its own DeltaSession through the
 * reporter it was started with. Consumer side: pollers read snapshots without
 * ever waiting on the operation. Terminal sessions stay readable for the
 * reaper's retention window.
 */
export class DeltaUpdateManager<
  TRequest,
  TFragment,
  THandle extends OperationHandle = OperationHandle,
> extends TypedEventEmitter<DeltaUpdateManagerEventMap> {
  readonly config: ResolvedConfig;

  private readonly operation: OperationFactory<TRequest, TFragment, THandle>;
  private readonly registry: SessionRegistry<TFragment, THandle>;
  private readonly reaper: TerminalSessionReaper;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector | null;
  private readonly generateSessionId: () => string;
  private readonly lifetimeTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly cancelTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private started = false;

  constructor(options: DeltaUpdateManagerOptions<TRequest, TFragment, THandle>) {
    super();

    this.config = resolveConfig(options.config);
    this.operation = options.operation;
    this.logger =
      options.logger ??
      new StructuredLogger({ component: "delta-update-manager", level: LogLevel.WARN });
    this.metrics = options.metrics ?? null;
    this.generateSessionId = options.generateSessionId ?? randomUUID;
    this.registry =
      options.registry ??
      new InMemorySessionRegistry<TFragment, THandle>({
        maxLiveSessions: this.config.maxConcurrentSessions,
        logger: this.logger,
      });

    this.reaper = new TerminalSessionReaper({
      registry: this.registry,
      logger: this.logger,
      retentionMs: this.config.reaper.retentionMs,
      intervalMs: this.config.reaper.intervalMs,
      onReaped: (sessionId) => {
        this.metrics?.recordEvent({ timestamp: Date.now(), type: "session:reaped", sessionId });
        this.emit("session:reaped", { sessionId });
      },
    });
  }

  /** Start the retention sweep. */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.reaper.start();
  }

  /**
   * Stop the sweep and cancel every live session. Waits for acknowledgements up
   * to the cancel grace period; with no grace period, live sessions are moved
   * to cancelled at once.
   */
  async stop(): Promise<void> {
    this.reaper.stop();
    this.started = false;

    const live = this.registry.list().filter((session) => !session.isTerminal);
    for (const session of live) {
      this.requestTermination(session, "shutdown");
      if (this.config.cancelGracePeriodMs === 0) session.forceCancel();
    }
    await Promise.all(live.map((session) => this.settled(session)));

    for (const timer of this.lifetimeTimers.values()) clearTimeout(timer);
    for (const timer of this.cancelTimers.values()) clearTimeout(timer);
    this.lifetimeTimers.clear();
    this.cancelTimers.clear();
  }

  /**
   * Create a session and launch its operation. Resolves with the identifier
   * once the operation has a handle, its start has failed, or the session has
   * reached a terminal state (a start that never settles still resolves here
   * once the session is cancelled). Start failures surface through `poll`,
   * not here.
   *
   * @throws InvalidRequestError for a malformed identifier (nothing started)
   * @throws AlreadyExistsError when the identifier is taken
   * @throws SessionLimitError at capacity
   */
  async startSession(request: TRequest, options: StartSessionOptions = {}): Promise<string> {
    let session: DeltaSession<TFragment, THandle>;
    try {
      const sessionId = this.resolveSessionId(options.sessionId);
      session = this.registry.create(sessionId, (context) =>
        this.operation.start(request, context),
      );
    } catch (error) {
      this.recordRejection("start", error, options.sessionId);
      throw error;
    }

    const sessionId = session.id;
    const requestedAt = Date.now();
    this.track(session);
    this.metrics?.recordEvent({ timestamp: requestedAt, type: "session:created", sessionId });
    this.emit("session:started", { sessionId });
    this.logger.info(`Session ${sessionId} created`, { sessionId });

    await this.launchedOrTerminal(session);
    this.metrics?.recordEvent({
      timestamp: Date.now(),
      type: "latency",
      sessionId,
      operation: "operation_start",
      durationMs: Date.now() - requestedAt,
    });
    return sessionId;
  }

  /**
   * Everything reported since `since`. Never waits on the operation and never
   * fails because the operation failed: that arrives as `state: "failed"` with
   * a `terminalError`.
   *
   * @throws NotFoundError for unknown or reaped identifiers
   * @throws InvalidRequestError for a negative or fractional cursor
   */
  poll(sessionId: string, since: DeltaCursorInput = 0): DeltaSnapshot<TFragment> {
    const session = this.lookup(sessionId, "poll");
    let snapshot: DeltaSnapshot<TFragment>;
    try {
      snapshot = session.snapshot(since);
    } catch (error) {
      this.recordRejection("poll", error, sessionId);
      throw error;
    }
    this.metrics?.recordEvent({
      timestamp: Date.now(),
      type: "delta:served",
      sessionId,
      fragmentCount: snapshot.results.length,
      logBytes: Buffer.byteLength(snapshot.logOutput),
    });
    return snapshot;
  }

  /**
   * Ask the session's operation to stop. Idempotent; terminal sessions are left
   * untouched. The state becomes cancelled once the operation acknowledges, or
   * after the cancel grace period.
   *
   * @throws NotFoundError for unknown or reaped identifiers
   */
  terminate(sessionId: string, reason: CancelReason = "requested"): SessionInfo {
    const session = this.lookup(sessionId, "terminate");
    this.requestTermination(session, reason);
    return session.info();
  }

  /** Resolve with the full final snapshot once the session is terminal. */
  async waitForTerminal(sessionId: string, signal?: AbortSignal): Promise<DeltaSnapshot<TFragment>> {
    const session = this.lookup(sessionId, "poll");
    await this.settled(session, signal);
    return session.snapshot();
  }

  getSessionInfo(sessionId: string): SessionInfo {
    return this.lookup(sessionId, "poll").info();
  }

  listSessions(): SessionInfo[] {
    return this.registry.list().map((session) => session.info());
  }

  /** Handle of the session's operation, or null while it is still starting. */
  operationHandle(sessionId: string): THandle | null {
    return this.lookup(sessionId, "poll").handle;
  }

  /** Run one retention pass now. */
  reap(now?: number): string[] {
    return this.reaper.sweep(now);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private resolveSessionId(explicit: string | undefined): string {
    if (explicit === undefined) return this.generateSessionId();
    const parsed = sessionIdSchema.safeParse(explicit);
    if (!parsed.success) {
      throw new InvalidRequestError(
        "Invalid session identifier",
        parsed.error.issues.map((issue) => `sessionId: ${issue.message}`),
      );
    }
    return parsed.data;
  }

  private track(session: DeltaSession<TFragment, THandle>): void {
    const sessionId = session.id;
    session.on("state:changed", (change) => {
      this.logger.debug?.(`Session ${sessionId} ${change.from} -> ${change.to}`, { sessionId });
      this.emit("session:state", change);
      if (isTerminalState(change.to)) this.onTerminal(session, change.to);
    });

    const lifetimeMs = this.config.maxSessionLifetimeMs;
    if (lifetimeMs > 0) {
      this.lifetimeTimers.set(
        sessionId,
        setTimeout(() => {
          this.lifetimeTimers.delete(sessionId);
          if (session.isTerminal) return;
          this.logger.warn(`Session ${sessionId} exceeded its lifetime, terminating`, {
            sessionId,
            lifetimeMs,
          });
          this.emit("session:timeout", { sessionId, lifetimeMs });
          this.requestTermination(session, "timeout");
        }, lifetimeMs),
      );
    }
  }

  private requestTermination(session: DeltaSession<TFragment, THandle>, reason: CancelReason): void {
    if (!session.requestCancel(reason)) return;
    const sessionId = session.id;
    this.logger.info(`Cancellation requested for session ${sessionId}`, { sessionId, reason });

    const graceMs = this.config.cancelGracePeriodMs;
    if (graceMs <= 0 || session.isTerminal) return;
    this.cancelTimers.set(
      sessionId,
      setTimeout(() => {
        this.cancelTimers.delete(sessionId);
        if (!session.forceCancel()) return;
        this.logger.warn(`Session ${sessionId} did not acknowledge cancellation`, {
          sessionId,
          graceMs,
        });
        this.metrics?.recordEvent({
          timestamp: Date.now(),
          type: "error",
          sessionId,
          source: "delta-update-manager",
          error: "cancellation not acknowledged",
          severity: "warning",
        });
      }, graceMs),
    );
  }

  private onTerminal(session: DeltaSession<TFragment, THandle>, state: TerminalSessionState): void {
    const sessionId = session.id;
    this.clearTimer(this.lifetimeTimers, sessionId);
    this.clearTimer(this.cancelTimers, sessionId);

    const error = session.terminalError;
    if (error) {
      this.logger.warn(`Session ${sessionId} failed`, { sessionId, error });
    } else {
      this.logger.info(`Session ${sessionId} ${state}`, {
        sessionId,
        fragmentCount: session.fragmentCount,
      });
    }
    this.metrics?.recordEvent({
      timestamp: Date.now(),
      type: "session:terminated",
      sessionId,
      state,
      fragmentCount: session.fragmentCount,
    });
    this.emit("session:terminated", { sessionId, state, error });
  }

  private async launchedOrTerminal(session: DeltaSession<TFragment, THandle>): Promise<void> {
    const detach = new AbortController();
    const terminal = this.settled(session, detach.signal).catch((error: unknown) => {
      if (!detach.signal.aborted) throw error;
    });
    try {
      await Promise.race([session.started, terminal]);
    } finally {
      detach.abort();
    }
  }

  private async settled(
    session: DeltaSession<TFragment, THandle>,
    signal?: AbortSignal,
  ): Promise<void> {
    if (session.isTerminal) return;
    await session.waitFor("state:changed", (change) => isTerminalState(change.to), signal);
  }

  private lookup(
    sessionId: string,
    operation: RequestRejectedEvent["operation"],
  ): DeltaSession<TFragment, THandle> {
    const session = this.registry.find(sessionId);
    if (!session) {
      const error = new NotFoundError(sessionId);
      this.recordRejection(operation, error, sessionId);
      throw error;
    }
    return session;
  }

  private recordRejection(
    operation: RequestRejectedEvent["operation"],
    error: unknown,
    sessionId: string | undefined,
  ): void {
    if (!(error instanceof XcdeltaError)) return;
    this.logger.debug?.(`Rejected ${operation}: ${error.message}`, { sessionId, code: error.code });
    this.metrics?.recordEvent({
      timestamp: Date.now(),
      type: "request:rejected",
      sessionId,
      operation,
      code: error.code,
    });
  }

  private clearTimer(timers: Map<string, ReturnType<typeof setTimeout>>, sessionId: string): void {
    const timer = timers.get(sessionId);
    if (!timer) return;
    clearTimeout(timer);
    timers.delete(sessionId);
  }
}
