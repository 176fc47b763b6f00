/**
 * DeltaSession: one tracked run of an operation.
 *
 * Holds the append-only fragment sequence and log buffer the operation reports
 * into, the lifecycle state, and the terminal error. Every mutation and every
 * snapshot is synchronous, so a snapshot always reflects a single point in the
 * report order: a terminal state is never observed without the fragments and
 * log text reported before it.
 *
 * @module SessionControl
 */

import { InvalidRequestError, toXcdeltaError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  OperationContext,
  OperationHandle,
  OperationOutcome,
  SessionOperationStarter,
} from "../interfaces/operation.js";
import type {
  CancelReason,
  DeltaCursor,
  DeltaCursorInput,
  DeltaSnapshot,
  SessionInfo,
} from "../types/delta.js";
import { assertSessionTransition, isTerminalState, type SessionState } from "./session-lifecycle.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface SessionStateChange {
  sessionId: string;
  from: SessionState;
  to: SessionState;
}

export interface DeltaSessionEvents {
  "state:changed": SessionStateChange;
}

export interface DeltaSessionOptions {
  id: string;
  logger?: Logger;
}

export class DeltaSession<
  TFragment,
  THandle extends OperationHandle = OperationHandle,
> extends TypedEventEmitter<DeltaSessionEvents> {
  readonly id: string;
  readonly createdAt = Date.now();

  private _state: SessionState = "pending";
  private _error: Error | null = null;
  private _handle: THandle | null = null;
  private _terminatedAt: number | null = null;
  private _cancelReason: CancelReason | null = null;
  private readonly fragments: TFragment[] = [];
  private logText = "";
  // logMarks[n] is the log length at the moment fragment n was appended
  private readonly logMarks: number[] = [0];
  private readonly abortController = new AbortController();
  private launched: Promise<void> | null = null;
  private readonly logger: Logger | undefined;

  constructor(options: DeltaSessionOptions) {
    super();
    this.id = options.id;
    this.logger = options.logger;
  }

  get state(): SessionState {
    return this._state;
  }

  get terminalError(): Error | null {
    return this._error;
  }

  get handle(): THandle | null {
    return this._handle;
  }

  get terminatedAt(): number | null {
    return this._terminatedAt;
  }

  get cancelReason(): CancelReason | null {
    return this._cancelReason;
  }

  get isTerminal(): boolean {
    return isTerminalState(this._state);
  }

  get isCancelRequested(): boolean {
    return this._cancelReason !== null;
  }

  get fragmentCount(): number {
    return this.fragments.length;
  }

  get logLength(): number {
    return this.logText.length;
  }

  /** Settles once the operation start has been tracked; resolved before launch. */
  get started(): Promise<void> {
    return this.launched ?? Promise.resolve();
  }

  /**
   * Invoke the starter on a later microtask and track its outcome. The returned
   * promise settles once a handle is attached or the start has failed; it never
   * rejects. Calling again returns the same promise.
   */
  launch(starter: SessionOperationStarter<TFragment, THandle>): Promise<void> {
    if (this.launched) return this.launched;
    const context = this.createContext();
    this.launched = Promise.resolve()
      .then(() => starter(context))
      .then(
        (handle) => this.attach(handle),
        (error: unknown) => this.startFailed(error),
      );
    return this.launched;
  }

  /**
   * Ask the operation to stop. Aborts the context signal and forwards to the
   * handle once one exists. Returns false when the session is already terminal
   * or a stop was already requested.
   */
  requestCancel(reason: CancelReason): boolean {
    if (this.isTerminal || this._cancelReason !== null) return false;
    this._cancelReason = reason;
    this.abortController.abort();
    if (this._handle) this.cancelHandle(this._handle);
    return true;
  }

  /** Move to cancelled without the operation's acknowledgement. Later reports are dropped. */
  forceCancel(): boolean {
    if (this.isTerminal) return false;
    this._cancelReason ??= "requested";
    this.transition("cancelled");
    return true;
  }

  snapshot(since: DeltaCursorInput = 0): DeltaSnapshot<TFragment> {
    const cursor = normalizeCursor(since);
    const resultStart = Math.min(cursor.results, this.fragments.length);
    const logStart =
      typeof since === "number"
        ? (this.logMarks[resultStart] ?? this.logText.length)
        : Math.min(cursor.log, this.logText.length);

    return {
      identifier: this.id,
      results: this.fragments.slice(resultStart),
      logOutput: this.logText.slice(logStart),
      state: this._state,
      terminalError: this._error,
      cursor: { results: this.fragments.length, log: this.logText.length },
    };
  }

  info(): SessionInfo {
    return {
      sessionId: this.id,
      state: this._state,
      fragmentCount: this.fragments.length,
      logLength: this.logText.length,
      createdAt: this.createdAt,
      terminatedAt: this._terminatedAt,
      cancelReason: this._cancelReason,
    };
  }

  // ---------------------------------------------------------------------------
  // Producer side
  // ---------------------------------------------------------------------------

  private createContext(): OperationContext<TFragment> {
    return {
      sessionId: this.id,
      signal: this.abortController.signal,
      reporter: {
        fragment: (fragment) => this.appendFragment(fragment),
        log: (text) => this.appendLog(text),
        finish: (outcome) => this.finish(outcome),
      },
    };
  }

  private appendFragment(fragment: TFragment): void {
    if (this.dropIfTerminal("fragment")) return;
    this.markRunning();
    this.fragments.push(fragment);
    this.logMarks.push(this.logText.length);
  }

  private appendLog(text: string): void {
    if (text.length === 0 || this.dropIfTerminal("log")) return;
    this.markRunning();
    this.logText += text;
  }

  private finish(outcome: OperationOutcome): void {
    if (this.dropIfTerminal("finish")) return;
    this.markRunning();
    switch (outcome.status) {
      case "completed":
        this.transition("completed");
        break;
      case "failed":
        this.transition("failed", outcome.error);
        break;
      case "cancelled":
        this._cancelReason ??= "requested";
        this.transition("cancelled");
        break;
    }
  }

  private attach(handle: THandle): void {
    this._handle = handle;
    if (this.isTerminal) return;
    this.markRunning();
    if (this._cancelReason !== null) this.cancelHandle(handle);
  }

  private startFailed(error: unknown): void {
    if (this.isTerminal) {
      this.logger?.debug?.("Ignoring start failure of terminal session", {
        sessionId: this.id,
        error,
      });
      return;
    }
    if (this._cancelReason !== null) {
      this.transition("cancelled");
      return;
    }
    this.transition("failed", error instanceof Error ? error : toXcdeltaError(error));
  }

  private cancelHandle(handle: THandle): void {
    try {
      handle.cancel();
    } catch (error) {
      this.logger?.warn("Operation cancel() threw", { sessionId: this.id, error });
    }
  }

  private markRunning(): void {
    if (this._state === "pending") this.transition("running");
  }

  private dropIfTerminal(kind: string): boolean {
    if (!this.isTerminal) return false;
    this.logger?.debug?.(`Dropping ${kind} reported after termination`, {
      sessionId: this.id,
      state: this._state,
    });
    return true;
  }

  private transition(to: SessionState, error?: Error): void {
    const from = this._state;
    assertSessionTransition(this.id, from, to);
    this._state = to;
    if (isTerminalState(to)) {
      this._terminatedAt = Date.now();
      this._error = error ?? null;
    }
    this.emit("state:changed", { sessionId: this.id, from, to });
  }
}

function normalizeCursor(since: DeltaCursorInput): DeltaCursor {
  const cursor = typeof since === "number" ? { results: since, log: 0 } : since;
  for (const [field, value] of Object.entries(cursor)) {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new InvalidRequestError(`Invalid cursor: ${field} must be a non-negative integer`, [
        `cursor.${field}: ${String(value)}`,
      ]);
    }
  }
  return cursor;
}
