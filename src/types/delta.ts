import type { SessionState } from "../core/session-lifecycle.js";

/**
 * Position a poller has consumed up to. `results` counts fragments, `log`
 * counts characters of log text. Returned with every snapshot; pass it back
 * on the next poll.
 */
export interface DeltaCursor {
  results: number;
  log: number;
}

/**
 * A plain number is shorthand for a fragment position; the log slice then
 * starts at the log text reported after that fragment was appended.
 */
export type DeltaCursorInput = number | DeltaCursor;

/** Incremental view of a session since a cursor. Never mutated once built. */
export interface DeltaSnapshot<TFragment> {
  readonly identifier: string;
  /** Fragments after the cursor, in report order. */
  readonly results: readonly TFragment[];
  /** Log text reported after the cursor. */
  readonly logOutput: string;
  readonly state: SessionState;
  /** Non-null only for a failed session. */
  readonly terminalError: Error | null;
  /** Cursor to pass on the next poll. */
  readonly cursor: DeltaCursor;
}

/** Summary used for listings and the HTTP API. */
export interface SessionInfo {
  sessionId: string;
  state: SessionState;
  fragmentCount: number;
  logLength: number;
  createdAt: number;
  terminatedAt: number | null;
  cancelReason: CancelReason | null;
}

export type CancelReason = "requested" | "timeout" | "shutdown";
