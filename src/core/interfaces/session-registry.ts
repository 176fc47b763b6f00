import type { OperationHandle, SessionOperationStarter } from "../../interfaces/operation.js";
import type { DeltaSession } from "../delta-session.js";

/**
 * Identifier-keyed store of delta sessions. The single point of mutual
 * exclusion for the identifier namespace: every operation start goes
 * through `create`.
 */
export interface SessionRegistry<TFragment, THandle extends OperationHandle = OperationHandle> {
  /**
   * Check-and-insert in one step, then launch the operation.
   * Throws AlreadyExistsError on a live or retained entry, SessionLimitError at capacity.
   */
  create(
    sessionId: string,
    starter: SessionOperationStarter<TFragment, THandle>,
  ): DeltaSession<TFragment, THandle>;

  /** Throws NotFoundError for unknown or reaped identifiers. */
  get(sessionId: string): DeltaSession<TFragment, THandle>;

  find(sessionId: string): DeltaSession<TFragment, THandle> | undefined;

  /** Remove a terminal session. No-op (false) for live or unknown ones. */
  remove(sessionId: string): boolean;

  /** Identifiers of sessions terminated at least `ageMs` before `now`. */
  listTerminalOlderThan(ageMs: number, now?: number): string[];

  list(): DeltaSession<TFragment, THandle>[];

  /** Number of sessions that have not reached a terminal state. */
  readonly liveCount: number;

  readonly size: number;
}
