/**
 * Session Lifecycle: state machine for delta sessions.
 *
 * pending → running → {completed, failed, cancelled}. A pending session may
 * also fail to start or be cancelled before its operation is underway.
 * Terminal states admit no transitions at all.
 *
 * @module SessionControl
 */

export const SESSION_STATES = ["pending", "running", "completed", "failed", "cancelled"] as const;

export type SessionState = (typeof SESSION_STATES)[number];

export type TerminalSessionState = Extract<SessionState, "completed" | "failed" | "cancelled">;

const ALLOWED_TRANSITIONS: Record<SessionState, ReadonlySet<SessionState>> = {
  pending: new Set(["running", "failed", "cancelled"]),
  running: new Set(["completed", "failed", "cancelled"]),
  completed: new Set(),
  failed: new Set(),
  cancelled: new Set(),
};

export function isSessionTransitionAllowed(from: SessionState, to: SessionState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}

export function isTerminalState(state: SessionState): state is TerminalSessionState {
  return ALLOWED_TRANSITIONS[state].size === 0;
}

export function assertSessionTransition(
  sessionId: string,
  from: SessionState,
  to: SessionState,
): void {
  if (!isSessionTransitionAllowed(from, to)) {
    throw new Error(`Invalid session state transition for ${sessionId}: ${from} -> ${to}`);
  }
}
