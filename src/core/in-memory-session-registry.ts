/**
 * InMemorySessionRegistry: Map-backed session registry.
 *
 * Node runs registry calls on a single thread, so a synchronous
 * check-then-set is atomic; nothing here awaits between the lookup and
 * the insert.
 *
 * @module SessionControl
 */

import { AlreadyExistsError, NotFoundError, SessionLimitError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { OperationHandle, SessionOperationStarter } from "../interfaces/operation.js";
import { DeltaSession } from "./delta-session.js";
import type { SessionRegistry } from "./interfaces/session-registry.js";

export interface InMemorySessionRegistryOptions {
  /** Live-session cap; 0 or absent means unlimited. */
  maxLiveSessions?: number;
  logger?: Logger;
}

export class InMemorySessionRegistry<TFragment, THandle extends OperationHandle = OperationHandle>
  implements SessionRegistry<TFragment, THandle>
{
  private sessions = new Map<string, DeltaSession<TFragment, THandle>>();
  private readonly maxLiveSessions: number;
  private readonly logger: Logger | undefined;

  constructor(options: InMemorySessionRegistryOptions = {}) {
    this.maxLiveSessions = options.maxLiveSessions ?? 0;
    this.logger = options.logger;
  }

  create(
    sessionId: string,
    starter: SessionOperationStarter<TFragment, THandle>,
  ): DeltaSession<TFragment, THandle> {
    if (this.sessions.has(sessionId)) {
      throw new AlreadyExistsError(sessionId);
    }
    if (this.maxLiveSessions > 0 && this.liveCount >= this.maxLiveSessions) {
      throw new SessionLimitError(this.maxLiveSessions);
    }

    const session = new DeltaSession<TFragment, THandle>({ id: sessionId, logger: this.logger });
    this.sessions.set(sessionId, session);
    session.launch(starter).catch((error: unknown) => {
      this.logger?.error("Session launch bookkeeping failed", { sessionId, error });
    });
    return session;
  }

  get(sessionId: string): DeltaSession<TFragment, THandle> {
    const session = this.sessions.get(sessionId);
    if (!session) throw new NotFoundError(sessionId);
    return session;
  }

  find(sessionId: string): DeltaSession<TFragment, THandle> | undefined {
    return this.sessions.get(sessionId);
  }

  remove(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session?.isTerminal) return false;
    this.sessions.delete(sessionId);
    session.removeAllListeners();
    return true;
  }

  listTerminalOlderThan(ageMs: number, now = Date.now()): string[] {
    const ids: string[] = [];
    for (const session of this.sessions.values()) {
      const terminatedAt = session.terminatedAt;
      if (terminatedAt !== null && now - terminatedAt >= ageMs) {
        ids.push(session.id);
      }
    }
    return ids;
  }

  list(): DeltaSession<TFragment, THandle>[] {
    return Array.from(this.sessions.values());
  }

  get liveCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (!session.isTerminal) count++;
    }
    return count;
  }

  get size(): number {
    return this.sessions.size;
  }
}
