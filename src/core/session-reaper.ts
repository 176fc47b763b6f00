import type {
  SessionReaper as ISessionReaper,
  SessionReaperDeps,
} from "./interfaces/session-reaper.js";

/**
 * Evicts terminal sessions once their retention window has passed.
 * Live sessions are never touched: the registry refuses to remove them.
 */
export class TerminalSessionReaper implements ISessionReaper {
  private reaperTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(private deps: SessionReaperDeps) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule();
  }

  stop(): void {
    this.running = false;
    if (!this.reaperTimer) return;
    clearTimeout(this.reaperTimer);
    this.reaperTimer = null;
  }

  sweep(now = Date.now()): string[] {
    const expired = this.deps.registry.listTerminalOlderThan(this.deps.retentionMs, now);
    const removed: string[] = [];

    for (const sessionId of expired) {
      if (!this.deps.registry.remove(sessionId)) continue;
      removed.push(sessionId);
      this.deps.logger.info(`Reaped terminal session ${sessionId}`, {
        retentionMs: this.deps.retentionMs,
      });
      try {
        this.deps.onReaped?.(sessionId);
      } catch (error) {
        this.deps.logger.warn(`Reap listener failed for session ${sessionId}`, { error });
      }
    }
    return removed;
  }

  private schedule(): void {
    this.reaperTimer = setTimeout(() => {
      if (!this.running) return;
      this.sweep();
      if (this.running) this.schedule();
    }, this.deps.intervalMs);
  }
}
