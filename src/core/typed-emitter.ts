import { EventEmitter } from "node:events";

/**
 * Type-safe event emitter built on node:events.
 *
 * Usage:
 * ```ts
 * interface SessionEvents {
 *   "state:changed": { from: SessionState; to: SessionState };
 * }
 * class Session extends TypedEventEmitter<SessionEvents> {}
 * ```
 */
export class TypedEventEmitter<TEvents extends object> {
  private emitter = new EventEmitter();

  constructor() {
    // Pollers waiting on terminal sessions each hold a listener
    this.emitter.setMaxListeners(100);
  }

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener as (...args: unknown[]) => void);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.once(event, listener as (...args: unknown[]) => void);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.off(event, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Resolve with the first payload of `event` that satisfies `predicate`.
   * Rejects when `signal` aborts first; the listener is removed either way.
   */
  waitFor<K extends keyof TEvents & string>(
    event: K,
    predicate: (payload: TEvents[K]) => boolean = () => true,
    signal?: AbortSignal,
  ): Promise<TEvents[K]> {
    return new Promise<TEvents[K]>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => {
        this.off(event, listener);
        reject(signal?.reason);
      };
      const listener = (payload: TEvents[K]) => {
        if (!predicate(payload)) return;
        this.off(event, listener);
        signal?.removeEventListener("abort", onAbort);
        resolve(payload);
      };
      this.on(event, listener);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
