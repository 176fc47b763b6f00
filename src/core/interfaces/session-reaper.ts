import type { Logger } from "../../interfaces/logger.js";
import type { SessionRegistry } from "./session-registry.js";

export interface SessionReaper {
  start(): void;
  stop(): void;
  /** Run one pass now. Returns the identifiers removed. */
  sweep(now?: number): string[];
}

export interface SessionReaperDeps {
  registry: Pick<SessionRegistry<unknown>, "listTerminalOlderThan" | "remove">;
  logger: Logger;
  retentionMs: number;
  intervalMs: number;
  onReaped?: (sessionId: string) => void;
}
