import type { Logger } from "../interfaces/logger.js";

/** Discards everything. Default for embedders that bring no logger. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
