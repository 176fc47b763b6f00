/**
 * Minimal structured logger interface.
 * StructuredLogger and NoopLogger implement this; the session core programs to it.
 * @module
 */

/** Structured fields attached to a log line. `Error` values are expanded by the writer. */
export type LogContext = Record<string, unknown>;

/** Structured logger with optional debug level. */
export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
