import type { LogContext, Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_KEYS = new Set(["time", "level", "msg", "component"]);

/** Map a level name ("debug", "INFO", …) to a LogLevel, or undefined when unknown. */
export function parseLogLevel(name: string): LogLevel | undefined {
  const normalized = name.trim().toLowerCase();
  for (const [level, levelName] of Object.entries(LEVEL_NAMES)) {
    if (levelName === normalized) return Number(level);
  }
  return undefined;
}

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  /** Fields stamped on every line (e.g. the target udid). */
  bindings?: LogContext;
}

/** JSON-lines logger. Writes to stderr unless a writer is supplied. */
export class StructuredLogger implements Logger {
  private writer: (line: string) => void;
  private level: LogLevel;
  private component: string | undefined;
  private bindings: LogContext;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.DEBUG;
    this.component = options.component;
    this.bindings = options.bindings ?? {};
  }

  /** Logger sharing this writer and level, tagged with another component and extra bindings. */
  child(component: string, bindings: LogContext = {}): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.level,
      component,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: LogContext): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
    };

    if (this.component) entry.component = this.component;

    for (const [key, value] of Object.entries({ ...this.bindings, ...ctx })) {
      if (RESERVED_KEYS.has(key)) continue;
      if (value instanceof Error) {
        entry[key] = value.message;
        entry[`${key}Stack`] = value.stack;
      } else {
        entry[key] = value;
      }
    }

    try {
      this.writer(JSON.stringify(entry));
    } catch {
      // Circular reference or serialization failure; emit a fallback line
      this.writer(
        JSON.stringify({ time: entry.time, level: entry.level, msg, serializationError: true }),
      );
    }
  }
}
