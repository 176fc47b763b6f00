export class XcdeltaError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "XcdeltaError";
    this.code = code;
  }
}

// ── Session errors ──

/** Malformed or unsupported request. Raised before any operation starts. */
export class InvalidRequestError extends XcdeltaError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, "INVALID_REQUEST", options);
    this.name = "InvalidRequestError";
    this.issues = issues;
  }
}

export class AlreadyExistsError extends XcdeltaError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} already exists`, "ALREADY_EXISTS");
    this.name = "AlreadyExistsError";
    this.sessionId = sessionId;
  }
}

export class NotFoundError extends XcdeltaError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`, "NOT_FOUND");
    this.name = "NotFoundError";
    this.sessionId = sessionId;
  }
}

export class SessionLimitError extends XcdeltaError {
  readonly limit: number;

  constructor(limit: number) {
    super(`Session limit reached (${limit} live sessions)`, "SESSION_LIMIT");
    this.name = "SessionLimitError";
    this.limit = limit;
  }
}

/** Failure discovered while an operation ran. Only ever delivered through a delta. */
export class OperationFailedError extends XcdeltaError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "OPERATION_FAILED", options);
    this.name = "OperationFailedError";
  }
}

// ── Collaborator errors ──

export class StorageError extends XcdeltaError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "STORAGE", options);
    this.name = "StorageError";
  }
}

export class ProcessError extends XcdeltaError {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null, options?: ErrorOptions) {
    super(message, "PROCESS", options);
    this.name = "ProcessError";
    this.exitCode = exitCode;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to XcdeltaError (preserves cause chain). */
export function toXcdeltaError(value: unknown): XcdeltaError {
  if (value instanceof XcdeltaError) return value;
  if (value instanceof Error) return new XcdeltaError(value.message, "UNKNOWN", { cause: value });
  return new XcdeltaError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

/** Shape an error takes once it crosses the transport boundary. */
export interface SerializedError {
  name: string;
  code: string;
  message: string;
}

export function serializeError(error: Error): SerializedError {
  return {
    name: error.name,
    code: error instanceof XcdeltaError ? error.code : "UNKNOWN",
    message: error.message,
  };
}
