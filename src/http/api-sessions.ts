import type { IncomingMessage, ServerResponse } from "node:http";
import {
  AlreadyExistsError,
  errorMessage,
  InvalidRequestError,
  NotFoundError,
  SessionLimitError,
  serializeError,
  XcdeltaError,
} from "../errors.js";
import type {
  CancelReason,
  DeltaCursorInput,
  DeltaSnapshot,
  SessionInfo,
} from "../types/delta.js";

const MAX_BODY_BYTES = 1024 * 1024; // 1 MB
const BODY_TOO_LARGE = "Request body too large";

/** What the HTTP API needs from a manager; XCTestDeltaUpdateManager provides it. */
export interface SessionService {
  /** Validates the untrusted request body itself. */
  startSession(input: unknown): Promise<string>;
  poll(sessionId: string, since?: DeltaCursorInput): DeltaSnapshot<unknown>;
  terminate(sessionId: string, reason?: CancelReason): SessionInfo;
  getSessionInfo(sessionId: string): SessionInfo;
  listSessions(): SessionInfo[];
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let rejected = false;
    req.on("data", (chunk: Buffer) => {
      totalBytes += chunk.length;
      if (totalBytes > MAX_BODY_BYTES) {
        rejected = true;
        req.destroy();
        reject(new Error(BODY_TOO_LARGE));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!rejected) resolve(Buffer.concat(chunks).toString());
    });
    req.on("error", (err) => {
      if (!rejected) reject(err);
    });
  });
}

function json(res: ServerResponse, status: number, data: unknown): void {
  const body = JSON.stringify(data);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(body),
  });
  res.end(body);
}

function statusFor(error: unknown): number {
  if (error instanceof InvalidRequestError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof AlreadyExistsError) return 409;
  if (error instanceof SessionLimitError) return 429;
  if (error instanceof Error && error.message === BODY_TOO_LARGE) return 413;
  return 500;
}

function sendError(res: ServerResponse, error: unknown): void {
  const body: Record<string, unknown> = { error: errorMessage(error) };
  if (error instanceof XcdeltaError) body.code = error.code;
  if (error instanceof InvalidRequestError && error.issues.length > 0) body.issues = error.issues;
  json(res, statusFor(error), body);
}

/** JSON form of a snapshot; errors do not survive JSON.stringify on their own. */
export function serializeSnapshot(snapshot: DeltaSnapshot<unknown>): Record<string, unknown> {
  return {
    ...snapshot,
    terminalError: snapshot.terminalError ? serializeError(snapshot.terminalError) : null,
  };
}

/** `?cursor=N` alone is a fragment position; with `&log=M` it is an exact cursor. */
function parseCursor(url: URL): DeltaCursorInput {
  const results = Number(url.searchParams.get("cursor") ?? 0);
  const log = url.searchParams.get("log");
  return log === null ? results : { results, log: Number(log) };
}

export function handleApiSessions(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  service: SessionService,
): void {
  const segments = url.pathname.split("/").filter(Boolean); // ["api", "sessions", ...]
  const method = req.method ?? "GET";

  // GET /api/sessions: list retained sessions
  if (segments.length === 2 && method === "GET") {
    json(res, 200, service.listSessions());
    return;
  }

  // POST /api/sessions: start a session
  if (segments.length === 2 && method === "POST") {
    readBody(req)
      .then(async (body) => {
        let input: unknown;
        try {
          input = body ? JSON.parse(body) : {};
        } catch {
          json(res, 400, { error: "Invalid JSON" });
          return;
        }
        const sessionId = await service.startSession(input);
        json(res, 201, { sessionId });
      })
      .catch((err: unknown) => sendError(res, err));
    return;
  }

  // /api/sessions/:id
  const sessionId = segments[2];
  const action = segments[3];
  if (!sessionId || segments.length > 4) {
    json(res, 404, { error: "Not found" });
    return;
  }

  try {
    // GET /api/sessions/:id: session summary
    if (method === "GET" && action === undefined) {
      json(res, 200, service.getSessionInfo(sessionId));
      return;
    }

    // GET /api/sessions/:id/delta?cursor=N[&log=M]: everything since the cursor
    if (method === "GET" && action === "delta") {
      json(res, 200, serializeSnapshot(service.poll(sessionId, parseCursor(url))));
      return;
    }

    // DELETE /api/sessions/:id: request cancellation, reply with the current snapshot
    if (method === "DELETE" && action === undefined) {
      service.terminate(sessionId);
      json(res, 200, serializeSnapshot(service.poll(sessionId)));
      return;
    }
  } catch (err) {
    sendError(res, err);
    return;
  }

  json(res, 405, { error: "Method not allowed" });
}
