import { EventEmitter } from "node:events";
import type { IncomingMessage, ServerResponse } from "node:http";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { ManagerConfig } from "../types/config.js";
import {
  FakeBundleStorage,
  FakeTemporaryDirectory,
  FakeXCTestTarget,
  type FakeXCTestTargetOptions,
  testRunUpdate,
} from "../testing/fake-xctest.js";
import { createXCTestManager, type XCTestDeltaUpdateManager } from "../xctest/xctest-manager.js";
import { handleApiSessions } from "./api-sessions.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const BUNDLE_ID = "com.example.Tests";

function mockReq(method: string): IncomingMessage {
  const emitter = new EventEmitter() as IncomingMessage & EventEmitter;
  (emitter as unknown as Record<string, unknown>).method = method;
  (emitter as unknown as Record<string, unknown>).destroy = vi.fn();
  return emitter as IncomingMessage;
}

function mockRes(): ServerResponse & {
  _status: number | null;
  _headers: Record<string, unknown>;
  _body: string;
} {
  const res = {
    _status: null as number | null,
    _headers: {} as Record<string, unknown>,
    _body: "",
    writeHead: vi.fn(function (
      this: typeof res,
      status: number,
      headers?: Record<string, unknown>,
    ) {
      this._status = status;
      if (headers) Object.assign(this._headers, headers);
    }),
    end: vi.fn(function (this: typeof res, body?: string) {
      if (body) this._body = body;
    }),
  };
  return res as unknown as ReturnType<typeof mockRes>;
}

function makeUrl(path: string): URL {
  return new URL(path, "http://localhost");
}

function sendBody(req: IncomingMessage, body: string): void {
  (req as unknown as EventEmitter).emit("data", Buffer.from(body));
  (req as unknown as EventEmitter).emit("end");
}

let manager: XCTestDeltaUpdateManager | undefined;

function setup(targetOptions: FakeXCTestTargetOptions = {}, config: ManagerConfig = {}) {
  const target = new FakeXCTestTarget(targetOptions);
  manager = createXCTestManager({
    target,
    bundleStorage: new FakeBundleStorage([BUNDLE_ID]),
    temporaryDirectory: new FakeTemporaryDirectory(),
    config,
  });
  return { manager, target };
}

function get(service: XCTestDeltaUpdateManager, path: string) {
  const res = mockRes();
  handleApiSessions(mockReq("GET"), res, makeUrl(path), service);
  return res;
}

async function post(service: XCTestDeltaUpdateManager, body: string) {
  const req = mockReq("POST");
  const res = mockRes();
  handleApiSessions(req, res, makeUrl("/api/sessions"), service);
  sendBody(req, body);
  await vi.waitFor(() => {
    expect(res._status).not.toBeNull();
  });
  return res;
}

const validRequest = JSON.stringify({
  sessionId: "S1",
  testBundleId: BUNDLE_ID,
  mode: { kind: "logic" },
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("handleApiSessions", () => {
  afterEach(async () => {
    await manager?.stop();
    manager = undefined;
  });

  // ---- POST /api/sessions ----

  it("POST /api/sessions starts a session and returns 201", async () => {
    const { manager, target } = setup();

    const res = await post(manager, validRequest);

    expect(res._status).toBe(201);
    expect(res._headers["Content-Type"]).toBe("application/json");
    expect(JSON.parse(res._body)).toEqual({ sessionId: "S1" });
    await manager.waitForTerminal("S1");
    expect(target.runs).toHaveLength(1);
  });

  it("POST /api/sessions with invalid JSON returns 400", async () => {
    const { manager } = setup();

    const res = await post(manager, "{not json");

    expect(res._status).toBe(400);
    expect(JSON.parse(res._body)).toEqual({ error: "Invalid JSON" });
  });

  it("POST /api/sessions with an empty body returns the validation issues", async () => {
    const { manager } = setup();

    const res = await post(manager, "");

    expect(res._status).toBe(400);
    const body = JSON.parse(res._body);
    expect(body.error).toBe("Invalid XCTest run request");
    expect(body.code).toBe("INVALID_REQUEST");
    expect(body.issues).toContain("testBundleId: Required");
    expect(body.issues).toContain("mode: Required");
  });

  it("POST /api/sessions with an existing identifier returns 409", async () => {
    const { manager } = setup({ autoFinish: false });
    await post(manager, validRequest);

    const res = await post(manager, validRequest);

    expect(res._status).toBe(409);
    expect(JSON.parse(res._body)).toEqual({
      error: "Session S1 already exists",
      code: "ALREADY_EXISTS",
    });
  });

  it("POST /api/sessions beyond the live session cap returns 429", async () => {
    const { manager } = setup({ autoFinish: false }, { maxConcurrentSessions: 1 });
    await post(manager, validRequest);

    const res = await post(
      manager,
      JSON.stringify({ sessionId: "S2", testBundleId: BUNDLE_ID, mode: { kind: "logic" } }),
    );

    expect(res._status).toBe(429);
    expect(JSON.parse(res._body).code).toBe("SESSION_LIMIT");
  });

  it("POST /api/sessions with body too large returns 413", async () => {
    const { manager } = setup();
    const req = mockReq("POST");
    const res = mockRes();

    handleApiSessions(req, res, makeUrl("/api/sessions"), manager);
    const bigChunk = Buffer.alloc(1024 * 1024 + 1, "x");
    (req as unknown as EventEmitter).emit("data", bigChunk);

    await vi.waitFor(() => {
      expect(res._status).toBe(413);
    });
    expect(req.destroy).toHaveBeenCalled();
    expect(JSON.parse(res._body)).toEqual({ error: "Request body too large" });
  });

  // ---- GET /api/sessions ----

  it("GET /api/sessions lists retained sessions", async () => {
    const { manager } = setup();
    await post(manager, validRequest);
    await manager.waitForTerminal("S1");

    const res = get(manager, "/api/sessions");

    expect(res._status).toBe(200);
    const sessions = JSON.parse(res._body);
    expect(sessions).toHaveLength(1);
    expect(sessions[0]).toMatchObject({ sessionId: "S1", state: "completed" });
  });

  // ---- GET /api/sessions/:id ----

  it("GET /api/sessions/:id returns the session summary", async () => {
    const { manager } = setup({ steps: [{ update: testRunUpdate() }] });
    await post(manager, validRequest);
    await manager.waitForTerminal("S1");

    const res = get(manager, "/api/sessions/S1");

    expect(res._status).toBe(200);
    expect(JSON.parse(res._body)).toMatchObject({
      sessionId: "S1",
      state: "completed",
      fragmentCount: 1,
      logLength: 0,
    });
  });

  it("GET /api/sessions/:id returns 404 for an unknown session", () => {
    const { manager } = setup();

    const res = get(manager, "/api/sessions/nope");

    expect(res._status).toBe(404);
    expect(JSON.parse(res._body)).toEqual({ error: "Session nope not found", code: "NOT_FOUND" });
  });

  // ---- GET /api/sessions/:id/delta ----

  describe("delta", () => {
    const first = testRunUpdate({ methodName: "testOne" });
    const second = testRunUpdate({ methodName: "testTwo" });

    async function finished() {
      const { manager } = setup({
        steps: [{ update: first }, { output: "x\n" }, { update: second }],
      });
      await post(manager, validRequest);
      await manager.waitForTerminal("S1");
      return manager;
    }

    it("returns everything without a cursor", async () => {
      const manager = await finished();

      const res = get(manager, "/api/sessions/S1/delta");

      expect(res._status).toBe(200);
      expect(JSON.parse(res._body)).toEqual({
        identifier: "S1",
        results: [first, second],
        logOutput: "x\n",
        state: "completed",
        terminalError: null,
        cursor: { results: 2, log: 2 },
        resultBundlePath: "/tmp/xcdelta/S1/result.xcresult",
      });
    });

    it("slices after a fragment cursor", async () => {
      const manager = await finished();

      const body = JSON.parse(get(manager, "/api/sessions/S1/delta?cursor=1")._body);

      expect(body.results).toEqual([second]);
      expect(body.logOutput).toBe("x\n");
    });

    it("takes an exact cursor when log is given", async () => {
      const manager = await finished();

      const body = JSON.parse(get(manager, "/api/sessions/S1/delta?cursor=1&log=2")._body);

      expect(body.results).toEqual([second]);
      expect(body.logOutput).toBe("");
    });

    it("returns 400 for a cursor that is not a number", async () => {
      const manager = await finished();

      const res = get(manager, "/api/sessions/S1/delta?cursor=abc");

      expect(res._status).toBe(400);
      expect(JSON.parse(res._body)).toEqual({
        error: "Invalid cursor: results must be a non-negative integer",
        code: "INVALID_REQUEST",
      });
    });

    it("serialises the terminal error of a failed run", async () => {
      const { manager } = setup({ failWith: new Error("simulator crashed") });
      await post(manager, validRequest);
      await manager.waitForTerminal("S1");

      const body = JSON.parse(get(manager, "/api/sessions/S1/delta")._body);

      expect(body.state).toBe("failed");
      expect(body.terminalError).toEqual({
        name: "OperationFailedError",
        code: "OPERATION_FAILED",
        message: "Test run failed: simulator crashed",
      });
    });

    it("returns 404 for an unknown session", () => {
      const { manager } = setup();

      expect(get(manager, "/api/sessions/nope/delta")._status).toBe(404);
    });
  });

  // ---- DELETE /api/sessions/:id ----

  it("DELETE /api/sessions/:id requests cancellation and returns the snapshot", async () => {
    const { manager, target } = setup({ autoFinish: false });
    await post(manager, validRequest);
    await vi.waitFor(() => {
      expect(target.runs).toHaveLength(1);
    });

    const res = mockRes();
    handleApiSessions(mockReq("DELETE"), res, makeUrl("/api/sessions/S1"), manager);

    expect(res._status).toBe(200);
    expect(JSON.parse(res._body)).toMatchObject({ identifier: "S1", results: [] });
    expect(target.lastRun().signal.aborted).toBe(true);
    const delta = await manager.waitForTerminal("S1");
    expect(delta.state).toBe("cancelled");
  });

  it("DELETE /api/sessions/:id returns 404 for an unknown session", () => {
    const { manager } = setup();
    const res = mockRes();

    handleApiSessions(mockReq("DELETE"), res, makeUrl("/api/sessions/nope"), manager);

    expect(res._status).toBe(404);
  });

  // ---- Fallthrough ----

  it("returns 405 for an unsupported method", () => {
    const { manager } = setup();
    const res = mockRes();

    handleApiSessions(mockReq("PUT"), res, makeUrl("/api/sessions/S1"), manager);

    expect(res._status).toBe(405);
    expect(JSON.parse(res._body)).toEqual({ error: "Method not allowed" });
  });

  it("returns 404 for paths below an action", () => {
    const { manager } = setup();

    expect(get(manager, "/api/sessions/S1/delta/extra")._status).toBe(404);
  });
});
