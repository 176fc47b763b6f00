import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ProcessError } from "../errors.js";
import { MockProcessManager } from "../testing/mock-process-manager.js";
import { parseXCTestRunRequest } from "../xctest/xctest-request.js";
import type { TestRunUpdate, XCTestRunPlan } from "../xctest/types.js";
import { XcodebuildTarget } from "./xcodebuild-target.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function plan(overrides: Record<string, unknown> = {}): XCTestRunPlan {
  return {
    sessionId: "S1",
    bundle: { bundleId: "com.example.Tests", path: "/bundles/com.example.Tests.xctestrun" },
    request: parseXCTestRunRequest({
      testBundleId: "com.example.Tests",
      mode: { kind: "logic" },
      ...overrides,
    }),
    workingDirectory: "/tmp/xcdelta/S1",
    resultBundlePath: "/tmp/xcdelta/S1/result.xcresult",
  };
}

function setup() {
  const processManager = new MockProcessManager();
  const target = new XcodebuildTarget({
    udid: "SIM-1",
    processManager,
    env: { PATH: "/usr/bin" },
    killGracePeriodMs: 1000,
  });
  const updates: TestRunUpdate[] = [];
  let output = "";
  const listener = {
    testCaseFinished: (update: TestRunUpdate) => updates.push(update),
    output: (text: string) => {
      output += text;
    },
  };
  return { processManager, target, listener, updates, output: () => output };
}

function spawned(processManager: MockProcessManager) {
  const proc = processManager.lastProcess;
  if (!proc) throw new Error("xcodebuild was not spawned");
  return proc;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("XcodebuildTarget", () => {
  it("runs test-without-building against the destination", async () => {
    const { processManager, target, listener } = setup();

    const running = target.runTests(
      plan({
        testsToRun: ["MathTests/testAddition"],
        testsToSkip: ["SlowTests"],
        collectCoverage: true,
        environment: { API_HOST: "localhost" },
      }),
      listener,
      new AbortController().signal,
    );
    spawned(processManager).resolveExit(0);
    await running;

    expect(processManager.spawnCalls[0]).toEqual({
      command: "xcodebuild",
      args: [
        "test-without-building",
        "-xctestrun",
        "/bundles/com.example.Tests.xctestrun",
        "-destination",
        "id=SIM-1",
        "-resultBundlePath",
        "/tmp/xcdelta/S1/result.xcresult",
        "-only-testing:MathTests/testAddition",
        "-skip-testing:SlowTests",
        "-enableCodeCoverage",
        "YES",
      ],
      cwd: "/tmp/xcdelta/S1",
      env: { PATH: "/usr/bin", TEST_RUNNER_API_HOST: "localhost" },
    });
  });

  it("reports finished tests and forwards all output", async () => {
    const { processManager, target, listener, updates, output } = setup();

    const running = target.runTests(plan(), listener, new AbortController().signal);
    const proc = spawned(processManager);
    proc.writeStdout("Test Case '-[ExampleTests.A testOne]' started.\n");
    proc.writeStdout("Test Case '-[ExampleTests.A testOne]' passed (0.010 seconds).\n");
    proc.writeStderr("warning: something\n");
    proc.resolveExit(65);
    await running;

    expect(updates).toEqual([
      {
        bundleName: "ExampleTests",
        className: "A",
        methodName: "testOne",
        status: "passed",
        duration: 0.01,
        logs: [],
      },
    ]);
    expect(output()).toContain("Test Case '-[ExampleTests.A testOne]' passed (0.010 seconds).\n");
    expect(output()).toContain("warning: something\n");
  });

  it("rejects with ProcessError on other exit codes", async () => {
    const { processManager, target, listener } = setup();

    const running = target.runTests(plan(), listener, new AbortController().signal);
    spawned(processManager).resolveExit(70);

    await expect(running).rejects.toThrow(ProcessError);
    await expect(running).rejects.toThrow("xcodebuild exited with code 70");
  });

  it("does not spawn when already aborted", async () => {
    const { processManager, target, listener } = setup();
    const controller = new AbortController();
    controller.abort();

    await target.runTests(plan(), listener, controller.signal);

    expect(processManager.spawnCalls).toHaveLength(0);
  });

  describe("abort", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("sends SIGTERM and resolves once xcodebuild exits", async () => {
      const { processManager, target, listener } = setup();
      const controller = new AbortController();

      const running = target.runTests(plan(), listener, controller.signal);
      const proc = spawned(processManager);
      controller.abort();

      await expect(running).resolves.toBeUndefined();
      expect(proc.killCalls).toEqual(["SIGTERM"]);
    });
  });
});
