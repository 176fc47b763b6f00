import { ProcessError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ProcessHandle, ProcessManager } from "../interfaces/process-manager.js";
import { readLines } from "../utils/line-buffer.js";
import type { XCTestRunListener, XCTestRunPlan, XCTestTarget } from "../xctest/types.js";
import { NoopLogger } from "./noop-logger.js";
import { XcodebuildOutputParser } from "./xcodebuild-output-parser.js";

/** xcodebuild exits with 65 when tests ran and some failed. */
const TEST_FAILURES_EXIT_CODE = 65;
const DEFAULT_KILL_GRACE_MS = 10_000;

export interface XcodebuildTargetOptions {
  /** Simulator or device identifier passed as `-destination id=<udid>`. */
  udid: string;
  processManager: ProcessManager;
  xcodebuildPath?: string;
  /** Time between SIGTERM and SIGKILL once a run is aborted. */
  killGracePeriodMs?: number;
  /** Base environment for xcodebuild; defaults to this process's environment. */
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

/** Runs `.xctestrun` bundles with `xcodebuild test-without-building`. */
export class XcodebuildTarget implements XCTestTarget {
  readonly udid: string;
  private readonly processManager: ProcessManager;
  private readonly xcodebuildPath: string;
  private readonly killGracePeriodMs: number;
  private readonly env: Record<string, string | undefined>;
  private readonly logger: Logger;

  constructor(options: XcodebuildTargetOptions) {
    this.udid = options.udid;
    this.processManager = options.processManager;
    this.xcodebuildPath = options.xcodebuildPath ?? "xcodebuild";
    this.killGracePeriodMs = options.killGracePeriodMs ?? DEFAULT_KILL_GRACE_MS;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? new NoopLogger();
  }

  async runTests(
    plan: XCTestRunPlan,
    listener: XCTestRunListener,
    signal: AbortSignal,
  ): Promise<void> {
    if (signal.aborted) return;
    const { request } = plan;
    if (request.arguments.length > 0 || request.waitForDebugger) {
      this.logger.warn("xcodebuild ignores launch arguments and waitForDebugger", {
        sessionId: plan.sessionId,
      });
    }

    const proc = this.processManager.spawn({
      command: this.xcodebuildPath,
      args: this.buildArgs(plan),
      cwd: plan.workingDirectory,
      env: this.buildEnv(plan),
    });
    this.logger.debug?.(`Spawned xcodebuild (pid ${proc.pid})`, { sessionId: plan.sessionId });

    let killTimer: ReturnType<typeof setTimeout> | null = null;
    const onAbort = () => {
      proc.kill("SIGTERM");
      killTimer = setTimeout(() => proc.kill("SIGKILL"), this.killGracePeriodMs);
    };
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      const exitCode = await this.collect(proc, plan, listener);
      if (signal.aborted) return;
      if (exitCode === 0 || exitCode === TEST_FAILURES_EXIT_CODE) return;
      throw new ProcessError(
        exitCode === null
          ? "xcodebuild was terminated by a signal"
          : `xcodebuild exited with code ${exitCode}`,
        exitCode,
      );
    } finally {
      signal.removeEventListener("abort", onAbort);
      if (killTimer) clearTimeout(killTimer);
    }
  }

  buildArgs(plan: XCTestRunPlan): string[] {
    const { request } = plan;
    const args = [
      "test-without-building",
      "-xctestrun",
      plan.bundle.path,
      "-destination",
      `id=${this.udid}`,
      "-resultBundlePath",
      plan.resultBundlePath,
    ];
    for (const test of request.testsToRun ?? []) args.push(`-only-testing:${test}`);
    for (const test of request.testsToSkip ?? []) args.push(`-skip-testing:${test}`);
    if (request.collectCoverage) args.push("-enableCodeCoverage", "YES");
    return args;
  }

  private buildEnv(plan: XCTestRunPlan): Record<string, string | undefined> {
    // xcodebuild hands TEST_RUNNER_-prefixed variables to the test process
    const env = { ...this.env };
    for (const [key, value] of Object.entries(plan.request.environment)) {
      env[`TEST_RUNNER_${key}`] = value;
    }
    return env;
  }

  private async collect(
    proc: ProcessHandle,
    plan: XCTestRunPlan,
    listener: XCTestRunListener,
  ): Promise<number | null> {
    const parser = new XcodebuildOutputParser(plan.bundle.bundleId);
    const reading: Promise<void>[] = [];
    if (proc.stdout) {
      reading.push(
        readLines(proc.stdout, (line) => {
          listener.output(`${line}\n`);
          const update = parser.feedLine(line);
          if (update) listener.testCaseFinished(update);
        }),
      );
    }
    if (proc.stderr) {
      reading.push(readLines(proc.stderr, (line) => listener.output(`${line}\n`)));
    }
    const [exitCode] = await Promise.all([proc.exited, Promise.all(reading)]);
    return exitCode;
  }
}
