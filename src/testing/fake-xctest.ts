import { StorageError } from "../errors.js";
import type {
  TemporaryDirectory,
  TestRunUpdate,
  XCTestBundleDescriptor,
  XCTestBundleStorage,
  XCTestRunListener,
  XCTestRunPlan,
  XCTestTarget,
} from "../xctest/types.js";

export type FakeRunStep = { update: TestRunUpdate } | { output: string };

export interface FakeXCTestTargetOptions {
  udid?: string;
  /** Reported synchronously as soon as the run starts. */
  steps?: FakeRunStep[];
  /** Resolve the run right after the steps (default true). */
  autoFinish?: boolean;
  /** Reject the run with this error after the steps. */
  failWith?: Error;
}

export interface FakeTargetRun {
  readonly plan: XCTestRunPlan;
  readonly listener: XCTestRunListener;
  readonly signal: AbortSignal;
  finish(): void;
  fail(error: Error): void;
}

/** XCTestTarget that plays scripted results; an aborted run resolves at once. */
export class FakeXCTestTarget implements XCTestTarget {
  readonly udid: string;
  readonly runs: FakeTargetRun[] = [];
  private readonly options: FakeXCTestTargetOptions;

  constructor(options: FakeXCTestTargetOptions = {}) {
    this.udid = options.udid ?? "FAKE-0000";
    this.options = options;
  }

  runTests(plan: XCTestRunPlan, listener: XCTestRunListener, signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.runs.push({ plan, listener, signal, finish: resolve, fail: reject });
      signal.addEventListener("abort", () => resolve(), { once: true });

      for (const step of this.options.steps ?? []) {
        if ("update" in step) listener.testCaseFinished(step.update);
        else listener.output(step.output);
      }
      if (this.options.failWith) reject(this.options.failWith);
      else if (this.options.autoFinish ?? true) resolve();
    });
  }

  lastRun(): FakeTargetRun {
    const run = this.runs.at(-1);
    if (!run) throw new Error("No test run started");
    return run;
  }
}

/** Bundle storage holding the given bundle identifiers under /bundles. */
export class FakeBundleStorage implements XCTestBundleStorage {
  private readonly bundleIds: Set<string>;

  constructor(bundleIds: string[]) {
    this.bundleIds = new Set(bundleIds);
  }

  async resolveTestBundle(bundleId: string): Promise<XCTestBundleDescriptor> {
    if (!this.bundleIds.has(bundleId)) {
      throw new StorageError(`Test bundle ${bundleId} not found`);
    }
    return { bundleId, path: `/bundles/${bundleId}.xctestrun` };
  }
}

/** Records directories instead of touching the filesystem. */
export class FakeTemporaryDirectory implements TemporaryDirectory {
  readonly created: string[] = [];
  readonly removed: string[] = [];

  async createSessionDirectory(sessionId: string): Promise<string> {
    const path = `/tmp/xcdelta/${sessionId}`;
    this.created.push(path);
    return path;
  }

  async remove(path: string): Promise<void> {
    this.removed.push(path);
  }
}

export function testRunUpdate(overrides: Partial<TestRunUpdate> = {}): TestRunUpdate {
  return {
    bundleName: "ExampleTests",
    className: "ExampleTests",
    methodName: "testExample",
    status: "passed",
    duration: 0.01,
    logs: [],
    ...overrides,
  };
}
