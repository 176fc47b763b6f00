import type { DeltaSnapshot } from "../types/delta.js";
import type { XCTestRunRequest } from "./xctest-request.js";

export type TestRunStatus = "passed" | "failed" | "skipped";

export interface TestRunFailure {
  message: string;
  file?: string;
  line?: number;
}

/** Result of one finished test method. The fragment type of XCTest sessions. */
export interface TestRunUpdate {
  bundleName: string;
  className: string;
  methodName: string;
  status: TestRunStatus;
  /** Seconds. */
  duration: number;
  /** Output captured while the test method ran. */
  logs: string[];
  failure?: TestRunFailure;
}

export interface XCTestBundleDescriptor {
  bundleId: string;
  /** Path the target runs, e.g. an `.xctestrun` file. */
  path: string;
}

/** Everything a target needs to run one session's tests. */
export interface XCTestRunPlan {
  sessionId: string;
  bundle: XCTestBundleDescriptor;
  request: XCTestRunRequest;
  workingDirectory: string;
  resultBundlePath: string;
}

export interface XCTestRunListener {
  testCaseFinished(update: TestRunUpdate): void;
  output(text: string): void;
}

/** The device or simulator tests run on. */
export interface XCTestTarget {
  readonly udid: string;
  /**
   * Run the plan, reporting through `listener`. Resolves when the run ends,
   * including runs with failing tests; rejects when the run itself broke.
   * Must stop promptly once `signal` aborts.
   */
  runTests(plan: XCTestRunPlan, listener: XCTestRunListener, signal: AbortSignal): Promise<void>;
}

export interface XCTestBundleStorage {
  /** Rejects with StorageError when no bundle is installed under `bundleId`. */
  resolveTestBundle(bundleId: string): Promise<XCTestBundleDescriptor>;
}

export interface TemporaryDirectory {
  createSessionDirectory(sessionId: string): Promise<string>;
  remove(path: string): Promise<void>;
}

/** A delta of an XCTest session. */
export interface XCTestDelta extends DeltaSnapshot<TestRunUpdate> {
  /** Where the target writes its result bundle; null until the run is set up. */
  readonly resultBundlePath: string | null;
}
