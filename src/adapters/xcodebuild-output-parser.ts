import type { TestRunFailure, TestRunStatus, TestRunUpdate } from "../xctest/types.js";

// Test Case '-[ExampleTests.ExampleTests testAddition]' passed (0.002 seconds).
const TEST_CASE_FINISHED =
  /^Test Case '-\[(?:([^\s.\]]+)\.)?(\S+) (\S+)\]' (passed|failed|skipped) \((\d+(?:\.\d+)?) seconds\)\.$/;
// Test Case '-[ExampleTests.ExampleTests testAddition]' started.
const TEST_CASE_STARTED = /^Test Case '-\[(?:[^\s.\]]+\.)?(\S+) (\S+)\]' started\.$/;
// /src/ExampleTests.swift:42: error: -[ExampleTests.ExampleTests testAddition] : XCTAssertEqual failed
const TEST_CASE_FAILURE = /^(.+?):(\d+): error: -\[(?:[^\s.\]]+\.)?(\S+) (\S+)\] : (.*)$/;

interface RunningCase {
  key: string;
  logs: string[];
  failure?: TestRunFailure;
}

/**
 * Turns xcodebuild test output, one line at a time, into finished test
 * methods. Lines printed while a test method runs become its logs; the first
 * failure reported for it becomes its failure.
 */
export class XcodebuildOutputParser {
  private readonly defaultBundleName: string;
  private current: RunningCase | null = null;

  constructor(defaultBundleName: string) {
    this.defaultBundleName = defaultBundleName;
  }

  /** Returns the finished test method this line completes, if any. */
  feedLine(rawLine: string): TestRunUpdate | null {
    const line = rawLine.trim();

    const finished = TEST_CASE_FINISHED.exec(line);
    if (finished) return this.finish(finished);

    const started = TEST_CASE_STARTED.exec(line);
    if (started) {
      this.current = { key: `${started[1]} ${started[2]}`, logs: [] };
      return null;
    }

    const failure = TEST_CASE_FAILURE.exec(line);
    if (failure && this.current?.key === `${failure[3]} ${failure[4]}`) {
      this.current.failure ??= {
        message: failure[5] ?? "",
        file: failure[1],
        line: Number(failure[2]),
      };
      return null;
    }

    if (this.current && line.length > 0) this.current.logs.push(rawLine);
    return null;
  }

  private finish(match: RegExpExecArray): TestRunUpdate {
    const [, bundleName, className = "", methodName = "", status = "", duration = "0"] = match;
    const running = this.current?.key === `${className} ${methodName}` ? this.current : null;
    this.current = null;

    const update: TestRunUpdate = {
      bundleName: bundleName ?? this.defaultBundleName,
      className,
      methodName,
      status: parseStatus(status),
      duration: Number(duration),
      logs: running?.logs ?? [],
    };
    if (running?.failure) update.failure = running.failure;
    return update;
  }
}

function parseStatus(status: string): TestRunStatus {
  switch (status) {
    case "failed":
      return "failed";
    case "skipped":
      return "skipped";
    default:
      return "passed";
  }
}
