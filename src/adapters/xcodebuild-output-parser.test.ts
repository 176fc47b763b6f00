import { describe, expect, it } from "vitest";
import { XcodebuildOutputParser } from "./xcodebuild-output-parser.js";

describe("XcodebuildOutputParser", () => {
  it("parses a passing Swift test case", () => {
    const parser = new XcodebuildOutputParser("ExampleTests");

    expect(
      parser.feedLine("Test Case '-[ExampleTests.MathTests testAddition]' started."),
    ).toBeNull();
    expect(
      parser.feedLine("Test Case '-[ExampleTests.MathTests testAddition]' passed (0.002 seconds)."),
    ).toEqual({
      bundleName: "ExampleTests",
      className: "MathTests",
      methodName: "testAddition",
      status: "passed",
      duration: 0.002,
      logs: [],
    });
  });

  it("falls back to the default bundle name when the class has no module prefix", () => {
    const parser = new XcodebuildOutputParser("com.example.Tests");

    expect(parser.feedLine("Test Case '-[LegacyTests testThing]' skipped (0.000 seconds).")).toEqual({
      bundleName: "com.example.Tests",
      className: "LegacyTests",
      methodName: "testThing",
      status: "skipped",
      duration: 0,
      logs: [],
    });
  });

  it("attaches logs and the first failure to the failing test", () => {
    const parser = new XcodebuildOutputParser("ExampleTests");

    parser.feedLine("Test Case '-[ExampleTests.MathTests testDivision]' started.");
    parser.feedLine("computing 1 / 0");
    parser.feedLine(
      "/src/MathTests.swift:42: error: -[ExampleTests.MathTests testDivision] : XCTAssertEqual failed",
    );
    parser.feedLine(
      "/src/MathTests.swift:43: error: -[ExampleTests.MathTests testDivision] : second failure",
    );
    const update = parser.feedLine(
      "Test Case '-[ExampleTests.MathTests testDivision]' failed (0.150 seconds).",
    );

    expect(update).toEqual({
      bundleName: "ExampleTests",
      className: "MathTests",
      methodName: "testDivision",
      status: "failed",
      duration: 0.15,
      logs: ["computing 1 / 0"],
      failure: { message: "XCTAssertEqual failed", file: "/src/MathTests.swift", line: 42 },
    });
  });

  it("does not carry logs over to the next test", () => {
    const parser = new XcodebuildOutputParser("ExampleTests");

    parser.feedLine("Test Case '-[ExampleTests.A testOne]' started.");
    parser.feedLine("noise");
    parser.feedLine("Test Case '-[ExampleTests.A testOne]' passed (0.001 seconds).");
    parser.feedLine("between tests");
    parser.feedLine("Test Case '-[ExampleTests.A testTwo]' started.");
    const update = parser.feedLine("Test Case '-[ExampleTests.A testTwo]' passed (0.001 seconds).");

    expect(update?.logs).toEqual([]);
  });

  it("ignores unrelated lines", () => {
    const parser = new XcodebuildOutputParser("ExampleTests");

    expect(parser.feedLine("Test Suite 'All tests' started at 2024-01-01 10:00:00.000")).toBeNull();
    expect(parser.feedLine("** TEST EXECUTE SUCCEEDED **")).toBeNull();
  });
});
