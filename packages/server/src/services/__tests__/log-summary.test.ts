import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { parseTestFailure, parseTestReport, summarizeFailure } from "../log-summary.js";

describe("summarizeFailure", () => {
  it("returns the last error line of a build", () => {
    const logs = [
      "CompileSwift normal arm64",
      "/src/A.swift:3: error: cannot find 'x' in scope",
      "/src/B.swift:9: error: missing return",
      "** BUILD FAILED **",
    ];
    assert.equal(summarizeFailure("build", logs), "/src/B.swift:9: error: missing return");
  });

  it("falls back to a generic build summary", () => {
    assert.equal(summarizeFailure("build", ["Killed: 9"]), "Build failed");
  });

  it("prefers the most recent test failure marker", () => {
    const logs = ["/src/T.swift:4: error: -[AppTests.T testA] : failed", "** TEST FAILED **", "done"];
    assert.equal(summarizeFailure("test", logs), "** TEST FAILED **");
  });

  it("falls back to a generic test summary", () => {
    assert.equal(summarizeFailure("test", []), "Tests failed");
  });
});

describe("parseTestFailure", () => {
  it("splits file, line, test name and message", () => {
    assert.deepEqual(
      parseTestFailure(
        "/src/AppTests/LoginTests.swift:42: error: -[AppTests.LoginTests testExpired] : XCTAssertTrue failed",
      ),
      {
        testName: "AppTests.LoginTests.testExpired",
        message: "XCTAssertTrue failed",
        file: "/src/AppTests/LoginTests.swift",
        line: 42,
      },
    );
  });

  it("ignores other error lines", () => {
    assert.equal(parseTestFailure("/src/A.swift:3: error: cannot find 'x' in scope"), null);
  });
});

describe("parseTestReport", () => {
  it("reads counts from the summary line", () => {
    const report = parseTestReport([
      "Test Suite 'All tests' started",
      "/src/T.swift:10: error: -[AppTests.CartTests testTotal] : XCTAssertEqual failed",
      "Executed 10 tests, with 1 test skipped and 2 failures (0 unexpected) in 1.234 (1.456) seconds",
    ]);
    assert.deepEqual(report, {
      passed: 7,
      failed: 2,
      skipped: 1,
      duration: 1.234,
      failures: [
        {
          testName: "AppTests.CartTests.testTotal",
          message: "XCTAssertEqual failed",
          file: "/src/T.swift",
          line: 10,
        },
      ],
    });
  });

  it("counts skipped cases when the summary has no skip clause", () => {
    const report = parseTestReport([
      "Test Case '-[AppTests.A testOne]' skipped (0.001 seconds).",
      "Executed 3 tests, with 0 failures (0 unexpected) in 0.500 (0.520) seconds",
    ]);
    assert.equal(report.passed, 2);
    assert.equal(report.skipped, 1);
    assert.equal(report.failed, 0);
    assert.equal(report.duration, 0.5);
  });

  it("uses the last summary line", () => {
    const report = parseTestReport([
      "Executed 2 tests, with 0 failures (0 unexpected) in 0.100 (0.100) seconds",
      "Executed 5 tests, with 1 failure (0 unexpected) in 0.300 (0.310) seconds",
    ]);
    assert.equal(report.passed, 4);
    assert.equal(report.failed, 1);
  });

  it("returns zero counts without a summary line", () => {
    assert.deepEqual(parseTestReport(["Build succeeded"]), {
      passed: 0,
      failed: 0,
      skipped: 0,
      duration: null,
      failures: [],
    });
  });
});
