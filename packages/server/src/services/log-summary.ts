import type { JobKind, TestFailure, TestReport } from "@buildrelay/shared";

// ---------------------------------------------------------------------------
// Failure summary: best-effort scan of a failed job's output
// ---------------------------------------------------------------------------

const FAILURE_MARKERS: Record<JobKind, readonly string[]> = {
  build: ["error:"],
  test: ["** TEST FAILED **", "error:"],
};

const GENERIC_SUMMARY: Record<JobKind, string> = {
  build: "Build failed",
  test: "Tests failed",
};

/** The most recent line carrying a failure marker, or a generic summary. */
export function summarizeFailure(kind: JobKind, logs: readonly string[]): string {
  const markers = FAILURE_MARKERS[kind];
  for (let i = logs.length - 1; i >= 0; i--) {
    const line = logs[i];
    if (markers.some((m) => line.includes(m))) return line;
  }
  return GENERIC_SUMMARY[kind];
}

// ---------------------------------------------------------------------------
// Test report
// ---------------------------------------------------------------------------

// "Executed 10 tests, with 1 test skipped and 2 failures (0 unexpected) in 1.234 (1.456) seconds"
const EXECUTED_RE =
  /Executed (\d+) tests?, with (?:(\d+) tests? skipped and )?(\d+) failures? \((\d+) unexpected\) in ([\d.]+) \(([\d.]+)\) seconds/;

// "Test Case '-[AppTests.LoginTests testExpired]' skipped (0.001 seconds)."
const SKIPPED_CASE_RE = /^Test Case '.*' skipped/;

// "/src/AppTests/LoginTests.swift:42: error: -[AppTests.LoginTests testExpired] : XCTAssertTrue failed"
const FAILURE_RE = /^(.+?):(\d+): error: -\[(\S+) (\S+)\] : (.*)$/;

export function parseTestFailure(line: string): TestFailure | null {
  const m = FAILURE_RE.exec(line);
  if (!m) return null;
  return {
    testName: `${m[3]}.${m[4]}`,
    message: m[5],
    file: m[1],
    line: parseInt(m[2], 10),
  };
}

/**
 * Pull pass/fail counts, duration and individual failures out of a test
 * run's output. Lines that do not match are ignored; output with no summary
 * line yields zero counts and a null duration.
 */
export function parseTestReport(logs: readonly string[]): TestReport {
  let summary: RegExpExecArray | null = null;
  let skippedCases = 0;
  const failures: TestFailure[] = [];

  for (const line of logs) {
    const executed = EXECUTED_RE.exec(line);
    if (executed) summary = executed;

    if (SKIPPED_CASE_RE.test(line)) skippedCases++;

    const failure = parseTestFailure(line);
    if (failure) failures.push(failure);
  }

  if (!summary) {
    return { passed: 0, failed: 0, skipped: skippedCases, duration: null, failures };
  }

  const total = parseInt(summary[1], 10);
  const skipped = summary[2] !== undefined ? parseInt(summary[2], 10) : skippedCases;
  const failed = parseInt(summary[3], 10);
  const duration = parseFloat(summary[5]);

  return {
    passed: Math.max(0, total - failed - skipped),
    failed,
    skipped,
    duration: Number.isFinite(duration) ? duration : null,
    failures,
  };
}
