// ── Job enums ────────────────────────────────────────────────────────

export type JobKind = "build" | "test";

export type JobStatus = "running" | "success" | "failed" | "cancelled";

export type TerminalJobStatus = Exclude<JobStatus, "running">;

// ── Job specifications ───────────────────────────────────────────────

/** POST /build body. Either `project` or `workspace` is required. */
export interface BuildRequest {
  project?: string;
  workspace?: string;
  scheme: string;
  /** Build configuration, e.g. "Debug" or "Release". Defaults to "Debug". */
  configuration?: string;
  /** e.g. "platform=iOS Simulator,name=iPhone 15 Pro" */
  destination?: string;
  derivedDataPath?: string;
  /** Passed to the build tool verbatim, after the generated arguments. */
  extraArgs?: string[];
}

/** POST /test body. */
export interface TestRequest {
  project?: string;
  workspace?: string;
  scheme: string;
  destination?: string;
  testPlan?: string;
  onlyTesting?: string[];
  skipTesting?: string[];
}

// ── API responses ────────────────────────────────────────────────────

export interface JobStartedResponse {
  jobId: string;
  status: "running";
  /** Relative URL of the SSE log stream for this job. */
  logsUrl: string;
}

export interface JobStatusResponse {
  jobId: string;
  status: JobStatus;
  exitCode?: number;
  artifacts?: string[];
  error?: string;
  logs: string[];
}

export interface TestFailure {
  testName: string;
  message: string;
  file: string | null;
  line: number | null;
}

export interface TestReport {
  passed: number;
  failed: number;
  skipped: number;
  /** Seconds, as reported by the test runner. */
  duration: number | null;
  failures: TestFailure[];
}

export type TestResultResponse = JobStatusResponse & TestReport;

export interface ServiceStatusResponse {
  healthy: boolean;
  toolVersion: string;
  jobs: {
    running: number;
    terminal: number;
  };
}

export interface ErrorResponse {
  error: string;
  message: string;
}
