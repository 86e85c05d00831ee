import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { RelayApiClient } from "../http-client.js";
import { jsonResult, errorResult, type CallToolResult } from "../tool-result.js";
import type {
  BuildRequest,
  JobKind,
  JobStartedResponse,
  JobStatusResponse,
  TestRequest,
  TestResultResponse,
} from "@buildrelay/shared";

function jobPath(kind: JobKind, jobId: string): string {
  return `/${kind}/${encodeURIComponent(jobId)}`;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export async function handleStartBuild(
  client: RelayApiClient,
  params: BuildRequest,
): Promise<CallToolResult> {
  const res = await client.post<JobStartedResponse>("/build", params);
  return res.ok ? jsonResult(res.data) : errorResult(res.error);
}

export async function handleStartTest(
  client: RelayApiClient,
  params: TestRequest,
): Promise<CallToolResult> {
  const res = await client.post<JobStartedResponse>("/test", params);
  return res.ok ? jsonResult(res.data) : errorResult(res.error);
}

/** Status and logs of a build. `tail` keeps only the last N log lines. */
export async function handleGetBuild(
  client: RelayApiClient,
  params: { jobId: string; tail?: number },
): Promise<CallToolResult> {
  const res = await client.get<JobStatusResponse>(jobPath("build", params.jobId));
  if (!res.ok) return errorResult(res.error);
  if (params.tail === undefined) return jsonResult(res.data);
  return jsonResult({ ...res.data, logs: res.data.logs.slice(-params.tail) });
}

export async function handleGetTestResults(
  client: RelayApiClient,
  params: { jobId: string; includeLogs?: boolean },
): Promise<CallToolResult> {
  const res = await client.get<TestResultResponse>(jobPath("test", params.jobId));
  if (!res.ok) return errorResult(res.error);
  if (params.includeLogs) return jsonResult(res.data);
  const { logs: _logs, ...report } = res.data;
  return jsonResult(report);
}

export async function handleCancelJob(
  client: RelayApiClient,
  params: { kind: JobKind; jobId: string },
): Promise<CallToolResult> {
  const res = await client.delete<JobStatusResponse>(jobPath(params.kind, params.jobId));
  return res.ok ? jsonResult(res.data) : errorResult(res.error);
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

const projectFields = {
  project: z.string().optional().describe("Path to the .xcodeproj on the build host"),
  workspace: z.string().optional().describe("Path to the .xcworkspace on the build host"),
  scheme: z.string().describe("Scheme to build or test"),
  destination: z
    .string()
    .optional()
    .describe('Destination specifier, e.g. "platform=iOS Simulator,name=iPhone 15"'),
};

export function registerJobTools(
  server: McpServer,
  client: RelayApiClient,
): void {
  server.registerTool("start_build", {
    description: "Start a build on the build host. Returns a job id to poll with get_build.",
    inputSchema: {
      ...projectFields,
      configuration: z.string().optional().describe("Build configuration (default Debug)"),
      derivedDataPath: z.string().optional().describe("Custom derived data directory"),
      extraArgs: z.array(z.string()).optional().describe("Extra build tool arguments"),
    },
  }, async (params) => handleStartBuild(client, params));

  server.registerTool("start_test", {
    description: "Start a test run on the build host. Returns a job id to poll with get_test_results.",
    inputSchema: {
      ...projectFields,
      testPlan: z.string().optional().describe("Test plan name"),
      onlyTesting: z.array(z.string()).optional().describe("Only run these test identifiers"),
      skipTesting: z.array(z.string()).optional().describe("Skip these test identifiers"),
    },
  }, async (params) => handleStartTest(client, params));

  server.registerTool("get_build", {
    description: "Get the status, artifacts, error summary and logs of a build",
    inputSchema: {
      jobId: z.string().describe("Job ID returned by start_build"),
      tail: z.number().int().positive().optional().describe("Only return the last N log lines"),
    },
  }, async (params) => handleGetBuild(client, params));

  server.registerTool("get_test_results", {
    description: "Get the status, pass/fail counts and failures of a test run",
    inputSchema: {
      jobId: z.string().describe("Job ID returned by start_test"),
      includeLogs: z.boolean().optional().describe("Include the full test log"),
    },
  }, async (params) => handleGetTestResults(client, params));

  server.registerTool("cancel_job", {
    description: "Cancel a running build or test job",
    inputSchema: {
      kind: z.enum(["build", "test"]).describe("Job kind"),
      jobId: z.string().describe("Job ID"),
    },
  }, async (params) => handleCancelJob(client, params));
}
