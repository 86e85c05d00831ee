import type { FastifyInstance, FastifyReply } from "fastify";
import type {
  JobKind,
  JobStartedResponse,
  JobStatusResponse,
  TestResultResponse,
} from "@buildrelay/shared";
import { logsOf, type JobRecord } from "../services/job-registry.js";
import { observeJobLog, writeEventStream } from "../services/log-observer.js";
import { parseTestReport } from "../services/log-summary.js";

/** Shape a registry record for API callers. */
export function toStatusResponse(record: JobRecord): JobStatusResponse {
  const { jobId, state } = record;
  switch (state.status) {
    case "running":
      return { jobId, status: "running", logs: state.logs };
    case "success":
      return { jobId, status: "success", exitCode: 0, artifacts: state.artifacts, logs: state.logs };
    case "failed": {
      const response: JobStatusResponse = {
        jobId,
        status: "failed",
        error: state.error,
        logs: state.logs,
      };
      if (state.exitCode !== null) response.exitCode = state.exitCode;
      return response;
    }
    case "cancelled":
      return { jobId, status: "cancelled", logs: [] };
  }
}

type IdParams = { Params: { id: string } };

export default async function jobRoutes(fastify: FastifyInstance) {
  const driver = fastify.jobDriver;
  const registry = fastify.jobRegistry;
  const intervalMs = fastify.serverConfig.logPollIntervalMs;
  const guarded = { preHandler: [fastify.verifyAuth] };

  async function streamLogs(kind: JobKind, jobId: string, reply: FastifyReply) {
    // Unknown ids are a 404 at subscribe time, not an empty stream
    driver.get(kind, jobId);

    const abort = new AbortController();
    reply.hijack();
    reply.raw.writeHead(200, {
      ...reply.getHeaders(),
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    reply.raw.on("close", () => abort.abort());

    const events = observeJobLog(registry, jobId, { intervalMs, signal: abort.signal });
    await writeEventStream(reply.raw, events, abort.signal);
    reply.raw.end();
  }

  // ── Build ──────────────────────────────────────────────────────────

  // POST /build: start a build; returns as soon as the job is registered
  fastify.post("/build", guarded, async (request, reply) => {
    const started = await driver.startBuild(request.body, request.caller?.type);
    return reply.status(201).send(started satisfies JobStartedResponse);
  });

  // GET /build/:id: current status and full log so far
  fastify.get<IdParams>("/build/:id", guarded, async (request, reply) => {
    const record = driver.get("build", request.params.id);
    return reply.send(toStatusResponse(record));
  });

  // GET /build/:id/logs: SSE log stream
  fastify.get<IdParams>("/build/:id/logs", guarded, async (request, reply) => {
    await streamLogs("build", request.params.id, reply);
  });

  // DELETE /build/:id: cancel a running build
  fastify.delete<IdParams>("/build/:id", guarded, async (request, reply) => {
    const record = driver.cancel("build", request.params.id);
    return reply.send(toStatusResponse(record));
  });

  // ── Test ───────────────────────────────────────────────────────────

  fastify.post("/test", guarded, async (request, reply) => {
    const started = await driver.startTest(request.body, request.caller?.type);
    return reply.status(201).send(started satisfies JobStartedResponse);
  });

  // GET /test/:id: status plus counts and failures parsed from the log
  fastify.get<IdParams>("/test/:id", guarded, async (request, reply) => {
    const record = driver.get("test", request.params.id);
    const response: TestResultResponse = {
      ...toStatusResponse(record),
      ...parseTestReport(logsOf(record.state)),
    };
    return reply.send(response);
  });

  fastify.get<IdParams>("/test/:id/logs", guarded, async (request, reply) => {
    await streamLogs("test", request.params.id, reply);
  });

  fastify.delete<IdParams>("/test/:id", guarded, async (request, reply) => {
    const record = driver.cancel("test", request.params.id);
    return reply.send(toStatusResponse(record));
  });
}
