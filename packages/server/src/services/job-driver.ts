import { nanoid } from "nanoid";
import type { FastifyBaseLogger } from "fastify";
import type { JobKind, JobStartedResponse } from "@buildrelay/shared";
import {
  ExecutionFailure,
  InternalFailureError,
  JobNotFoundError,
  PathNotAllowedError,
} from "../errors.js";
import type { JobRecord, JobRegistry } from "./job-registry.js";
import { LogRelay } from "./log-relay.js";
import { summarizeFailure } from "./log-summary.js";
import type { PathPolicy } from "./path-policy.js";
import type { ProcessOutcome, ProcessRunner } from "./process-runner.js";
import {
  buildArgs,
  parseBuildRequest,
  parseTestRequest,
  specPaths,
  testArgs,
  type BuildSpec,
  type TestSpec,
} from "./job-spec.js";

export interface DriverConfig {
  /** Executable every job runs. */
  buildTool: string;
  logQueueCapacity: number;
  killOnCancel: boolean;
}

const DEFAULT_CONFIG: DriverConfig = {
  buildTool: "xcodebuild",
  logQueueCapacity: 100,
  killOnCancel: false,
};

interface LaunchPlan {
  kind: JobKind;
  spec: BuildSpec | TestSpec;
  args: string[];
  requestedBy: string;
}

/**
 * Owns the lifecycle of every job: validation, registration, running the
 * build tool in the background and recording how it ended.
 *
 * Starting a job returns as soon as the job is registered; the outcome is
 * only observable through the registry.
 */
export class JobDriver {
  private config: DriverConfig;
  private tasks = new Set<Promise<void>>();
  private aborts = new Map<string, AbortController>();

  constructor(
    private registry: JobRegistry,
    private policy: PathPolicy,
    private runner: ProcessRunner,
    private log: FastifyBaseLogger,
    config?: Partial<DriverConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** `requestedBy` identifies the caller in the job's log lines. */
  async startBuild(body: unknown, requestedBy = "anonymous"): Promise<JobStartedResponse> {
    const spec = parseBuildRequest(body);
    return this.start({ kind: "build", spec, args: buildArgs(spec), requestedBy });
  }

  async startTest(body: unknown, requestedBy = "anonymous"): Promise<JobStartedResponse> {
    const spec = parseTestRequest(body);
    return this.start({ kind: "test", spec, args: testArgs(spec), requestedBy });
  }

  /** Look up a job of the given kind. */
  get(kind: JobKind, jobId: string): JobRecord {
    const record = this.registry.get(jobId);
    if (!record || record.kind !== kind) throw new JobNotFoundError(jobId);
    return record;
  }

  /**
   * Flip a running job to `cancelled`. Unless `killOnCancel` is set the
   * external process keeps running and its remaining output is discarded.
   */
  cancel(kind: JobKind, jobId: string): JobRecord {
    const record = this.registry.get(jobId);
    if (!record || record.kind !== kind || !this.registry.cancel(jobId)) {
      throw new JobNotFoundError(jobId);
    }

    if (this.config.killOnCancel) {
      this.aborts.get(jobId)?.abort();
    }

    this.log.info({ jobId, kind }, "Job cancelled");
    return { ...record, state: { status: "cancelled" } };
  }

  /** Resolves once every job started so far has been finalized. */
  async settled(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  /** Terminate every running process and wait for their jobs to finalize. */
  async shutdown(): Promise<void> {
    for (const abort of this.aborts.values()) abort.abort();
    await this.settled();
  }

  // ── Internals ────────────────────────────────────────────────────────

  private async start(plan: LaunchPlan): Promise<JobStartedResponse> {
    for (const p of specPaths(plan.spec)) {
      if (!(await this.policy.isAllowed(p))) {
        throw new PathNotAllowedError(p);
      }
    }

    const jobId = nanoid(12);
    this.registry.create(jobId, plan.kind);
    this.log.info(
      { jobId, kind: plan.kind, scheme: plan.spec.scheme, requestedBy: plan.requestedBy },
      "Job started",
    );

    const task = this.execute(jobId, plan)
      .catch((err: unknown) => {
        // execute() records every failure itself; reaching here means
        // finalization itself threw.
        this.log.error({ jobId, err }, "Job finalization failed");
        const failure = new InternalFailureError(
          err instanceof Error ? err.message : String(err),
        );
        this.registry.fail(jobId, failure.message, null);
      })
      .finally(() => {
        this.tasks.delete(task);
        this.aborts.delete(jobId);
      });
    this.tasks.add(task);

    return {
      jobId,
      status: "running",
      logsUrl: `/${plan.kind}/${jobId}/logs`,
    };
  }

  private async execute(jobId: string, plan: LaunchPlan): Promise<void> {
    const relay = new LogRelay(this.config.logQueueCapacity, (line) =>
      this.registry.appendLog(jobId, line),
    );
    const abort = new AbortController();
    this.aborts.set(jobId, abort);

    let outcome: ProcessOutcome | null = null;
    let error: unknown = null;
    try {
      outcome = await this.runner(
        this.config.buildTool,
        plan.args,
        (line) => {
          relay.offer(line);
        },
        { signal: abort.signal, log: this.log.child({ jobId }) },
      );
    } catch (err) {
      error = err;
    }

    await relay.drained();
    if (relay.dropped > 0) {
      this.log.warn({ jobId, dropped: relay.dropped }, "Log queue full, lines dropped");
    }

    this.finalize(jobId, plan.kind, outcome, error);
  }

  private finalize(
    jobId: string,
    kind: JobKind,
    outcome: ProcessOutcome | null,
    error: unknown,
  ): void {
    if (!outcome) {
      const message = error instanceof Error ? error.message : String(error);
      if (this.registry.fail(jobId, message, null)) {
        this.log.error({ jobId, err: error }, "Job could not be started");
      }
      return;
    }

    if (!outcome.success) {
      const failure = new ExecutionFailure(summarizeFailure(kind, outcome.logs), outcome.exitCode);
      if (this.registry.fail(jobId, failure.message, failure.exitCode)) {
        this.log.info({ jobId, exitCode: failure.exitCode }, "Job failed");
      }
      return;
    }

    // Only builds publish their products directory
    const artifacts = kind === "build" && outcome.artifactDir ? [outcome.artifactDir] : [];
    if (this.registry.complete(jobId, artifacts)) {
      this.log.info({ jobId, artifacts }, "Job succeeded");
    }
  }
}
