import type { JobKind, TerminalJobStatus } from "@buildrelay/shared";

export type JobState =
  | { status: "running"; logs: string[] }
  | { status: "success"; logs: string[]; artifacts: string[] }
  | { status: "failed"; logs: string[]; error: string; exitCode: number | null }
  | { status: "cancelled" };

export type TerminalJobState = Extract<JobState, { status: TerminalJobStatus }>;

export interface JobRecord {
  jobId: string;
  kind: JobKind;
  createdAt: number;
  state: JobState;
}

export function isTerminal(state: JobState): state is TerminalJobState {
  return state.status !== "running";
}

/** Log lines of a state; cancelled jobs carry none. */
export function logsOf(state: JobState): readonly string[] {
  return state.status === "cancelled" ? [] : state.logs;
}

function cloneState(state: JobState): JobState {
  switch (state.status) {
    case "running":
      return { status: "running", logs: [...state.logs] };
    case "success":
      return { ...state, logs: [...state.logs], artifacts: [...state.artifacts] };
    case "failed":
      return { ...state, logs: [...state.logs] };
    case "cancelled":
      return { status: "cancelled" };
  }
}

/**
 * In-memory store of job records, keyed by job id.
 *
 * Every method runs to completion synchronously, so no two operations can
 * interleave on the event loop. Transitions replace the stored state as a
 * whole and only ever leave `running`; a write that loses a race against an
 * earlier terminal transition is a no-op. Reads hand out copies.
 */
export class JobRegistry {
  // Map iteration follows insertion order, which reclaim() relies on.
  private jobs = new Map<string, JobRecord>();

  constructor(private now: () => number = Date.now) {}

  create(jobId: string, kind: JobKind): void {
    this.jobs.set(jobId, {
      jobId,
      kind,
      createdAt: this.now(),
      state: { status: "running", logs: [] },
    });
  }

  /** Lines arriving after a job left `running` are dropped. */
  appendLog(jobId: string, line: string): void {
    const state = this.jobs.get(jobId)?.state;
    if (state?.status === "running") {
      state.logs.push(line);
    }
  }

  complete(jobId: string, artifacts: string[]): boolean {
    return this.transition(jobId, (logs) => ({
      status: "success",
      logs,
      artifacts: [...artifacts],
    }));
  }

  fail(jobId: string, error: string, exitCode: number | null): boolean {
    return this.transition(jobId, (logs) => ({
      status: "failed",
      logs,
      error,
      exitCode,
    }));
  }

  /** Returns false when there is no running job to cancel. */
  cancel(jobId: string): boolean {
    return this.transition(jobId, () => ({ status: "cancelled" }));
  }

  get(jobId: string): JobRecord | null {
    const record = this.jobs.get(jobId);
    if (!record) return null;
    return { ...record, state: cloneState(record.state) };
  }

  /**
   * Evict the oldest terminal records until at most `maxTerminal` remain.
   * Running records are never evicted. Returns the number removed.
   */
  reclaim(maxTerminal: number): number {
    const terminal: string[] = [];
    for (const [jobId, record] of this.jobs) {
      if (isTerminal(record.state)) terminal.push(jobId);
    }

    const excess = terminal.length - Math.max(0, maxTerminal);
    if (excess <= 0) return 0;

    for (const jobId of terminal.slice(0, excess)) {
      this.jobs.delete(jobId);
    }
    return excess;
  }

  counts(): { running: number; terminal: number } {
    let running = 0;
    for (const record of this.jobs.values()) {
      if (record.state.status === "running") running++;
    }
    return { running, terminal: this.jobs.size - running };
  }

  private transition(
    jobId: string,
    next: (logs: string[]) => TerminalJobState,
  ): boolean {
    const record = this.jobs.get(jobId);
    if (!record || record.state.status !== "running") return false;
    record.state = next(record.state.logs);
    return true;
  }
}
