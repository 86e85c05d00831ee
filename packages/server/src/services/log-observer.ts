import { once } from "node:events";
import type { Writable } from "node:stream";
import { setTimeout as sleep } from "node:timers/promises";
import type { LogStreamEvent } from "@buildrelay/shared";
import { isTerminal, logsOf, type JobRegistry } from "./job-registry.js";

export interface ObserveOptions {
  /** Delay between registry reads while the job is running (default 100ms). */
  intervalMs?: number;
  /** Aborting ends the stream without a completion event. */
  signal?: AbortSignal;
}

/**
 * Replay a job's log from the first line and follow it until the job ends.
 *
 * Each cycle takes a snapshot from the registry, yields every line past the
 * cursor, and finishes with a single `complete` event once the snapshot is
 * terminal. Yields nothing for an unknown job. Observers poll independently
 * of each other and of the job, so a slow consumer never holds up either.
 */
export async function* observeJobLog(
  registry: JobRegistry,
  jobId: string,
  options: ObserveOptions = {},
): AsyncGenerator<LogStreamEvent, void, undefined> {
  const intervalMs = options.intervalMs ?? 100;
  const { signal } = options;
  let cursor = 0;

  while (!signal?.aborted) {
    const record = registry.get(jobId);
    if (!record) return;

    const logs = logsOf(record.state);
    for (let i = cursor; i < logs.length; i++) {
      yield { type: "line", line: logs[i] };
    }
    cursor = Math.max(cursor, logs.length);

    if (isTerminal(record.state)) {
      yield { type: "complete", status: record.state.status };
      return;
    }

    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) return;
      throw err;
    }
  }
}

/** Serialize an event in text/event-stream framing. */
export function formatSSE(event: LogStreamEvent): string {
  if (event.type === "line") {
    return `data: ${event.line}\n\n`;
  }
  return `event: complete\ndata: ${event.status}\n\n`;
}

/**
 * Write `events` to `out` in SSE framing, waiting for `out` to drain
 * whenever its buffer is full. Returns early, without ending `out`, once
 * `signal` is aborted.
 */
export async function writeEventStream(
  out: Writable,
  events: AsyncIterable<LogStreamEvent>,
  signal: AbortSignal,
): Promise<void> {
  for await (const event of events) {
    if (out.write(formatSSE(event))) continue;
    try {
      await once(out, "drain", { signal });
    } catch (err) {
      if (signal.aborted) return;
      throw err;
    }
  }
}
