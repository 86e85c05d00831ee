import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { LogStreamEvent } from "@buildrelay/shared";
import { JobRegistry } from "../job-registry.js";
import { Writable } from "node:stream";
import { formatSSE, observeJobLog, writeEventStream } from "../log-observer.js";

async function collect(events: AsyncIterable<LogStreamEvent>): Promise<LogStreamEvent[]> {
  const out: LogStreamEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

describe("observeJobLog", () => {
  it("replays a finished job and ends with its status", async () => {
    const registry = new JobRegistry();
    registry.create("j1", "build");
    registry.appendLog("j1", "one");
    registry.appendLog("j1", "two");
    registry.complete("j1", []);

    assert.deepEqual(await collect(observeJobLog(registry, "j1", { intervalMs: 1 })), [
      { type: "line", line: "one" },
      { type: "line", line: "two" },
      { type: "complete", status: "success" },
    ]);
  });

  it("yields nothing for an unknown job", async () => {
    const registry = new JobRegistry();
    assert.deepEqual(await collect(observeJobLog(registry, "missing", { intervalMs: 1 })), []);
  });

  it("follows a running job without duplicating lines", async () => {
    const registry = new JobRegistry();
    registry.create("j1", "test");
    registry.appendLog("j1", "first");

    const events: LogStreamEvent[] = [];
    for await (const event of observeJobLog(registry, "j1", { intervalMs: 5 })) {
      events.push(event);
      if (event.type === "line" && event.line === "first") {
        registry.appendLog("j1", "second");
        registry.fail("j1", "Tests failed", 65);
      }
    }

    assert.deepEqual(events, [
      { type: "line", line: "first" },
      { type: "line", line: "second" },
      { type: "complete", status: "failed" },
    ]);
  });

  it("reports cancellation once, after the lines already seen", async () => {
    const registry = new JobRegistry();
    registry.create("j1", "build");
    registry.appendLog("j1", "Compiling");

    const events: LogStreamEvent[] = [];
    for await (const event of observeJobLog(registry, "j1", { intervalMs: 5 })) {
      events.push(event);
      if (event.type === "line") registry.cancel("j1");
    }

    assert.deepEqual(events, [
      { type: "line", line: "Compiling" },
      { type: "complete", status: "cancelled" },
    ]);
  });

  it("stops without a completion event when aborted", async () => {
    const registry = new JobRegistry();
    registry.create("j1", "build");
    const controller = new AbortController();

    const pending = collect(observeJobLog(registry, "j1", { intervalMs: 10_000, signal: controller.signal }));
    setTimeout(() => controller.abort(), 10);

    assert.deepEqual(await pending, []);
    assert.equal(registry.get("j1")?.state.status, "running");
  });

  it("lets independent observers see the same lines", async () => {
    const registry = new JobRegistry();
    registry.create("j1", "build");
    registry.appendLog("j1", "only");
    registry.complete("j1", ["/tmp/out"]);

    const [a, b] = await Promise.all([
      collect(observeJobLog(registry, "j1", { intervalMs: 1 })),
      collect(observeJobLog(registry, "j1", { intervalMs: 1 })),
    ]);
    assert.deepEqual(a, b);
    assert.equal(a.length, 2);
  });
});

describe("formatSSE", () => {
  it("frames log lines as data events", () => {
    assert.equal(formatSSE({ type: "line", line: "Compiling" }), "data: Compiling\n\n");
  });

  it("frames completion as a named event", () => {
    assert.equal(formatSSE({ type: "complete", status: "success" }), "event: complete\ndata: success\n\n");
  });
});

// ---------------------------------------------------------------------------
// writeEventStream
// ---------------------------------------------------------------------------

/** A one-byte-buffer sink that takes `delayMs` per chunk, like a slow client. */
class SlowSink extends Writable {
  received = "";
  /** Bytes still buffered each time a chunk was written. */
  backlogAtWrite: number[] = [];

  constructor(private delayMs: number | null) {
    super({ highWaterMark: 1, decodeStrings: false });
  }

  override write(chunk: string): boolean {
    this.backlogAtWrite.push(this.writableLength);
    return super.write(chunk);
  }

  override _write(chunk: string, _encoding: BufferEncoding, callback: () => void): void {
    this.received += chunk;
    // null: never acknowledge, so the buffer stays full
    if (this.delayMs !== null) setTimeout(callback, this.delayMs);
  }
}

async function* eventsOf(...events: LogStreamEvent[]): AsyncGenerator<LogStreamEvent> {
  yield* events;
}

describe("writeEventStream", () => {
  it("waits for the sink to drain before writing the next event", async () => {
    const sink = new SlowSink(5);
    const events = eventsOf(
      { type: "line", line: "one" },
      { type: "line", line: "two" },
      { type: "complete", status: "success" },
    );

    await writeEventStream(sink, events, new AbortController().signal);

    assert.deepEqual(sink.backlogAtWrite, [0, 0, 0]);
    assert.equal(sink.received, "data: one\n\ndata: two\n\nevent: complete\ndata: success\n\n");
  });

  it("gives up on a stalled sink once aborted", async () => {
    const sink = new SlowSink(null);
    const controller = new AbortController();
    const events = eventsOf({ type: "line", line: "one" }, { type: "line", line: "two" });

    setTimeout(() => controller.abort(), 10);
    await writeEventStream(sink, events, controller.signal);

    assert.equal(sink.received, "data: one\n\n");
    assert.deepEqual(sink.backlogAtWrite, [0]);
  });
});
