/**
 * Bounded hand-off between a process drain and whatever stores its lines.
 *
 * `offer()` never blocks. Queued lines are delivered to `deliver` on a later
 * turn of the event loop so the caller's read loop keeps running. When the
 * queue fills up, the queued lines are delivered on the spot instead; a line
 * is only dropped when the queue is full while a delivery is already in
 * progress, i.e. when the consumer itself is behind.
 */
export class LogRelay {
  private queue: string[] = [];
  private scheduled: NodeJS.Immediate | null = null;
  private flushing = false;
  private idleWaiters: Array<() => void> = [];
  private droppedCount = 0;

  constructor(
    private capacity: number,
    private deliver: (line: string) => void,
  ) {}

  /** Returns false when the line was dropped. */
  offer(line: string): boolean {
    if (this.queue.length >= this.capacity) {
      if (this.flushing) {
        this.droppedCount++;
        return false;
      }
      this.flush();
    }
    this.queue.push(line);
    this.schedule();
    return true;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Resolves once every queued line has been delivered. */
  drained(): Promise<void> {
    if (this.queue.length === 0 && !this.flushing) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = setImmediate(() => {
      this.scheduled = null;
      this.flush();
    });
  }

  private flush(): void {
    const batch = this.queue;
    this.queue = [];
    this.flushing = true;
    try {
      for (const line of batch) {
        this.deliver(line);
      }
    } finally {
      this.flushing = false;
    }

    if (this.queue.length > 0) {
      this.schedule();
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
