import type { Logger } from "./logger.js";

/**
 * Runs work after the current response is sent. Tasks start on the next
 * macrotask; `drain()` waits for everything enqueued so far, including tasks
 * enqueued while draining.
 */
export class BackgroundTasks {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly logger: Logger) {}

  enqueue(name: string, task: () => Promise<void>): void {
    const run = new Promise<void>((resolve) => setImmediate(resolve))
      .then(task)
      .catch((error: unknown) => {
        this.logger.error({ err: error, task: name }, "Background task failed");
      })
      .finally(() => {
        this.pending.delete(run);
      });
    this.pending.add(run);
  }

  get size(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }
}
