import type { PageJob } from "./page-job";

export const SHUTDOWN: unique symbol = Symbol("shutdown");

export type QueueItem = PageJob | typeof SHUTDOWN;

/**
 * Unbounded FIFO with many producers and one consumer. `push` never waits;
 * `pop` suspends the consumer until something arrives.
 */
export class JobQueue {
  private items: QueueItem[] = [];
  private head = 0;
  private waiters: Array<(item: QueueItem) => void> = [];

  get length(): number {
    return this.items.length - this.head;
  }

  /** Jobs waiting to run, not counting a queued shutdown sentinel. */
  get pendingJobs(): number {
    let count = 0;
    for (let i = this.head; i < this.items.length; i += 1) {
      if (this.items[i] !== SHUTDOWN) count += 1;
    }
    return count;
  }

  push(item: QueueItem): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  tryPop(): QueueItem | undefined {
    if (this.head >= this.items.length) return undefined;

    const item = this.items[this.head];
    this.head += 1;

    if (this.head > 64 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  pop(): Promise<QueueItem> {
    const item = this.tryPop();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
