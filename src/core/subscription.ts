import type { ProgressEvent } from './types.js';

/**
 * A bounded, closable async iterable of progress events. Producers call
 * `offer`, which never blocks: when the buffer is full the event is dropped
 * and counted.
 */
export class ProgressSubscription implements AsyncIterable<ProgressEvent> {
  private queue: ProgressEvent[] = [];
  private waiters: Array<(value: ProgressEvent | undefined) => void> = [];
  private closed = false;
  private droppedCount = 0;

  constructor(
    /** Task id, or null for a subscription to every task. */
    readonly taskId: string | null,
    private readonly capacity: number,
    private readonly onClose: (sub: ProgressSubscription) => void
  ) {}

  offer(event: ProgressEvent): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return true;
    }
    if (this.queue.length >= this.capacity) {
      this.droppedCount++;
      return false;
    }
    this.queue.push(event);
    return true;
  }

  /** Stops delivery, discards anything buffered and deregisters. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    for (const waiter of this.waiters.splice(0)) waiter(undefined);
    this.onClose(this);
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  /** Next event, or undefined once the subscription is closed. */
  next(): Promise<ProgressEvent | undefined> {
    const event = this.queue.shift();
    if (event !== undefined) return Promise.resolve(event);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  async *[Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    try {
      while (true) {
        const event = await this.next();
        if (event === undefined) return;
        yield event;
      }
    } finally {
      // Breaking out of a for-await loop ends the subscription.
      this.close();
    }
  }
}
