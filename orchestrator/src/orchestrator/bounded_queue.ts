import type { QueuePolicy } from "./config.js";
import { QueueClosedError, QueueFullError } from "./errors.js";

export interface QueueItem<T> {
  /** Admission order, starting at 0. */
  readonly seq: number;
  readonly value: T;
}

interface WaitingProducer {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * FIFO with a fixed capacity. Under `block` a push waits for room; under
 * `reject` it throws QueueFullError.
 */
export class BoundedQueue<T> {
  private readonly items: QueueItem<T>[] = [];
  private readonly consumers: Array<(item: QueueItem<T> | null) => void> = [];
  private readonly producers: WaitingProducer[] = [];
  private nextSeq = 0;
  private closed = false;

  constructor(
    readonly capacity: number,
    readonly policy: QueuePolicy = "block",
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer; received ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Resolves with the admission sequence number. */
  async push(value: T): Promise<number> {
    for (;;) {
      if (this.closed) {
        throw new QueueClosedError();
      }

      const consumer = this.consumers.shift();
      if (consumer) {
        const item = { seq: this.nextSeq++, value };
        consumer(item);
        return item.seq;
      }

      if (this.items.length < this.capacity) {
        const item = { seq: this.nextSeq++, value };
        this.items.push(item);
        return item.seq;
      }

      if (this.policy === "reject") {
        throw new QueueFullError(this.capacity);
      }

      await new Promise<void>((resolve, reject) => {
        this.producers.push({ resolve, reject });
      });
    }
  }

  /** Next item in admission order, or null once the queue is closed and drained. */
  async pull(): Promise<QueueItem<T> | null> {
    const item = this.items.shift();
    if (item) {
      this.producers.shift()?.resolve();
      return item;
    }
    if (this.closed) {
      return null;
    }
    return new Promise((resolve) => {
      this.consumers.push(resolve);
    });
  }

  /**
   * Stops admissions. Waiting producers get QueueClosedError; idle consumers
   * get null. Returns how many pending items were discarded.
   */
  close(options: { discardPending?: boolean } = {}): number {
    this.closed = true;
    const discarded = options.discardPending ? this.items.splice(0).length : 0;

    for (const producer of this.producers.splice(0)) {
      producer.reject(new QueueClosedError());
    }
    if (this.items.length === 0) {
      for (const consumer of this.consumers.splice(0)) {
        consumer(null);
      }
    }
    return discarded;
  }
}
