/**
 * @fileoverview Bounded FIFO between one producer and its consumers.
 *
 * When the queue is full the newest item is dropped and already buffered
 * items are kept. Consumers wait with a timeout so they can re-check their
 * own stop condition while the queue is empty.
 */

/** Capacity used by the stream client and the upload worker pool. */
export const DEFAULT_QUEUE_CAPACITY = 10;

/** Outcome of a single {@link BoundedFrameQueue.dequeue} call. */
export type DequeueResult<T> =
  | { status: 'item'; item: T }
  | { status: 'timeout' }
  | { status: 'closed' };

/** A consumer parked in `dequeue` until an item, close, or its timeout. */
interface Waiter<T> {
  resolve: (result: DequeueResult<T>) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Fixed-capacity ring buffer with drop-newest backpressure.
 *
 * Lifecycle: open until {@link close}; after that, enqueue is refused and
 * consumers drain what is left before observing `closed`.
 */
export class BoundedFrameQueue<T> {
  private readonly slots: ({ value: T } | null)[];
  private readIndex = 0;
  private writeIndex = 0;
  private count = 0;
  private closed = false;
  private dropped = 0;
  private readonly waiters: Waiter<T>[] = [];

  constructor(readonly capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<{ value: T } | null>(capacity).fill(null);
  }

  /** Number of buffered items. */
  get size(): number {
    return this.count;
  }

  /** Items refused because the queue was full. */
  get droppedCount(): number {
    return this.dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Appends an item unless the queue is full or closed.
   *
   * @returns False when the item was dropped.
   */
  enqueue(item: T): boolean {
    if (this.closed) return false;

    // A parked consumer implies the ring is empty, so handing over keeps FIFO
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve({ status: 'item', item });
      return true;
    }

    if (this.count >= this.capacity) {
      this.dropped++;
      return false;
    }

    this.slots[this.writeIndex] = { value: item };
    this.writeIndex = (this.writeIndex + 1) % this.capacity;
    this.count++;
    return true;
  }

  /**
   * Removes the oldest item, waiting up to `timeoutMs` for one to arrive.
   *
   * Resolves `closed` only once the queue is both closed and empty.
   */
  dequeue(timeoutMs: number): Promise<DequeueResult<T>> {
    if (this.count > 0) {
      return Promise.resolve<DequeueResult<T>>({ status: 'item', item: this.shift() });
    }
    if (this.closed) {
      return Promise.resolve<DequeueResult<T>>({ status: 'closed' });
    }

    return new Promise<DequeueResult<T>>((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve({ status: 'timeout' });
        }, Math.max(0, timeoutMs)),
      };
      this.waiters.push(waiter);
    });
  }

  /** Stops accepting items. Parked consumers observe `closed` immediately. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve({ status: 'closed' });
    }
  }

  private shift(): T {
    const slot = this.slots[this.readIndex];
    if (!slot) {
      throw new Error(`Frame queue slot ${this.readIndex} is empty with ${this.count} items buffered`);
    }
    this.slots[this.readIndex] = null;
    this.readIndex = (this.readIndex + 1) % this.capacity;
    this.count--;
    return slot.value;
  }
}
