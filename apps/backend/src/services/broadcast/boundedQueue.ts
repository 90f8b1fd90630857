interface Waiter<T> {
  resolve: (item: T | null) => void;
  detach: () => void;
}

/**
 * Fixed-capacity FIFO between one producer that must never wait and one
 * consumer that may be slow. When full, the oldest item is discarded to make
 * room and counted in `dropped`.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private droppedCount = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue without blocking. Returns false when the item was not delivered
   * cleanly: the queue is closed, or an older item had to be dropped.
   */
  offer(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve(item);
      return true;
    }

    let clean = true;
    if (this.items.length >= this.capacity) {
      this.items.shift();
      this.droppedCount += 1;
      clean = false;
    }
    this.items.push(item);
    return clean;
  }

  /**
   * Next item in FIFO order. Resolves null once the queue is closed or
   * `signal` aborts while waiting.
   */
  take(signal?: AbortSignal): Promise<T | null> {
    if (this.items.length > 0) {
      const [head, ...rest] = this.items;
      this.items = rest;
      return Promise.resolve(head);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(null);
      };
      const waiter: Waiter<T> = {
        resolve,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything currently buffered. */
  drain(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.items = [];
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.detach();
      waiter.resolve(null);
    }
  }
}
