// =============================================================================
// @feedsieve/worker: Semaphore and result channel
// =============================================================================
// The fetch scheduler bounds in-flight fetches with a Semaphore and hands
// finished results to a single consumer through a ResultChannel, in the
// order they complete.
// =============================================================================

/** Rejection reason for waiters that were still queued when aborted. */
export class AbortedError extends Error {
  constructor(message = "operation aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

interface Waiter {
  resolve: () => void;
  cleanup: () => void;
}

export class Semaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  /** Permits currently held. */
  get inUse(): number {
    return this.capacity - this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Resolves once a permit is held. A signal that aborts while waiting
   * rejects with AbortedError and no permit is taken.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new AbortedError());
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const i = this.waiters.indexOf(waiter);
        if (i !== -1) this.waiters.splice(i, 1);
        reject(new AbortedError());
      };
      const waiter: Waiter = {
        resolve,
        cleanup: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Hands the permit to the next waiter, or returns it to the pool. */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.cleanup();
      next.resolve();
      return;
    }
    if (this.available >= this.capacity) {
      throw new Error("semaphore released more times than acquired");
    }
    this.available++;
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/**
 * Unbounded multi-producer, single-consumer queue. Iteration ends once
 * close() was called and every buffered value has been read.
 */
export class ResultChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly readers: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  send(value: T): void {
    if (this.closed) {
      throw new Error("send on closed channel");
    }
    const reader = this.readers.shift();
    if (reader) reader({ value, done: false });
    else this.buffer.push(value);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const reader of this.readers.splice(0)) {
      reader({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.readers.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
