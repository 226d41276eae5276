export class QueueClosedError extends Error {
  constructor(message = 'Queue has been closed') {
    super(message);
    this.name = 'QueueClosedError';
  }
}

interface PendingPut<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Fixed-capacity async FIFO. `put` waits while the queue is full, `get` waits
 * while it is empty. `end()` is the end-of-stream marker: queued items are
 * still delivered, then `get` resolves to null; waiting and later puts reject.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly getters: Array<(item: T | null) => void> = [];
  private readonly putters: Array<PendingPut<T>> = [];
  private ended = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size() {
    return this.items.length;
  }

  get waitingPuts() {
    return this.putters.length;
  }

  get isEnded() {
    return this.ended;
  }

  put(item: T): Promise<void> {
    if (this.ended) {
      return Promise.reject(new QueueClosedError());
    }
    const getter = this.getters.shift();
    if (getter) {
      getter(item);
      return Promise.resolve();
    }
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.putters.push({ item, resolve, reject });
    });
  }

  get(): Promise<T | null> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      const putter = this.putters.shift();
      if (putter) {
        this.items.push(putter.item);
        putter.resolve();
      }
      return Promise.resolve(item);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise<T | null>((resolve) => {
      this.getters.push(resolve);
    });
  }

  end() {
    if (this.ended) return;
    this.ended = true;
    for (const putter of this.putters.splice(0)) {
      putter.reject(new QueueClosedError());
    }
    for (const getter of this.getters.splice(0)) {
      getter(null);
    }
  }
}
