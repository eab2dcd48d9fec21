interface Waiter<T> {
  resolve: (value: T) => void;
}

interface PendingPut<T> {
  item: T;
  resolve: () => void;
}

function onAbort(signal: AbortSignal | undefined, handler: (reason: unknown) => void): () => void {
  if (!signal) return () => {};
  const listener = () => handler(signal.reason);
  signal.addEventListener('abort', listener, { once: true });
  return () => signal.removeEventListener('abort', listener);
}

function remove<W>(list: W[], item: W): void {
  const index = list.indexOf(item);
  if (index >= 0) list.splice(index, 1);
}

export class QueueFullError extends Error {
  constructor(capacity: number) {
    super(`Queue is full (capacity ${capacity})`);
    this.name = 'QueueFullError';
  }
}

/**
 * FIFO channel between pipelines.
 *
 * With a finite capacity, `put` suspends while the queue is full; nothing is
 * ever dropped or overwritten. `get` suspends while it is empty. Both take an
 * optional AbortSignal and reject with its reason when it fires.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly getters: Waiter<T>[] = [];
  private readonly putters: PendingPut<T>[] = [];

  constructor(readonly capacity: number = Infinity) {
    if (!(capacity >= 1)) {
      throw new RangeError(`Queue capacity must be at least 1, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  put(item: T, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(signal.reason);
    if (this.offer(item)) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      const detach = onAbort(signal, reason => {
        remove(this.putters, pending);
        reject(reason);
      });
      const pending: PendingPut<T> = {
        item,
        resolve: () => {
          detach();
          resolve();
        }
      };
      this.putters.push(pending);
    });
  }

  putNowait(item: T): void {
    if (!this.offer(item)) throw new QueueFullError(this.capacity);
  }

  get(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) return Promise.reject(signal.reason);
    if (this.items.length > 0) return Promise.resolve(this.take());

    return new Promise<T>((resolve, reject) => {
      const detach = onAbort(signal, reason => {
        remove(this.getters, waiter);
        reject(reason);
      });
      const waiter: Waiter<T> = {
        resolve: value => {
          detach();
          resolve(value);
        }
      };
      this.getters.push(waiter);
    });
  }

  /**
   * Synchronously removes every buffered item and returns them in order.
   * Suspended producers are admitted afterwards, up to capacity.
   */
  drain(): T[] {
    const drained = this.items.splice(0, this.items.length);
    this.admitPutters();
    return drained;
  }

  private offer(item: T): boolean {
    const getter = this.getters.shift();
    if (getter) {
      getter.resolve(item);
      return true;
    }
    if (this.isFull) return false;
    this.items.push(item);
    return true;
  }

  private take(): T {
    const [item] = this.items.splice(0, 1);
    this.admitPutters();
    return item;
  }

  private admitPutters(): void {
    while (!this.isFull) {
      const pending = this.putters.shift();
      if (!pending) return;
      this.items.push(pending.item);
      pending.resolve();
    }
  }
}
