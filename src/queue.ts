export type QueueEntry<T> = { readonly kind: 'item'; readonly value: T } | { readonly kind: 'end' };

export class QueueAbortedError extends Error {
  constructor() {
    super('queue wait aborted');
    this.name = 'QueueAbortedError';
  }
}

interface Waiter<T> {
  resolve: (entry: QueueEntry<T>) => void;
  reject: (error: Error) => void;
}

/**
 * FIFO channel between the downloader and uploader activities. The producer
 * pushes items then closes it once; the consumer pops until it sees `end`.
 */
export class HandoffQueue<T> {
  private readonly entries: QueueEntry<T>[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  get size(): number {
    return this.entries.length;
  }

  push(value: T): void {
    if (this.closed) {
      throw new Error('cannot push to a closed queue');
    }
    this.deliver({ kind: 'item', value });
  }

  /** Appends the end-of-stream marker; later calls are no-ops. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.deliver({ kind: 'end' });
  }

  /**
   * Resolves with the oldest entry, waiting when the queue is empty. Rejects
   * with QueueAbortedError once the signal aborts.
   */
  pop(signal?: AbortSignal): Promise<QueueEntry<T>> {
    if (signal?.aborted) {
      return Promise.reject(new QueueAbortedError());
    }

    const next = this.entries.shift();
    if (next) {
      return Promise.resolve(next);
    }

    return new Promise<QueueEntry<T>>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(new QueueAbortedError());
      };
      const waiter: Waiter<T> = {
        resolve: (entry) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(entry);
        },
        reject,
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private deliver(entry: QueueEntry<T>): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(entry);
      return;
    }
    this.entries.push(entry);
  }
}
