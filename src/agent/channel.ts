import { ChannelClosedError } from '../errors.js';

type Waiter<T> = {
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

/**
 * FIFO hand-off between a producer and the run that consumes it.
 * `deliver` never blocks; `receive` suspends until an item arrives.
 */
export class AsyncChannel<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  constructor(readonly name: string) {}

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  deliver(item: T): void {
    if (this.closed) throw new ChannelClosedError(this.name);
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(item);
    else this.items.push(item);
  }

  /** Removes and returns everything queued so far without waiting. */
  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  receive(signal?: AbortSignal): Promise<T> {
    if (this.items.length > 0) {
      const [head, ...rest] = this.items;
      this.items = rest;
      return Promise.resolve(head);
    }
    if (this.closed) return Promise.reject(new ChannelClosedError(this.name));
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter(w => w !== waiter);
        reject(signal?.reason);
      };
      const waiter: Waiter<T> = {
        resolve: value => { signal?.removeEventListener('abort', onAbort); resolve(value); },
        reject: reason => { signal?.removeEventListener('abort', onAbort); reject(reason); },
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(new ChannelClosedError(this.name));
  }
}
