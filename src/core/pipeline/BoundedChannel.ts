/**
 * BoundedChannel - capacity-limited async queue between a callback-driven
 * source (vendor SDK events) and a single async consumer.
 *
 * send() resolves once the item is queued; it waits while the queue is full.
 * push() never waits: it queues past capacity and reports whether the queue
 * was still within it.
 * Iteration ends after close() once everything queued has been drained.
 * fail() ends iteration by rejecting the consumer with the given error.
 */

import { PodcastError } from '../errors.js';

interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: Error) => void;
}

export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly queue: Array<{ value: T }> = [];
  private readonly receivers: Waiter<T>[] = [];
  private readonly senders: Array<() => void> = [];
  private closed = false;
  private failure: Error | null = null;

  constructor(private readonly capacity = 64) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  async send(item: T): Promise<void> {
    while (!this.closed && this.queue.length >= this.capacity) {
      await new Promise<void>((resolve) => this.senders.push(resolve));
    }
    if (this.closed) {
      throw new PodcastError('Channel is closed', 'BUFFER_CLOSED');
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve({ value: item, done: false });
      return;
    }
    this.queue.push({ value: item });
  }

  push(item: T): boolean {
    if (this.closed) {
      throw new PodcastError('Channel is closed', 'BUFFER_CLOSED');
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve({ value: item, done: false });
      return true;
    }
    this.queue.push({ value: item });
    return this.queue.length <= this.capacity;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.releaseSenders();
    for (const receiver of this.receivers.splice(0)) {
      receiver.resolve({ value: undefined, done: true });
    }
  }

  /**
   * Close the channel and make the consumer's next read throw.
   */
  fail(error: Error): void {
    if (this.closed) {
      return;
    }
    this.failure = error;
    this.queue.length = 0;
    this.closed = true;
    this.releaseSenders();
    for (const receiver of this.receivers.splice(0)) {
      receiver.reject(error);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.queue.length;
  }

  private next(): Promise<IteratorResult<T>> {
    const head = this.queue.shift();
    if (head) {
      this.senders.shift()?.();
      return Promise.resolve({ value: head.value, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => this.receivers.push({ resolve, reject }));
  }

  private releaseSenders(): void {
    for (const sender of this.senders.splice(0)) {
      sender();
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
