/**
 * Bounded async channel
 *
 * A FIFO connecting pipeline stages. `send` waits while the buffer is full
 * (capacity 0 means every send waits for a receiver), `receive` waits while it
 * is empty. After `close`, receivers drain what is left and then see `done`.
 */

import { Errors } from './errors.js';

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly senders: Array<PendingSend<T>> = [];
  private readonly receivers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private readonly capacity: number;
  private closed = false;

  constructor(capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error(`channel capacity must be a non-negative integer (got ${capacity})`);
    }
    this.capacity = capacity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(Errors.channelClosed());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      // a slot just opened up for the oldest blocked sender
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.value);
        sender.resolve();
      }
      return Promise.resolve({ value, done: false });
    }

    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ value: sender.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) {
      throw Errors.channelClosed();
    }
    this.closed = true;

    // Receivers only wait on an empty channel, so nothing is left for them
    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(Errors.channelClosed());
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }
}
