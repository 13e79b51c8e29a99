import { SEARCH_DEFAULTS } from '../constants';

/**
 * Producer-side view of a channel
 */
export interface ChannelSender<T> {
  /**
   * Resolves true once the value is buffered or handed to a waiting receiver,
   * false when the receiving side has cancelled. Waits while the buffer is full.
   */
  send(value: T): Promise<boolean>;
  /** End of stream; receivers drain what is buffered, then finish */
  close(): void;
  readonly isCancelled: boolean;
}

interface PendingSend<T> {
  value: T;
  resolve: (accepted: boolean) => void;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Bounded single-producer / single-consumer FIFO channel.
 *
 * Closing (producer) lets the consumer drain the buffer. Cancelling (consumer)
 * drops the buffer and makes every pending and later send resolve false.
 */
export class BoundedChannel<T> implements ChannelSender<T>, AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly pendingSends: PendingSend<T>[] = [];
  private readonly receivers: Receiver<T>[] = [];
  private readonly capacity: number;
  private closed = false;
  private cancelled = false;

  constructor(capacity: number = SEARCH_DEFAULTS.CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  send(value: T): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.pendingSends.push({ value, resolve });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();

      const pending = this.pendingSends.shift();
      if (pending) {
        this.buffer.push(pending.value);
        pending.resolve(true);
      }
      return Promise.resolve({ done: false, value });
    }

    if (this.closed) {
      return Promise.resolve(DONE);
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    // Receivers only wait on an empty buffer
    for (const receiver of this.receivers.splice(0)) {
      receiver(DONE);
    }
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.closed = true;
    this.buffer.length = 0;
    for (const pending of this.pendingSends.splice(0)) {
      pending.resolve(false);
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver(DONE);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
      return: () => {
        this.cancel();
        return Promise.resolve(DONE);
      },
    };
  }
}
