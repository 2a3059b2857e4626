// Bounded async queue carrying messages between frame loops and handlers.

import { WebSocketError } from "./errors.ts";

interface BlockedProducer<T> {
  value: T;
  resolve: () => void;
  reject: (err: Error) => void;
}

/** Default number of messages buffered per direction. */
export const DEFAULT_QUEUE_CAPACITY = 64;

/**
 * A bounded multi-producer multi-consumer queue.
 *
 * `push` suspends while the queue is full and `pop` suspends while it is
 * empty. After `close`, blocked and later producers are rejected with a
 * `closed` error; consumers drain what is buffered and then get `null`.
 */
export class AsyncQueue<T> {
  private buffer: T[] = [];
  private consumers: Array<(value: T | null) => void> = [];
  private producers: Array<BlockedProducer<T>> = [];
  private closed = false;

  constructor(readonly capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(WebSocketError.closed());
    }
    if (this.tryPush(value)) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.producers.push({ value, resolve, reject });
    });
  }

  /** Push without waiting. Returns false if the queue is full or closed. */
  tryPush(value: T): boolean {
    if (this.closed) return false;

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer(value);
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }

    return false;
  }

  pop(): Promise<T | null> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift()!;
      // Room freed: admit the longest-waiting producer.
      const producer = this.producers.shift();
      if (producer) {
        this.buffer.push(producer.value);
        producer.resolve();
      }
      return Promise.resolve(value);
    }

    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      this.consumers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const consumer of this.consumers) {
      consumer(null);
    }
    this.consumers.length = 0;

    for (const producer of this.producers) {
      producer.reject(WebSocketError.closed());
    }
    this.producers.length = 0;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Buffered messages. */
  get size(): number {
    return this.buffer.length;
  }

  /** Producers suspended on a full queue. */
  get blockedProducers(): number {
    return this.producers.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const value = await this.pop();
      if (value === null) {
        return;
      }
      yield value;
    }
  }
}

const encoder = new TextEncoder();

/**
 * The handler's end of the inbound queue.
 *
 * Payloads arrive in frame order; `recv` returns `null` once the connection
 * is closing and nothing is left.
 */
export class MessageReceiver {
  constructor(private readonly queue: AsyncQueue<Uint8Array>) {}

  recv(): Promise<Uint8Array | null> {
    return this.queue.pop();
  }

  isClosed(): boolean {
    return this.queue.isClosed();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    while (true) {
      const payload = await this.recv();
      if (payload === null) {
        return;
      }
      yield payload;
    }
  }
}

/**
 * The handler's end of the outbound queue.
 *
 * Strings are sent as their UTF-8 bytes. `send` suspends while the queue is
 * full and rejects once the connection is closing.
 */
export class MessageSender {
  constructor(private readonly queue: AsyncQueue<Uint8Array>) {}

  send(payload: Uint8Array | string): Promise<void> {
    const bytes = typeof payload === "string" ? encoder.encode(payload) : payload;
    return this.queue.push(bytes);
  }

  isClosed(): boolean {
    return this.queue.isClosed();
  }
}

/** Create a queue and the two handler-facing ends over it. */
export function createQueuePair(
  capacity = DEFAULT_QUEUE_CAPACITY,
): [MessageSender, MessageReceiver, AsyncQueue<Uint8Array>] {
  const queue = new AsyncQueue<Uint8Array>(capacity);
  return [new MessageSender(queue), new MessageReceiver(queue), queue];
}
