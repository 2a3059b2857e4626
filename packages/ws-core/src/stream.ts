// Byte stream abstraction and buffered input/output over it.
//
// A ByteStream is one accepted connection: chunks in, chunks out, and the two
// halves can be shut down independently. InputBuffer feeds stream chunks to
// incremental parsers; OutputBuffer batches writes until flush.

import { type StreamConsumer, EMPTY_BYTES } from "@tidewire/wire";
import { WebSocketError } from "./errors.ts";

/** A reliable, ordered, half-closable byte stream. */
export interface ByteStream {
  /** Next chunk of input, or `null` once input has ended. */
  read(): Promise<Uint8Array | null>;

  /** Write a chunk; resolves once the transport has taken it. */
  write(data: Uint8Array): Promise<void>;

  /**
   * Stop reading. Pending and later reads resolve with `null`.
   */
  shutdownInput(): void;

  /** Signal end of output to the peer. */
  shutdownOutput(): void;

  /** Tear down both halves. */
  close(): void;
}

/** Buffered reader that drives StreamConsumers. */
export class InputBuffer {
  private leftover: Uint8Array = EMPTY_BYTES;
  private closed = false;

  constructor(private readonly stream: ByteStream) {}

  /**
   * Feed input to `consumer` until it completes or input ends.
   *
   * Bytes the consumer does not take are kept for the next call.
   */
  async consume(consumer: StreamConsumer): Promise<void> {
    while (true) {
      let chunk: Uint8Array | null;
      if (this.leftover.length > 0) {
        chunk = this.leftover;
        this.leftover = EMPTY_BYTES;
      } else if (this.closed) {
        chunk = null;
      } else {
        chunk = await this.stream.read();
      }

      if (chunk === null) {
        consumer.end();
        return;
      }

      const rest = consumer.consume(chunk);
      if (rest !== null) {
        this.leftover = rest;
        return;
      }
    }
  }

  /** Close the input half. Safe to call more than once. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.leftover = EMPTY_BYTES;
    this.stream.shutdownInput();
  }

  isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Buffered writer.
 *
 * `write` appends synchronously, so bytes from one `write` call are never
 * interleaved with another's. Flushes are serialized in call order.
 */
export class OutputBuffer {
  private pending: Uint8Array[] = [];
  private pendingBytes = 0;
  private tail: Promise<void> = Promise.resolve();
  private failure: Error | null = null;
  private closing: Promise<void> | null = null;
  private flushing = 0;

  constructor(private readonly stream: ByteStream) {}

  write(data: Uint8Array): void {
    if (this.closing !== null) {
      throw WebSocketError.closed();
    }
    if (data.length === 0) return;
    this.pending.push(data);
    this.pendingBytes += data.length;
  }

  /** Hand everything written so far to the stream. */
  flush(): Promise<void> {
    const chunk = this.takePending();
    this.flushing++;
    const done = this.tail.then(async () => {
      if (this.failure !== null) throw this.failure;
      if (chunk.length > 0) {
        await this.stream.write(chunk);
      }
    });
    this.tail = done.then(
      () => {
        this.flushing--;
      },
      (err: unknown) => {
        this.flushing--;
        this.failure ??= err instanceof Error ? err : WebSocketError.io(String(err));
      },
    );
    return done;
  }

  /** A flush has been requested and the stream has not taken it yet. */
  isFlushing(): boolean {
    return this.flushing > 0;
  }

  /** Flush, then shut down the output half. Later calls share the result. */
  close(): Promise<void> {
    if (this.closing === null) {
      const flushed = this.flush();
      this.closing = flushed.finally(() => {
        this.stream.shutdownOutput();
      });
    }
    return this.closing;
  }

  isClosed(): boolean {
    return this.closing !== null;
  }

  private takePending(): Uint8Array {
    if (this.pending.length === 0) return EMPTY_BYTES;
    if (this.pending.length === 1) {
      const only = this.pending[0];
      this.pending = [];
      this.pendingBytes = 0;
      return only;
    }
    const out = new Uint8Array(this.pendingBytes);
    let offset = 0;
    for (const part of this.pending) {
      out.set(part, offset);
      offset += part.length;
    }
    this.pending = [];
    this.pendingBytes = 0;
    return out;
  }
}
