// In-process byte stream pair.
//
// Whatever one end writes, the other reads, one chunk per write. Used as the
// transport in tests and by embedders that already own the bytes.

import { WebSocketError } from "./errors.ts";
import { type ByteStream } from "./stream.ts";

export class MemoryStream implements ByteStream {
  private peer: MemoryStream | null = null;
  private chunks: Uint8Array[] = [];
  private waiting: ((chunk: Uint8Array | null) => void) | null = null;
  private inputEnded = false;
  private inputShut = false;
  private outputShut = false;

  /** Connect two ends. */
  static pair(): [MemoryStream, MemoryStream] {
    const a = new MemoryStream();
    const b = new MemoryStream();
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  read(): Promise<Uint8Array | null> {
    const chunk = this.chunks.shift();
    if (chunk !== undefined) {
      return Promise.resolve(chunk);
    }
    if (this.inputEnded) {
      return Promise.resolve(null);
    }
    if (this.waiting !== null) {
      return Promise.reject(new Error("concurrent read on MemoryStream"));
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  write(data: Uint8Array): Promise<void> {
    if (this.outputShut || this.peer === null) {
      return Promise.reject(WebSocketError.io("write after output shutdown"));
    }
    this.peer.deliver(data.slice());
    return Promise.resolve();
  }

  shutdownInput(): void {
    this.inputShut = true;
    this.chunks = [];
    this.endInput();
  }

  shutdownOutput(): void {
    if (this.outputShut) return;
    this.outputShut = true;
    this.peer?.endInput();
  }

  close(): void {
    this.shutdownInput();
    this.shutdownOutput();
  }

  /** Chunks delivered but not yet read. */
  get pendingChunks(): number {
    return this.chunks.length;
  }

  get isInputShutdown(): boolean {
    return this.inputShut;
  }

  get isOutputShutdown(): boolean {
    return this.outputShut;
  }

  private deliver(chunk: Uint8Array): void {
    if (this.inputShut) return;
    const waiting = this.waiting;
    if (waiting !== null) {
      this.waiting = null;
      waiting(chunk);
    } else {
      this.chunks.push(chunk);
    }
  }

  private endInput(): void {
    this.inputEnded = true;
    const waiting = this.waiting;
    if (waiting !== null) {
      this.waiting = null;
      waiting(null);
    }
  }
}

/** Create a connected pair of in-memory streams. */
export function createStreamPair(): [MemoryStream, MemoryStream] {
  return MemoryStream.pair();
}
