// ByteStream over a TCP socket.

import type net from "node:net";
import { type ByteStream, WebSocketError } from "@tidewire/core";

/** Buffered input above which the socket is paused until reads catch up. */
export const DEFAULT_HIGH_WATER_MARK = 1 << 20;

interface PendingRead {
  resolve: (chunk: Uint8Array | null) => void;
  reject: (err: Error) => void;
}

/**
 * Adapts a `net.Socket` to the pull-based ByteStream interface.
 *
 * Incoming chunks are queued until read. The socket should be created with
 * `allowHalfOpen` so that the peer's FIN ends only our input and the close
 * handshake can still be written.
 */
export class SocketStream implements ByteStream {
  private readonly socket: net.Socket;
  private readonly highWaterMark: number;
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private pending: PendingRead | null = null;
  private writes = new Set<(err: Error) => void>();
  private ended = false;
  private error: Error | null = null;

  constructor(socket: net.Socket, highWaterMark = DEFAULT_HIGH_WATER_MARK) {
    this.socket = socket;
    this.highWaterMark = highWaterMark;

    socket.on("data", (chunk: Buffer) => this.onData(chunk));
    socket.on("end", () => this.onEnd());
    socket.on("close", () => {
      this.onEnd();
      this.failWrites();
    });
    socket.on("error", (err: Error) => {
      this.error = err;
      this.onEnd();
    });
  }

  /** Get the underlying socket. */
  getSocket(): net.Socket {
    return this.socket;
  }

  read(): Promise<Uint8Array | null> {
    if (this.chunks.length > 0) {
      const chunk = this.chunks.shift()!;
      this.buffered -= chunk.length;
      if (this.socket.isPaused() && this.buffered < this.highWaterMark && !this.ended) {
        this.socket.resume();
      }
      return Promise.resolve(chunk);
    }

    if (this.error) {
      const err = this.error;
      this.error = null;
      return Promise.reject(WebSocketError.io(err.message, err));
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    if (this.pending !== null) {
      return Promise.reject(new Error("concurrent read on socket stream"));
    }

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  write(data: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.socket.destroyed || this.socket.writableEnded) {
        reject(WebSocketError.io("write after output shutdown"));
        return;
      }
      this.writes.add(reject);
      this.socket.write(data, (err) => {
        this.writes.delete(reject);
        if (err) reject(WebSocketError.io(err.message, err));
        else resolve();
      });
    });
  }

  shutdownInput(): void {
    this.chunks = [];
    this.buffered = 0;
    this.socket.pause();
    this.onEnd();
  }

  shutdownOutput(): void {
    if (!this.socket.destroyed && !this.socket.writableEnded) {
      this.socket.end();
    }
  }

  /** Destroy the socket. Writes still waiting on it reject. */
  close(): void {
    this.socket.destroy();
    this.failWrites();
  }

  private onData(chunk: Buffer): void {
    if (this.ended) return;
    const bytes = new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength);

    const pending = this.pending;
    if (pending !== null) {
      this.pending = null;
      pending.resolve(bytes);
      return;
    }

    this.chunks.push(bytes);
    this.buffered += bytes.length;
    if (this.buffered >= this.highWaterMark) {
      this.socket.pause();
    }
  }

  private failWrites(): void {
    if (this.writes.size === 0) return;
    const writes = this.writes;
    this.writes = new Set();
    for (const reject of writes) {
      reject(WebSocketError.io("socket closed with a write pending"));
    }
  }

  private onEnd(): void {
    this.ended = true;
    const pending = this.pending;
    if (pending === null) return;
    this.pending = null;

    if (this.error) {
      const err = this.error;
      this.error = null;
      pending.reject(WebSocketError.io(err.message, err));
    } else {
      pending.resolve(null);
    }
  }
}
