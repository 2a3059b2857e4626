// Listening socket with pull-style accept.

import net from "node:net";
import { WebSocketError } from "@tidewire/core";

export interface ListenAddress {
  /** Interface to bind; all interfaces when omitted. */
  host?: string;
  /** Port to bind; 0 picks a free one. */
  port: number;
}

export interface ListenOptions {
  backlog: number;
}

export const DEFAULT_LISTEN_OPTIONS: ListenOptions = { backlog: 511 };

interface PendingAccept {
  resolve: (socket: net.Socket) => void;
  reject: (err: Error) => void;
}

/**
 * A bound TCP listener.
 *
 * Connections that arrive before anyone calls `accept()` are queued.
 * `abortAccept()` stops listening and fails every pending and later accept
 * with an "aborted" WebSocketError.
 */
export class Listener {
  private readonly server: net.Server;
  private queued: net.Socket[] = [];
  private waiters: PendingAccept[] = [];
  private aborted = false;
  private failure: Error | null = null;
  private readonly closed: Promise<void>;

  constructor() {
    this.server = net.createServer({ allowHalfOpen: true });
    this.server.on("connection", (socket) => this.onConnection(socket));
    this.closed = new Promise((resolve) => {
      this.server.once("close", () => resolve());
    });
  }

  /** Bind and start listening. Resolves with the bound address. */
  listen(
    address: ListenAddress,
    options: ListenOptions = DEFAULT_LISTEN_OPTIONS,
  ): Promise<net.AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once("error", onError);
      this.server.listen({ host: address.host, port: address.port, backlog: options.backlog }, () => {
        this.server.off("error", onError);
        this.server.on("error", (err) => this.onError(err));
        const bound = this.address();
        if (bound === null) {
          reject(new Error("listener has no TCP address"));
          return;
        }
        resolve(bound);
      });
    });
  }

  address(): net.AddressInfo | null {
    const bound = this.server.address();
    if (bound === null || typeof bound === "string") return null;
    return bound;
  }

  accept(): Promise<net.Socket> {
    if (this.aborted) {
      return Promise.reject(WebSocketError.aborted());
    }
    const socket = this.queued.shift();
    if (socket !== undefined) {
      return Promise.resolve(socket);
    }
    if (this.failure !== null) {
      return Promise.reject(WebSocketError.io(this.failure.message, this.failure));
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  abortAccept(): void {
    if (this.aborted) return;
    this.aborted = true;
    this.server.close();

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(WebSocketError.aborted());
    }

    const queued = this.queued;
    this.queued = [];
    for (const socket of queued) {
      socket.destroy();
    }
  }

  /**
   * Resolves once the listener is closed and every socket it accepted has
   * been closed too.
   */
  whenClosed(): Promise<void> {
    return this.closed;
  }

  private onConnection(socket: net.Socket): void {
    if (this.aborted) {
      socket.destroy();
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter !== undefined) {
      waiter.resolve(socket);
    } else {
      this.queued.push(socket);
    }
  }

  private onError(err: Error): void {
    this.failure = err;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(WebSocketError.io(err.message, err));
    }
  }
}
