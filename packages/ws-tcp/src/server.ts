// TCP WebSocket server.

import type net from "node:net";
import {
  Gate,
  GateClosedError,
  HandlerRegistry,
  ServerConnection,
  WebSocketError,
  isAbortedAccept,
  resolveConnectionOptions,
  wsLogger,
  type ConnectionHost,
  type ConnectionOptions,
  type Handler,
  type Logger,
} from "@tidewire/core";
import {
  DEFAULT_LISTEN_OPTIONS,
  Listener,
  type ListenAddress,
  type ListenOptions,
} from "./listener.ts";
import { SocketStream } from "./socket-stream.ts";

/** Options for a Server. */
export interface ServerOptions extends Partial<ConnectionOptions> {
  logger?: Logger;
}

/**
 * Accepts TCP connections on any number of listeners and runs each one as a
 * WebSocket session.
 *
 * Every accept loop and every connection runs inside one gate, so `stop()`
 * can wait for all of them.
 */
export class Server implements ConnectionHost {
  readonly handlers = new HandlerRegistry();
  readonly connections = new Set<ServerConnection>();
  readonly logger: Logger;
  readonly options: ConnectionOptions;

  private readonly listeners: Listener[] = [];
  private readonly gate = new Gate();
  private stopping: Promise<void> | null = null;

  constructor(options: ServerOptions = {}) {
    this.logger = options.logger ?? wsLogger;
    this.options = resolveConnectionOptions(options);
  }

  /**
   * Bind `address` and start accepting on it.
   *
   * Resolves with the bound address once the socket is listening; accepting
   * runs in the background until `stop()`.
   */
  async listen(
    address: ListenAddress,
    options: Partial<ListenOptions> = {},
  ): Promise<net.AddressInfo> {
    if (this.stopping !== null) {
      throw WebSocketError.closed();
    }

    const listener = new Listener();
    const bound = await listener.listen(address, { ...DEFAULT_LISTEN_OPTIONS, ...options });
    this.listeners.push(listener);

    if (this.stopping !== null) {
      listener.abortAccept();
      throw WebSocketError.closed();
    }

    this.logger.info({ address: bound.address, port: bound.port }, "listening");
    void this.runAcceptLoop(listener);
    return bound;
  }

  /** Register (or replace) the handler for a subprotocol. */
  registerHandler(subprotocol: string, handler: Handler): void {
    this.handlers.register(subprotocol, handler);
  }

  isHandlerRegistered(subprotocol: string): boolean {
    return this.handlers.isRegistered(subprotocol);
  }

  /** Live connections. */
  get connectionCount(): number {
    return this.connections.size;
  }

  /** Addresses of the listeners that are still bound. */
  addresses(): net.AddressInfo[] {
    const out: net.AddressInfo[] = [];
    for (const listener of this.listeners) {
      const bound = listener.address();
      if (bound !== null) out.push(bound);
    }
    return out;
  }

  /**
   * Stop accepting, wind down every connection and wait for it.
   *
   * Listeners are aborted and every connection is aborted: input is shut
   * down so its read loop ends with the close sequence, and output a peer is
   * not reading is dropped. Once the gate drains, anything still registered
   * is closed explicitly. Later calls return the same promise.
   */
  stop(): Promise<void> {
    if (this.stopping === null) {
      this.stopping = this.runStop();
    }
    return this.stopping;
  }

  private async runStop(): Promise<void> {
    this.logger.info({ connections: this.connections.size }, "stopping");

    for (const listener of this.listeners) {
      listener.abortAccept();
    }
    for (const conn of this.connections) {
      conn.abort();
    }

    try {
      await this.gate.close();
    } finally {
      await Promise.all(
        [...this.connections].map((conn) =>
          conn.close(true).catch((e: unknown) => {
            this.logger.debug({ err: e, conn: conn.id }, "close during stop failed");
          }),
        ),
      );
    }

    await Promise.all(this.listeners.map((listener) => listener.whenClosed()));
    this.logger.info("stopped");
  }

  private async runAcceptLoop(listener: Listener): Promise<void> {
    try {
      await this.gate.run(async () => {
        while (await this.acceptOne(listener)) {
          // next connection
        }
      });
    } catch (e) {
      if (!(e instanceof GateClosedError)) {
        this.logger.error({ err: e }, "accept loop failed");
      }
    }
  }

  /** Accept one connection and start serving it; false once accepting ends. */
  private async acceptOne(listener: Listener): Promise<boolean> {
    let socket: net.Socket;
    try {
      socket = await listener.accept();
    } catch (e) {
      if (!isAbortedAccept(e)) {
        this.logger.error({ err: e }, "accept failed");
      }
      return false;
    }

    const peer = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;
    const stream = new SocketStream(socket);
    const conn = new ServerConnection(this, stream, { peer });
    this.logger.debug({ conn: conn.id, peer }, "accepted connection");
    void this.serve(conn, stream);
    return true;
  }

  private async serve(conn: ServerConnection, stream: SocketStream): Promise<void> {
    try {
      await this.gate.run(() => conn.process());
    } catch (e) {
      // The gate closed between accept and here.
      this.logger.debug({ err: e, conn: conn.id }, "connection refused");
      stream.close();
    } finally {
      conn.dispose();
    }
  }
}
