// Server-side WebSocket connection.
//
// One accepted byte stream: the upgrade handshake, then three concurrent
// activities sharing two bounded queues. The read loop decodes frames into
// the inbound queue, the response loop encodes the outbound queue into
// frames, and the subprotocol handler sits between the two. Whichever side
// finishes or fails first runs the close sequence, which closes both queues
// and the output half so the others observe termination at their next
// suspension point.

import {
  EMPTY_BYTES,
  FrameParser,
  HttpRequestParser,
  Opcode,
  isDataOpcode,
  computeAcceptKey,
  buildUpgradeResponse,
  encodeFrame,
  opcodeName,
  DEFAULT_MAX_HEADER_BYTES,
  DEFAULT_MAX_PAYLOAD_SIZE,
  type HttpRequest,
} from "@tidewire/wire";
import { WebSocketError, isWebSocketError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { AsyncQueue, DEFAULT_QUEUE_CAPACITY, MessageReceiver, MessageSender } from "./queue.ts";
import type { Handler, HandlerRegistry } from "./registry.ts";
import { type ByteStream, InputBuffer, OutputBuffer } from "./stream.ts";
import { joinAll } from "./task.ts";

/** Per-connection limits and policies. */
export interface ConnectionOptions {
  /** Messages buffered per direction before producers suspend. */
  queueCapacity: number;
  /** Largest accepted inbound frame payload. */
  maxPayloadSize: number;
  /** Largest accepted upgrade request head. */
  maxHeaderBytes: number;
  /** Treat unmasked client frames as decode errors. */
  requireMask: boolean;
  /** Answer PING with a PONG carrying the same payload. */
  replyToPing: boolean;
}

export const DEFAULT_CONNECTION_OPTIONS: ConnectionOptions = {
  queueCapacity: DEFAULT_QUEUE_CAPACITY,
  maxPayloadSize: DEFAULT_MAX_PAYLOAD_SIZE,
  maxHeaderBytes: DEFAULT_MAX_HEADER_BYTES,
  requireMask: true,
  replyToPing: true,
};

export function resolveConnectionOptions(
  options: Partial<ConnectionOptions> = {},
): ConnectionOptions {
  return {
    queueCapacity: options.queueCapacity ?? DEFAULT_CONNECTION_OPTIONS.queueCapacity,
    maxPayloadSize: options.maxPayloadSize ?? DEFAULT_CONNECTION_OPTIONS.maxPayloadSize,
    maxHeaderBytes: options.maxHeaderBytes ?? DEFAULT_CONNECTION_OPTIONS.maxHeaderBytes,
    requireMask: options.requireMask ?? DEFAULT_CONNECTION_OPTIONS.requireMask,
    replyToPing: options.replyToPing ?? DEFAULT_CONNECTION_OPTIONS.replyToPing,
  };
}

/**
 * What a connection needs from the server that accepted it.
 *
 * `connections` is the live-connection registry; a connection adds itself
 * when constructed and removes itself in `dispose()`.
 */
export interface ConnectionHost {
  readonly handlers: HandlerRegistry;
  readonly connections: Set<ServerConnection>;
  readonly logger: Logger;
  readonly options: ConnectionOptions;
}

/** Close handshake progress. */
export type CloseState = "open" | "closing" | "closed";

const encoder = new TextEncoder();

let nextConnectionId = 1;

export class ServerConnection {
  readonly id: number;
  readonly peer: string;

  private readonly input: InputBuffer;
  private readonly output: OutputBuffer;
  private readonly httpParser: HttpRequestParser;
  private readonly frameParser: FrameParser;
  private readonly inbound: AsyncQueue<Uint8Array>;
  private readonly outbound: AsyncQueue<Uint8Array>;
  private readonly log: Logger;

  private handler: Handler | null = null;
  private request: HttpRequest | null = null;
  private _subprotocol = "";
  private done = false;
  private _state: CloseState = "open";
  private closing: Promise<void> | null = null;
  private closeAfterDrain = false;
  private aborting = false;
  private disposed = false;

  constructor(
    private readonly host: ConnectionHost,
    private readonly stream: ByteStream,
    info: { peer?: string } = {},
  ) {
    this.id = nextConnectionId++;
    this.peer = info.peer ?? "unknown";

    const { options } = host;
    this.input = new InputBuffer(stream);
    this.output = new OutputBuffer(stream);
    this.httpParser = new HttpRequestParser({ maxHeaderBytes: options.maxHeaderBytes });
    this.frameParser = new FrameParser({
      maxPayloadSize: options.maxPayloadSize,
      requireMask: options.requireMask,
    });
    this.inbound = new AsyncQueue(options.queueCapacity);
    this.outbound = new AsyncQueue(options.queueCapacity);
    this.log = host.logger.child({ conn: this.id, peer: this.peer });

    host.connections.add(this);
  }

  /** Negotiated subprotocol; "" until the handshake succeeds or if none. */
  get subprotocol(): string {
    return this._subprotocol;
  }

  get state(): CloseState {
    return this._state;
  }

  /** The read loop has been told to stop. */
  get isDone(): boolean {
    return this.done;
  }

  /**
   * Run the connection to completion.
   *
   * Never rejects: failures have already driven the close sequence by the
   * time they surface here, so they are only logged.
   */
  async process(): Promise<void> {
    try {
      await joinAll([this.readLoop(), this.responseLoop()]);
    } catch (e) {
      this.log.debug({ err: e }, "processing failed");
    } finally {
      this.stream.close();
      this.log.debug("connection finished");
    }
  }

  /** Half-close the input so the read loop observes end of stream. */
  shutdownInput(): void {
    this.stream.shutdownInput();
  }

  /**
   * Wind the connection down without depending on the peer.
   *
   * Input is shut down as with `shutdownInput()`. No CLOSE frame is sent
   * from here on, and output the peer has stopped accepting is dropped by
   * tearing the stream down, so every loop finishes.
   */
  abort(): void {
    if (this.aborting) return;
    this.aborting = true;
    this.stream.shutdownInput();
    this.dropStalledOutput();
  }

  /**
   * Run the close sequence once.
   *
   * The read loop is marked done and both queues are closed at once. With
   * `sendClose`, a CLOSE frame is then sent (best effort, skipped after
   * `abort()`), and the output half is shut down. Later calls return the
   * first call's promise.
   */
  close(sendClose = true): Promise<void> {
    if (this.closing === null) {
      this.closing = this.runClose(sendClose);
    }
    return this.closing;
  }

  /** Remove this connection from its host's registry. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.host.connections.delete(this);
  }

  private async runClose(sendClose: boolean): Promise<void> {
    this._state = "closing";
    // No data frame may follow the CLOSE frame.
    this.done = true;
    this.inbound.close();
    this.outbound.close();

    if (this.aborting) {
      this.dropStalledOutput();
    } else if (sendClose) {
      try {
        await this.sendData(Opcode.Close, EMPTY_BYTES);
      } catch (e) {
        this.log.debug({ err: e }, "failed to send close frame");
      }
    }

    try {
      await this.output.close();
    } catch (e) {
      this.log.debug({ err: e }, "failed to shut down output");
    }
    this._state = "closed";
  }

  private async readLoop(): Promise<void> {
    try {
      await this.readHttpUpgradeRequest();
      const handler = this.handler;
      if (handler !== null) {
        await joinAll([this.runHandler(handler), this.readFrames()]);
      }
    } finally {
      // Covers an idle close or a rejected handshake: nothing else would end
      // the response loop.
      await this.close(false);
      this.input.close();
    }
  }

  private async readFrames(): Promise<void> {
    while (!this.done) {
      await this.readOne();
    }
  }

  private async runHandler(handler: Handler): Promise<void> {
    const request = this.request;
    if (request === null) {
      throw new Error("handler started before handshake completed");
    }

    try {
      await handler(new MessageReceiver(this.inbound), new MessageSender(this.outbound), {
        subprotocol: this._subprotocol,
        request,
        logger: this.log,
      });
    } catch (e) {
      this.log.debug({ err: e }, "handler failed");
      await this.close(true);
      this.input.close();
      throw WebSocketError.handler(e);
    }
    // Let the response loop send what the handler queued, then close.
    this.closeAfterDrain = true;
    this.outbound.close();
  }

  private async readHttpUpgradeRequest(): Promise<void> {
    this.httpParser.init();
    await this.input.consume(this.httpParser);

    if (this.httpParser.eof()) {
      this.done = true;
      return;
    }

    const request = this.httpParser.getParsedRequest();
    if (request === null) {
      throw WebSocketError.protocol("incorrect upgrade request");
    }

    if (request.getHeader("Upgrade").toLowerCase() !== "websocket") {
      throw WebSocketError.protocol("upgrade header missing");
    }

    const negotiated = this.host.handlers.negotiate(request.getHeader("Sec-WebSocket-Protocol"));
    if (negotiated === null) {
      throw WebSocketError.protocol("subprotocol not supported");
    }

    const key = request.getHeader("Sec-WebSocket-Key");
    if (key === "") {
      throw WebSocketError.protocol("missing Sec-WebSocket-Key");
    }

    this.handler = negotiated.handler;
    this._subprotocol = negotiated.subprotocol;
    this.request = request;
    this.log.debug(
      {
        subprotocol: negotiated.subprotocol,
        version: request.getHeader("Sec-WebSocket-Version"),
      },
      "upgrade request accepted",
    );

    const accept = computeAcceptKey(key);
    this.output.write(encoder.encode(buildUpgradeResponse(accept, this._subprotocol)));
    await this.output.flush();
  }

  private async readOne(): Promise<void> {
    const parser = this.frameParser;
    parser.reset();

    try {
      await this.input.consume(parser);
    } catch (e) {
      this.log.debug({ err: e }, "reading from socket has failed");
      await this.close(true);
      return;
    }

    if (parser.isValid()) {
      const opcode = parser.opcode;
      // Fragments are delivered as they arrive, like complete messages.
      if (isDataOpcode(opcode)) {
        await this.pushInbound(parser.result());
        return;
      }
      switch (opcode) {
        case Opcode.Close:
          this.log.debug("received close frame");
          await this.close(true);
          return;
        case Opcode.Ping:
          this.log.debug("received ping frame");
          await this.handlePing(parser.result());
          return;
        case Opcode.Pong:
          this.log.debug("received pong frame");
          return;
        default:
          this.log.debug({ opcode: opcodeName(opcode) }, "ignoring frame");
          return;
      }
    }

    if (parser.eof()) {
      await this.close(false);
      return;
    }

    this.log.debug({ reason: parser.error }, "reading from socket has failed");
    await this.close(true);
  }

  private async pushInbound(payload: Uint8Array): Promise<void> {
    try {
      await this.inbound.push(payload);
    } catch (e) {
      if (isWebSocketError(e, "closed")) {
        this.log.debug("dropping frame received while closing");
        return;
      }
      throw e;
    }
  }

  private async handlePing(payload: Uint8Array): Promise<void> {
    if (!this.host.options.replyToPing || this.closing !== null) return;
    try {
      await this.sendData(Opcode.Pong, payload);
    } catch (e) {
      this.log.debug({ err: e }, "failed to send pong");
      await this.close(false);
    }
  }

  private async responseLoop(): Promise<void> {
    try {
      while (!this.done) {
        const payload = await this.outbound.pop();
        if (payload === null || this.done) break;
        await this.sendData(Opcode.Binary, payload);
      }
      if (this.closeAfterDrain) {
        await this.close(true);
      }
    } finally {
      await this.output.close();
    }
  }

  private dropStalledOutput(): void {
    if (!this.output.isFlushing()) return;
    this.log.debug("dropping output the peer has not accepted");
    this.stream.close();
  }

  /** Write one frame and flush it. */
  private async sendData(opcode: Opcode, payload: Uint8Array): Promise<void> {
    this.output.write(encodeFrame(opcode, payload));
    await this.output.flush();
  }
}
