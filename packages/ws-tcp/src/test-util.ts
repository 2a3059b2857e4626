// Loopback helpers shared by the tcp tests.

import net from "node:net";
import { type Frame, type StreamConsumer, FrameParser, encodeClientFrame } from "@tidewire/wire";
import { InputBuffer } from "@tidewire/core";
import { SocketStream } from "./socket-stream.ts";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const MASK_KEY = Uint8Array.of(9, 8, 7, 6);

export function connect(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: "127.0.0.1", port, allowHalfOpen: true });
    socket.once("connect", () => {
      socket.off("error", reject);
      resolve(socket);
    });
    socket.once("error", reject);
  });
}

export function upgradeRequest(subprotocol: string): string {
  const protocolLine = subprotocol === "" ? "" : `Sec-WebSocket-Protocol: ${subprotocol}\r\n`;
  return (
    "GET /ws HTTP/1.1\r\n" +
    "Host: localhost\r\n" +
    "Upgrade: websocket\r\n" +
    "Connection: Upgrade\r\n" +
    "Sec-WebSocket-Key: dGhlIHNhbXBsZSBub25jZQ==\r\n" +
    "Sec-WebSocket-Version: 13\r\n" +
    protocolLine +
    "\r\n"
  );
}

class HeadReader implements StreamConsumer {
  private text = "";
  head: string | null = null;

  consume(chunk: Uint8Array): Uint8Array | null {
    for (let i = 0; i < chunk.length; i++) {
      this.text += String.fromCharCode(chunk[i]);
      if (this.text.endsWith("\r\n\r\n")) {
        this.head = this.text;
        return chunk.subarray(i + 1);
      }
    }
    return null;
  }

  end(): void {}
}

class Drain implements StreamConsumer {
  count = 0;

  consume(chunk: Uint8Array): Uint8Array | null {
    this.count += chunk.length;
    return null;
  }

  end(): void {}
}

/** A WebSocket client over a real socket. */
export class Client {
  readonly stream: SocketStream;
  private readonly input: InputBuffer;
  private readonly parser = new FrameParser({ requireMask: false });

  constructor(readonly socket: net.Socket) {
    this.stream = new SocketStream(socket);
    this.input = new InputBuffer(this.stream);
  }

  static async open(port: number): Promise<Client> {
    return new Client(await connect(port));
  }

  /** Send the upgrade request and return the response head. */
  async upgrade(subprotocol: string): Promise<string | null> {
    await this.stream.write(encoder.encode(upgradeRequest(subprotocol)));
    const reader = new HeadReader();
    await this.input.consume(reader);
    return reader.head;
  }

  send(opcode: number, text: string): Promise<void> {
    return this.stream.write(encodeClientFrame(opcode, encoder.encode(text), MASK_KEY));
  }

  async frame(): Promise<Frame | null> {
    this.parser.reset();
    await this.input.consume(this.parser);
    return this.parser.frame();
  }

  /** Read to end of stream; resolves with the number of bytes skipped. */
  async drain(): Promise<number> {
    const drain = new Drain();
    await this.input.consume(drain);
    return drain.count;
  }

  close(): void {
    this.stream.close();
  }
}

export function text(frame: Frame | null): string | null {
  return frame === null ? null : decoder.decode(frame.payload);
}
