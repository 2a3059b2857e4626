// WebSocket frame codec.
//
// Encoding always produces a single final frame (FIN set) with the minimal
// length form and no mask, which is what a server sends. Decoding is an
// explicit state machine over arbitrarily split input, which is what a
// server receives: masked client frames, possibly fragmented.

import { type StreamConsumer, EMPTY_BYTES } from "./consumer.ts";
import { FrameError } from "./errors.ts";
import { type Opcode, isControlOpcode } from "./opcode.ts";

/** Largest payload representable in the 7-bit length field. */
export const MAX_SMALL_PAYLOAD = 125;

/** Largest payload representable in the 16-bit extended length field. */
export const MAX_MEDIUM_PAYLOAD = 0xffff;

/** Largest payload a control frame may carry. */
export const MAX_CONTROL_PAYLOAD = 125;

/** Default cap on a single inbound frame's payload (64 MiB). */
export const DEFAULT_MAX_PAYLOAD_SIZE = 64 * 1024 * 1024;

const TWO_POW_32 = 0x1_0000_0000;

/** A decoded frame. */
export interface Frame {
  opcode: Opcode;
  fin: boolean;
  payload: Uint8Array;
}

function checkOpcode(opcode: Opcode): number {
  if (!Number.isInteger(opcode) || opcode < 0 || opcode > 0xf) {
    throw FrameError.opcode(opcode);
  }
  return opcode;
}

function buildHeader(first: number, length: number, masked: boolean): Uint8Array {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw FrameError.length(length);
  }
  const maskBit = masked ? 0x80 : 0;

  if (length <= MAX_SMALL_PAYLOAD) {
    return Uint8Array.of(first, maskBit | length);
  }

  if (length <= MAX_MEDIUM_PAYLOAD) {
    return Uint8Array.of(first, maskBit | 126, length >>> 8, length & 0xff);
  }

  const header = new Uint8Array(10);
  header[0] = first;
  header[1] = maskBit | 127;
  const view = new DataView(header.buffer);
  view.setUint32(2, Math.floor(length / TWO_POW_32));
  view.setUint32(6, length >>> 0);
  return header;
}

/**
 * Encode the header of a server frame.
 *
 * Returns 2 bytes for payloads up to 125 bytes, 4 bytes (16-bit length) up to
 * 65535 bytes, and 10 bytes (64-bit length) beyond that.
 */
export function encodeFrameHeader(opcode: Opcode, length: number): Uint8Array {
  return buildHeader(0x80 | checkOpcode(opcode), length, false);
}

/** Encode a complete server frame: header followed by the payload. */
export function encodeFrame(opcode: Opcode, payload: Uint8Array): Uint8Array {
  const header = encodeFrameHeader(opcode, payload.length);
  const out = new Uint8Array(header.length + payload.length);
  out.set(header, 0);
  out.set(payload, header.length);
  return out;
}

/** XOR `payload` in place with a 4-byte masking key. */
export function maskPayload(payload: Uint8Array, key: Uint8Array): Uint8Array {
  if (key[0] === 0 && key[1] === 0 && key[2] === 0 && key[3] === 0) {
    return payload;
  }
  for (let i = 0; i < payload.length; i++) {
    payload[i] ^= key[i & 3];
  }
  return payload;
}

/**
 * Encode a masked frame the way a client sends it.
 *
 * Servers never send these; this exists for tooling and tests that need to
 * play the client side of a connection.
 */
export function encodeClientFrame(
  opcode: Opcode,
  payload: Uint8Array,
  key: Uint8Array,
  fin = true,
): Uint8Array {
  if (key.length !== 4) {
    throw FrameError.mask(key.length);
  }
  const header = buildHeader((fin ? 0x80 : 0) | checkOpcode(opcode), payload.length, true);
  const out = new Uint8Array(header.length + 4 + payload.length);
  out.set(header, 0);
  out.set(key, header.length);
  const body = out.subarray(header.length + 4);
  body.set(payload);
  maskPayload(body, key);
  return out;
}

export interface FrameParserOptions {
  /** Reject frames whose payload exceeds this many bytes. */
  maxPayloadSize?: number;
  /** Reject unmasked frames. Clients must always mask. Defaults to true. */
  requireMask?: boolean;
}

type ParserState = "header" | "length16" | "length64" | "mask" | "payload" | "done" | "failed";

function fieldSize(state: ParserState): number {
  switch (state) {
    case "header":
    case "length16":
      return 2;
    case "length64":
      return 8;
    case "mask":
      return 4;
    default:
      return 0;
  }
}

/**
 * Incremental frame decoder.
 *
 * Call `reset()` before each frame, feed it through an input buffer, then
 * inspect `isValid()`, `eof()` and `failed()`.
 */
export class FrameParser implements StreamConsumer {
  private state: ParserState = "header";
  private readonly scratch = new Uint8Array(8);
  private scratchLen = 0;
  private readonly maskKey = new Uint8Array(4);
  private masked = false;
  private payload: Uint8Array = EMPTY_BYTES;
  private payloadLength = 0;
  private received = 0;
  private _opcode: Opcode = 0;
  private _fin = false;
  private _eof = false;
  private _error: string | null = null;

  private readonly maxPayloadSize: number;
  private readonly requireMask: boolean;

  constructor(options: FrameParserOptions = {}) {
    this.maxPayloadSize = options.maxPayloadSize ?? DEFAULT_MAX_PAYLOAD_SIZE;
    this.requireMask = options.requireMask ?? true;
  }

  reset(): void {
    this.state = "header";
    this.scratchLen = 0;
    this.masked = false;
    this.payload = EMPTY_BYTES;
    this.payloadLength = 0;
    this.received = 0;
    this._opcode = 0;
    this._fin = false;
    this._eof = false;
    this._error = null;
  }

  consume(chunk: Uint8Array): Uint8Array | null {
    let offset = 0;

    while (this.state !== "done" && this.state !== "failed") {
      if (this.state === "payload") {
        const take = Math.min(this.payloadLength - this.received, chunk.length - offset);
        this.payload.set(chunk.subarray(offset, offset + take), this.received);
        this.received += take;
        offset += take;
        if (this.received < this.payloadLength) return null;
        this.finish();
        continue;
      }

      const need = fieldSize(this.state);
      const take = Math.min(need - this.scratchLen, chunk.length - offset);
      if (take <= 0) return null;
      this.scratch.set(chunk.subarray(offset, offset + take), this.scratchLen);
      this.scratchLen += take;
      offset += take;
      if (this.scratchLen < need) return null;
      this.scratchLen = 0;
      this.onField();
    }

    return chunk.subarray(offset);
  }

  end(): void {
    if (this.state === "done" || this.state === "failed") return;
    if (this.state === "header" && this.scratchLen === 0) {
      this._eof = true;
      return;
    }
    this.fail("truncated frame");
  }

  /** A complete, well-formed frame was decoded. */
  isValid(): boolean {
    return this.state === "done";
  }

  /** Input ended cleanly on a frame boundary. */
  eof(): boolean {
    return this._eof;
  }

  failed(): boolean {
    return this.state === "failed";
  }

  /** Why decoding failed, or null. */
  get error(): string | null {
    return this._error;
  }

  get opcode(): Opcode {
    return this._opcode;
  }

  get fin(): boolean {
    return this._fin;
  }

  /** The unmasked payload of the decoded frame. */
  result(): Uint8Array {
    return this.payload;
  }

  /** The decoded frame, if any. */
  frame(): Frame | null {
    if (!this.isValid()) return null;
    return { opcode: this._opcode, fin: this._fin, payload: this.payload };
  }

  private onField(): void {
    const s = this.scratch;
    switch (this.state) {
      case "header": {
        const first = s[0];
        const second = s[1];
        this._fin = (first & 0x80) !== 0;
        this._opcode = first & 0x0f;
        this.masked = (second & 0x80) !== 0;
        const len7 = second & 0x7f;

        if ((first & 0x70) !== 0) {
          this.fail("reserved bits set");
          return;
        }
        if (isControlOpcode(this._opcode)) {
          if (!this._fin) {
            this.fail("fragmented control frame");
            return;
          }
          if (len7 > MAX_CONTROL_PAYLOAD) {
            this.fail("control frame payload too large");
            return;
          }
        }
        if (this.requireMask && !this.masked) {
          this.fail("unmasked client frame");
          return;
        }

        if (len7 === 126) {
          this.state = "length16";
        } else if (len7 === 127) {
          this.state = "length64";
        } else {
          this.setLength(len7);
        }
        return;
      }
      case "length16":
        this.setLength((s[0] << 8) | s[1]);
        return;
      case "length64": {
        const view = new DataView(s.buffer, s.byteOffset, 8);
        const high = view.getUint32(0);
        const low = view.getUint32(4);
        if (high & 0x8000_0000) {
          this.fail("64-bit length has most significant bit set");
          return;
        }
        const length = high * TWO_POW_32 + low;
        if (!Number.isSafeInteger(length)) {
          this.fail("payload length too large");
          return;
        }
        this.setLength(length);
        return;
      }
      case "mask":
        this.maskKey.set(s.subarray(0, 4));
        this.startPayload();
        return;
      default:
        return;
    }
  }

  private setLength(length: number): void {
    if (length > this.maxPayloadSize) {
      this.fail(`payload of ${length} bytes exceeds limit of ${this.maxPayloadSize}`);
      return;
    }
    this.payloadLength = length;
    if (this.masked) {
      this.state = "mask";
    } else {
      this.startPayload();
    }
  }

  private startPayload(): void {
    this.received = 0;
    if (this.payloadLength === 0) {
      this.payload = EMPTY_BYTES;
      this.finish();
      return;
    }
    this.payload = new Uint8Array(this.payloadLength);
    this.state = "payload";
  }

  private finish(): void {
    if (this.masked) {
      maskPayload(this.payload, this.maskKey);
    }
    this.state = "done";
  }

  private fail(reason: string): void {
    this._error = reason;
    this.state = "failed";
  }
}
