import { describe, expect, it } from "vitest";

import {
  FrameParser,
  type FrameParserOptions,
  encodeClientFrame,
  encodeFrame,
  encodeFrameHeader,
  maskPayload,
} from "./frame.ts";
import { FrameError } from "./errors.ts";
import { Opcode } from "./opcode.ts";

const KEY = Uint8Array.of(0x37, 0xfa, 0x21, 0x3d);

function feed(parser: FrameParser, bytes: Uint8Array, chunkSize = bytes.length): Uint8Array | null {
  let rest: Uint8Array | null = null;
  for (let offset = 0; offset < bytes.length; offset += chunkSize) {
    rest = parser.consume(bytes.subarray(offset, offset + chunkSize));
    if (rest !== null) {
      const tail = bytes.subarray(offset + chunkSize);
      const out = new Uint8Array(rest.length + tail.length);
      out.set(rest, 0);
      out.set(tail, rest.length);
      return out;
    }
  }
  return rest;
}

function parser(options: FrameParserOptions = {}): FrameParser {
  const p = new FrameParser(options);
  p.reset();
  return p;
}

function patterned(length: number): Uint8Array {
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i++) out[i] = (i * 31 + 7) & 0xff;
  return out;
}

describe("encodeFrameHeader", () => {
  it("uses the 7-bit form up to 125 bytes", () => {
    expect(encodeFrameHeader(Opcode.Binary, 0)).toEqual(Uint8Array.of(0x82, 0));
    expect(encodeFrameHeader(Opcode.Text, 125)).toEqual(Uint8Array.of(0x81, 125));
  });

  it("uses the 16-bit form from 126 to 65535 bytes", () => {
    expect(encodeFrameHeader(Opcode.Binary, 126)).toEqual(Uint8Array.of(0x82, 126, 0x00, 0x7e));
    expect(encodeFrameHeader(Opcode.Binary, 65535)).toEqual(Uint8Array.of(0x82, 126, 0xff, 0xff));
  });

  it("uses the 64-bit form above 65535 bytes", () => {
    expect(encodeFrameHeader(Opcode.Binary, 65536)).toEqual(
      Uint8Array.of(0x82, 127, 0, 0, 0, 0, 0, 0x01, 0x00, 0x00),
    );
    expect(encodeFrameHeader(Opcode.Binary, 2 ** 32 + 5)).toEqual(
      Uint8Array.of(0x82, 127, 0, 0, 0, 0x01, 0, 0, 0, 0x05),
    );
  });

  it("sets FIN and never sets the mask bit", () => {
    const header = encodeFrameHeader(Opcode.Close, 0);
    expect(header[0] & 0x80).toBe(0x80);
    expect(header[0] & 0x0f).toBe(Opcode.Close);
    expect(header[1] & 0x80).toBe(0);
  });

  it("rejects invalid lengths and opcodes", () => {
    expect(() => encodeFrameHeader(Opcode.Binary, -1)).toThrow(FrameError);
    expect(() => encodeFrameHeader(Opcode.Binary, 1.5)).toThrow(FrameError);
    expect(() => encodeFrameHeader(16, 0)).toThrow("invalid opcode: 16");
  });
});

describe("encodeFrame", () => {
  it("places the payload right after the header", () => {
    const frame = encodeFrame(Opcode.Text, new TextEncoder().encode("hi"));
    expect(frame).toEqual(Uint8Array.of(0x81, 2, 0x68, 0x69));
  });

  it.each([
    [0, 2],
    [1, 2],
    [125, 2],
    [126, 4],
    [65535, 4],
    [65536, 10],
    [10_000_000, 10],
  ])("round-trips a %i byte payload with a %i byte header", (length, headerSize) => {
    const payload = patterned(length);
    const bytes = encodeFrame(Opcode.Binary, payload);
    expect(bytes.length).toBe(headerSize + length);

    const p = parser({ requireMask: false });
    const rest = feed(p, bytes);
    expect(rest?.length).toBe(0);
    expect(p.isValid()).toBe(true);
    expect(p.opcode).toBe(Opcode.Binary);
    expect(p.fin).toBe(true);
    expect(Buffer.compare(p.result(), payload)).toBe(0);
  });
});

describe("encodeClientFrame", () => {
  it("rejects a masking key that is not 4 bytes", () => {
    const encode = () => encodeClientFrame(Opcode.Text, Uint8Array.of(0x61), Uint8Array.of(1, 2, 3));
    expect(encode).toThrow(FrameError);
    expect(encode).toThrow("masking key must be 4 bytes, got 3");
  });
});

describe("FrameParser", () => {
  it("unmasks client frames", () => {
    const p = parser();
    feed(p, encodeClientFrame(Opcode.Text, new TextEncoder().encode("Hello"), KEY));
    expect(p.isValid()).toBe(true);
    expect(new TextDecoder().decode(p.result())).toBe("Hello");
  });

  it("decodes the masked example frame from RFC 6455", () => {
    const p = parser();
    feed(p, Uint8Array.of(0x81, 0x85, 0x37, 0xfa, 0x21, 0x3d, 0x7f, 0x9f, 0x4d, 0x51, 0x58));
    expect(p.frame()).toEqual({
      opcode: Opcode.Text,
      fin: true,
      payload: new TextEncoder().encode("Hello"),
    });
  });

  it("treats a zero masking key as no mask", () => {
    const p = parser();
    feed(p, encodeClientFrame(Opcode.Binary, Uint8Array.of(1, 2, 3), Uint8Array.of(0, 0, 0, 0)));
    expect(p.result()).toEqual(Uint8Array.of(1, 2, 3));
  });

  it("decodes across one-byte chunks", () => {
    const payload = patterned(300);
    const p = parser();
    const rest = feed(p, encodeClientFrame(Opcode.Binary, payload, KEY), 1);
    expect(rest?.length).toBe(0);
    expect(p.result()).toEqual(payload);
  });

  it("returns bytes that belong to the next frame", () => {
    const first = encodeClientFrame(Opcode.Text, Uint8Array.of(0x61), KEY);
    const second = encodeClientFrame(Opcode.Ping, Uint8Array.of(), KEY);
    const joined = new Uint8Array(first.length + second.length);
    joined.set(first, 0);
    joined.set(second, first.length);

    const p = parser();
    const rest = p.consume(joined);
    expect(rest).toEqual(second);

    p.reset();
    expect(p.consume(second)?.length).toBe(0);
    expect(p.opcode).toBe(Opcode.Ping);
    expect(p.result().length).toBe(0);
  });

  it("accepts non-final data frames", () => {
    const p = parser();
    feed(p, encodeClientFrame(Opcode.Text, Uint8Array.of(0x61), KEY, false));
    expect(p.isValid()).toBe(true);
    expect(p.fin).toBe(false);
  });

  it("reports eof when input ends between frames", () => {
    const p = parser();
    p.end();
    expect(p.eof()).toBe(true);
    expect(p.failed()).toBe(false);
  });

  it("fails when input ends inside a frame", () => {
    const p = parser();
    const bytes = encodeClientFrame(Opcode.Binary, patterned(10), KEY);
    expect(p.consume(bytes.subarray(0, 5))).toBeNull();
    p.end();
    expect(p.eof()).toBe(false);
    expect(p.failed()).toBe(true);
    expect(p.error).toBe("truncated frame");
  });

  it("rejects unmasked client frames by default", () => {
    const p = parser();
    feed(p, encodeFrame(Opcode.Binary, Uint8Array.of(1)));
    expect(p.failed()).toBe(true);
    expect(p.error).toBe("unmasked client frame");
  });

  it("rejects reserved bits", () => {
    const p = parser();
    feed(p, Uint8Array.of(0xc1, 0x80, 0, 0, 0, 0));
    expect(p.error).toBe("reserved bits set");
  });

  it("rejects fragmented and oversized control frames", () => {
    const fragmented = parser();
    feed(fragmented, encodeClientFrame(Opcode.Ping, Uint8Array.of(), KEY, false));
    expect(fragmented.error).toBe("fragmented control frame");

    const oversized = parser();
    feed(oversized, encodeClientFrame(Opcode.Close, patterned(126), KEY));
    expect(oversized.error).toBe("control frame payload too large");
  });

  it("rejects a 64-bit length with the top bit set", () => {
    const p = parser({ requireMask: false });
    feed(p, Uint8Array.of(0x82, 127, 0x80, 0, 0, 0, 0, 0, 0, 0));
    expect(p.error).toBe("64-bit length has most significant bit set");
  });

  it("rejects payloads above the configured limit", () => {
    const p = parser({ maxPayloadSize: 100 });
    feed(p, encodeClientFrame(Opcode.Binary, patterned(101), KEY));
    expect(p.error).toBe("payload of 101 bytes exceeds limit of 100");
  });

  it("passes reserved opcodes through to the caller", () => {
    const p = parser();
    feed(p, encodeClientFrame(0x3, Uint8Array.of(9), KEY));
    expect(p.isValid()).toBe(true);
    expect(p.opcode).toBe(0x3);
  });
});

describe("maskPayload", () => {
  it("is its own inverse", () => {
    const original = patterned(17);
    const copy = original.slice();
    maskPayload(copy, KEY);
    expect(copy).not.toEqual(original);
    maskPayload(copy, KEY);
    expect(copy).toEqual(original);
  });
});
