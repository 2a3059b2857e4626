// Minimal HTTP/1.x request parser for the upgrade handshake.
//
// Reads exactly one request line and header block. Request bodies are not
// part of a WebSocket upgrade and are left in the stream for the next
// consumer.

import { type StreamConsumer, EMPTY_BYTES } from "./consumer.ts";

/** Default cap on the request line plus headers (16 KiB). */
export const DEFAULT_MAX_HEADER_BYTES = 16 * 1024;

const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const REQUEST_LINE = /^([!#$%&'*+.^_`|~0-9A-Za-z-]+) (\S+) HTTP\/(1\.[01])$/;

/** A parsed request head. Header names are stored lowercased. */
export class HttpRequest {
  constructor(
    readonly method: string,
    readonly target: string,
    readonly version: string,
    readonly headers: ReadonlyMap<string, string>,
  ) {}

  /** Case-insensitive header lookup; absent headers read as "". */
  getHeader(name: string): string {
    return this.headers.get(name.toLowerCase()) ?? "";
  }

  hasHeader(name: string): boolean {
    return this.headers.has(name.toLowerCase());
  }
}

export interface HttpRequestParserOptions {
  maxHeaderBytes?: number;
}

type HttpParserState = "idle" | "reading" | "done" | "failed" | "eof";

function indexOfTerminator(buf: Uint8Array, from: number): number {
  for (let i = Math.max(0, from); i + 3 < buf.length; i++) {
    if (buf[i] === 0x0d && buf[i + 1] === 0x0a && buf[i + 2] === 0x0d && buf[i + 3] === 0x0a) {
      return i;
    }
  }
  return -1;
}

function parseHead(text: string): HttpRequest | null {
  const lines = text.split("\r\n");
  const match = REQUEST_LINE.exec(lines[0] ?? "");
  if (!match) return null;

  const headers = new Map<string, string>();
  for (const line of lines.slice(1)) {
    // Obsolete line folding is rejected (RFC 7230 section 3.2.4).
    if (line.startsWith(" ") || line.startsWith("\t")) return null;
    const colon = line.indexOf(":");
    if (colon <= 0) return null;
    const name = line.slice(0, colon);
    if (!TOKEN.test(name)) return null;
    const key = name.toLowerCase();
    const value = line.slice(colon + 1).trim();
    const previous = headers.get(key);
    headers.set(key, previous === undefined ? value : `${previous}, ${value}`);
  }

  return new HttpRequest(match[1], match[2], match[3], headers);
}

/**
 * Incremental parser for one HTTP request head.
 *
 * `eof()` means the input ended before a single byte of a request arrived,
 * which is an idle close rather than an error.
 */
export class HttpRequestParser implements StreamConsumer {
  private state: HttpParserState = "idle";
  private buffered: Uint8Array = EMPTY_BYTES;
  private request: HttpRequest | null = null;
  private readonly maxHeaderBytes: number;
  private readonly decoder = new TextDecoder();

  constructor(options: HttpRequestParserOptions = {}) {
    this.maxHeaderBytes = options.maxHeaderBytes ?? DEFAULT_MAX_HEADER_BYTES;
  }

  init(): void {
    this.state = "idle";
    this.buffered = EMPTY_BYTES;
    this.request = null;
  }

  consume(chunk: Uint8Array): Uint8Array | null {
    if (this.state === "done" || this.state === "failed" || this.state === "eof") {
      return chunk;
    }
    if (chunk.length === 0) return null;
    this.state = "reading";

    const searchFrom = this.buffered.length - 3;
    const joined = new Uint8Array(this.buffered.length + chunk.length);
    joined.set(this.buffered, 0);
    joined.set(chunk, this.buffered.length);
    this.buffered = joined;

    const terminator = indexOfTerminator(joined, searchFrom);
    if (terminator < 0) {
      if (joined.length > this.maxHeaderBytes) {
        this.state = "failed";
        this.buffered = EMPTY_BYTES;
        return EMPTY_BYTES;
      }
      return null;
    }

    const headEnd = terminator + 4;
    if (headEnd > this.maxHeaderBytes) {
      this.state = "failed";
    } else {
      this.request = parseHead(this.decoder.decode(joined.subarray(0, terminator)));
      this.state = this.request ? "done" : "failed";
    }
    this.buffered = EMPTY_BYTES;
    return joined.subarray(headEnd);
  }

  end(): void {
    if (this.state === "idle") {
      this.state = "eof";
    } else if (this.state === "reading") {
      this.state = "failed";
    }
  }

  eof(): boolean {
    return this.state === "eof";
  }

  failed(): boolean {
    return this.state === "failed";
  }

  /** The parsed request, or null if parsing did not succeed. */
  getParsedRequest(): HttpRequest | null {
    return this.state === "done" ? this.request : null;
  }
}
