// Error types for connection handling.

export type WebSocketErrorKind = "protocol" | "io" | "closed" | "aborted" | "handler";

/** Error during connection handling. */
export class WebSocketError extends Error {
  constructor(
    public kind: WebSocketErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WebSocketError";
  }

  /** Malformed or unsupported upgrade request. Fatal to the connection. */
  static protocol(message: string): WebSocketError {
    return new WebSocketError("protocol", message);
  }

  static io(message: string, cause?: unknown): WebSocketError {
    return new WebSocketError("io", message, { cause });
  }

  /** A queue or stream was used after it was closed. */
  static closed(): WebSocketError {
    return new WebSocketError("closed", "connection closed");
  }

  /** A pending accept was cancelled because the listener is stopping. */
  static aborted(): WebSocketError {
    return new WebSocketError("aborted", "accept aborted");
  }

  static handler(cause: unknown): WebSocketError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new WebSocketError("handler", `handler failed: ${detail}`, { cause });
  }
}

/** Raised when work tries to enter a gate that is closing. */
export class GateClosedError extends Error {
  constructor() {
    super("gate closed");
    this.name = "GateClosedError";
  }
}

export function isWebSocketError(e: unknown, kind: WebSocketErrorKind): e is WebSocketError {
  return e instanceof WebSocketError && e.kind === kind;
}

/** True for the error a listener raises when stop() cancels its accept. */
export function isAbortedAccept(e: unknown): boolean {
  return isWebSocketError(e, "aborted");
}
