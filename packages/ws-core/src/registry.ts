// Subprotocol → handler registry.

import { type HttpRequest } from "@tidewire/wire";
import type { Logger } from "./logger.ts";
import type { MessageReceiver, MessageSender } from "./queue.ts";

/** What a handler knows about the session it serves. */
export interface HandlerContext {
  /** The negotiated subprotocol ("" when the client asked for none). */
  subprotocol: string;
  /** The upgrade request. */
  request: HttpRequest;
  /** Logger bound to this connection. */
  logger: Logger;
}

/**
 * Application logic for one session.
 *
 * Reads client messages from `input` and writes replies to `output`.
 * Returning ends the session with a close frame; throwing does the same and
 * is logged as a failure.
 */
export type Handler = (
  input: MessageReceiver,
  output: MessageSender,
  context: HandlerContext,
) => Promise<void>;

export class HandlerRegistry {
  private handlers = new Map<string, Handler>();

  /** Register (or replace) the handler for a subprotocol name. */
  register(name: string, handler: Handler): void {
    this.handlers.set(name, handler);
  }

  isRegistered(name: string): boolean {
    return this.handlers.has(name);
  }

  get(name: string): Handler | undefined {
    return this.handlers.get(name);
  }

  /**
   * Pick the handler for a Sec-WebSocket-Protocol header value.
   *
   * The whole value is tried first, so "" selects the handler registered for
   * clients that request no subprotocol. Otherwise the value is read as a
   * comma-separated preference list and the first registered entry wins.
   */
  negotiate(offered: string): { subprotocol: string; handler: Handler } | null {
    const exact = this.handlers.get(offered);
    if (exact !== undefined) {
      return { subprotocol: offered, handler: exact };
    }
    for (const candidate of offered.split(",")) {
      const name = candidate.trim();
      if (name === "") continue;
      const handler = this.handlers.get(name);
      if (handler !== undefined) {
        return { subprotocol: name, handler };
      }
    }
    return null;
  }

  names(): string[] {
    return [...this.handlers.keys()];
  }
}
