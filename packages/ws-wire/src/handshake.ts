// Opening handshake: accept key and the 101 response (RFC 6455 section 4.2.2).

import { createHash } from "node:crypto";

/** Fixed GUID appended to the client's key before hashing. */
export const WEBSOCKET_GUID = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";

const UPGRADE_REPLY_PREFIX =
  "HTTP/1.1 101 Switching Protocols\r\n" +
  "Upgrade: websocket\r\n" +
  "Connection: Upgrade\r\n" +
  "Sec-WebSocket-Version: 13\r\n" +
  "Sec-WebSocket-Accept: ";

/** base64(SHA-1(key + GUID)) */
export function computeAcceptKey(key: string): string {
  return createHash("sha1").update(key + WEBSOCKET_GUID).digest("base64");
}

/**
 * Build the switching-protocols response.
 *
 * The subprotocol header is only present when one was negotiated.
 */
export function buildUpgradeResponse(accept: string, subprotocol: string): string {
  let reply = UPGRADE_REPLY_PREFIX + accept;
  if (subprotocol !== "") {
    reply += `\r\nSec-WebSocket-Protocol: ${subprotocol}`;
  }
  return reply + "\r\n\r\n";
}
