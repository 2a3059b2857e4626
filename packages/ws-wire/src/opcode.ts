// WebSocket frame opcodes (RFC 6455 section 5.2).

/** Frame opcode discriminants. */
export const Opcode = {
  /** Continuation of a fragmented message. */
  Continuation: 0x0,
  Text: 0x1,
  Binary: 0x2,
  Close: 0x8,
  Ping: 0x9,
  Pong: 0xa,
} as const;

/**
 * A 4-bit opcode as read off the wire.
 *
 * Reserved values (0x3-0x7, 0xb-0xf) are representable so that the decoder
 * can hand them to the dispatcher, which ignores them.
 */
export type Opcode = number;

/** Opcodes that carry application data. */
export type DataOpcode = typeof Opcode.Continuation | typeof Opcode.Text | typeof Opcode.Binary;

/** Control frames have the high bit of the opcode nibble set. */
export function isControlOpcode(opcode: Opcode): boolean {
  return (opcode & 0x8) !== 0;
}

export function isDataOpcode(opcode: Opcode): opcode is DataOpcode {
  return (
    opcode === Opcode.Continuation || opcode === Opcode.Text || opcode === Opcode.Binary
  );
}

/** Human-readable opcode name for logs. */
export function opcodeName(opcode: Opcode): string {
  switch (opcode) {
    case Opcode.Continuation:
      return "continuation";
    case Opcode.Text:
      return "text";
    case Opcode.Binary:
      return "binary";
    case Opcode.Close:
      return "close";
    case Opcode.Ping:
      return "ping";
    case Opcode.Pong:
      return "pong";
    default:
      return `reserved(0x${opcode.toString(16)})`;
  }
}
