// Errors raised by the frame codec.

/** Error while encoding a frame. */
export class FrameError extends Error {
  constructor(
    public kind: "length" | "opcode" | "mask",
    message: string,
  ) {
    super(message);
    this.name = "FrameError";
  }

  static length(length: number): FrameError {
    return new FrameError("length", `invalid payload length: ${length}`);
  }

  static opcode(opcode: number): FrameError {
    return new FrameError("opcode", `invalid opcode: ${opcode}`);
  }

  static mask(keyLength: number): FrameError {
    return new FrameError("mask", `masking key must be 4 bytes, got ${keyLength}`);
  }
}
