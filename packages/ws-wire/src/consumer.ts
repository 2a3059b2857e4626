// Incremental byte consumer protocol.
//
// Parsers that read from a byte stream implement StreamConsumer. The buffered
// reader feeds them chunks in arrival order until they report completion, and
// keeps whatever they did not consume for the next parser.

export interface StreamConsumer {
  /**
   * Feed the next chunk.
   *
   * Returns `null` while more input is needed. Once the consumer is complete
   * (successfully or not), returns the unconsumed tail of `chunk`, which may
   * be empty.
   */
  consume(chunk: Uint8Array): Uint8Array | null;

  /** Input ended before the consumer completed. */
  end(): void;
}

export const EMPTY_BYTES: Uint8Array = new Uint8Array(0);
