// @tidewire/wire - WebSocket wire format
//
// Frame codec, opcodes, and the pieces of the HTTP upgrade handshake that
// touch bytes. No I/O lives here.

export { Opcode, type DataOpcode, isControlOpcode, isDataOpcode, opcodeName } from "./opcode.ts";
export { type StreamConsumer, EMPTY_BYTES } from "./consumer.ts";
export { FrameError } from "./errors.ts";
export {
  type Frame,
  type FrameParserOptions,
  FrameParser,
  encodeFrame,
  encodeFrameHeader,
  encodeClientFrame,
  maskPayload,
  MAX_SMALL_PAYLOAD,
  MAX_MEDIUM_PAYLOAD,
  MAX_CONTROL_PAYLOAD,
  DEFAULT_MAX_PAYLOAD_SIZE,
} from "./frame.ts";
export {
  HttpRequest,
  HttpRequestParser,
  type HttpRequestParserOptions,
  DEFAULT_MAX_HEADER_BYTES,
} from "./http.ts";
export { WEBSOCKET_GUID, computeAcceptKey, buildUpgradeResponse } from "./handshake.ts";
