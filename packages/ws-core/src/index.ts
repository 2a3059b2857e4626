// @tidewire/core - transport-agnostic WebSocket server runtime
//
// Connection state machine, bounded message queues, the shutdown gate and
// the handler registry. Transports supply a ByteStream; see @tidewire/tcp.

export {
  WebSocketError,
  type WebSocketErrorKind,
  GateClosedError,
  isWebSocketError,
  isAbortedAccept,
} from "./errors.ts";
export { type Logger, type LoggerConfig, createLogger, logger, wsLogger } from "./logger.ts";
export { type ByteStream, InputBuffer, OutputBuffer } from "./stream.ts";
export { MemoryStream, createStreamPair } from "./memory-stream.ts";
export {
  AsyncQueue,
  MessageReceiver,
  MessageSender,
  createQueuePair,
  DEFAULT_QUEUE_CAPACITY,
} from "./queue.ts";
export { Gate } from "./gate.ts";
export { type Handler, type HandlerContext, HandlerRegistry } from "./registry.ts";
export { joinAll } from "./task.ts";
export {
  ServerConnection,
  type ConnectionHost,
  type ConnectionOptions,
  type CloseState,
  DEFAULT_CONNECTION_OPTIONS,
  resolveConnectionOptions,
} from "./connection.ts";
