// @tidewire/tcp - WebSocket server over node:net

export { SocketStream, DEFAULT_HIGH_WATER_MARK } from "./socket-stream.ts";
export {
  Listener,
  type ListenAddress,
  type ListenOptions,
  DEFAULT_LISTEN_OPTIONS,
} from "./listener.ts";
export { Server, type ServerOptions } from "./server.ts";
export { ConfigError, type ServerConfig, loadServerConfig } from "./config.ts";
