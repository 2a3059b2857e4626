// Structured logging.
//
// Log level comes from LOG_LEVEL (default "info", "silent" under tests).
// Outside production and tests, output goes through pino-pretty.

import pino, { type Logger } from "pino";

export type { Logger };

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const env = process.env.NODE_ENV;
  const level = config.level ?? process.env.LOG_LEVEL ?? (env === "test" ? "silent" : "info");
  const pretty = config.pretty ?? (env !== "production" && env !== "test");

  if (!pretty) {
    return pino({ level });
  }

  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    },
  });
}

export const logger: Logger = createLogger();

/** Logger for the WebSocket server and its connections. */
export const wsLogger: Logger = logger.child({ module: "websocket" });
