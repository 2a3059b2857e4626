// Server configuration from the environment.

import { z } from "zod";
import { DEFAULT_CONNECTION_OPTIONS, DEFAULT_QUEUE_CAPACITY } from "@tidewire/core";
import type { ListenAddress } from "./listener.ts";
import type { ServerOptions } from "./server.ts";

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`invalid server configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  WS_HOST: z.string().min(1).default("127.0.0.1"),
  WS_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  WS_QUEUE_CAPACITY: z.coerce.number().int().min(1).default(DEFAULT_QUEUE_CAPACITY),
  WS_MAX_PAYLOAD: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_CONNECTION_OPTIONS.maxPayloadSize),
  WS_REPLY_TO_PING: flag.default("true"),
});

export interface ServerConfig {
  address: ListenAddress;
  server: ServerOptions;
}

/**
 * Read and validate the server settings.
 *
 * Throws a ConfigError naming every invalid variable.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return {
    address: { host: values.WS_HOST, port: values.WS_PORT },
    server: {
      queueCapacity: values.WS_QUEUE_CAPACITY,
      maxPayloadSize: values.WS_MAX_PAYLOAD,
      replyToPing: values.WS_REPLY_TO_PING,
    },
  };
}
