// Echo server.
//
// Serves the "echo" subprotocol (and clients that ask for none) on the
// address from WS_HOST / WS_PORT. Prints the bound port on stdout for
// harnesses that pass WS_PORT=0.

import { logger, type Handler } from "@tidewire/core";
import { Server, loadServerConfig } from "@tidewire/tcp";

const echo: Handler = async (input, output, context) => {
  context.logger.info({ subprotocol: context.subprotocol }, "session started");
  for await (const message of input) {
    await output.send(message);
  }
  context.logger.info("session finished");
};

async function main(): Promise<void> {
  const config = loadServerConfig();
  const server = new Server(config.server);
  server.registerHandler("echo", echo);
  server.registerHandler("", echo);

  const bound = await server.listen(config.address);
  console.log(bound.port);

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    server.stop().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error({ err: e }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e: unknown) => {
  logger.error({ err: e }, "echo server failed");
  process.exit(1);
});
