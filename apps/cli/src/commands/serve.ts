import { serve } from "@hono/node-server";
import { setupFileLogger } from "@repo/core";
import type { Command } from "commander";
import consola from "consola";
import { loadConfig } from "../config.js";
import { createApp } from "../server/app.js";
import { requireClients } from "./shared.js";

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Start the Rocket.Chat facade API server")
    .option("-p, --port <port>", "Port number")
    .action((options: { port?: string }) => {
      // ファイルログを有効化
      setupFileLogger("serve");

      const config = loadConfig();
      const port = options.port ? Number.parseInt(options.port, 10) : config.server.port;
      const clients = requireClients(config);
      const app = createApp(clients);

      consola.info(`Starting API server on http://localhost:${port}`);
      consola.info(`Rocket.Chat upstream: ${clients.store.baseUrl}`);

      serve({
        fetch: app.fetch,
        port,
      });

      consola.success(`API server running on http://localhost:${port}`);
    });
}
