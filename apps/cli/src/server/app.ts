import type { RocketChatClients } from "@repo/rocketchat-api";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { errorResponse } from "./errors.js";
import { timingMiddleware } from "./middleware/timing.js";
import { createChannelsRouter } from "./routes/channels.js";
import { createMessagesRouter } from "./routes/messages.js";
import { createServerLogsRouter } from "./routes/server-logs.js";
import { createSessionRouter } from "./routes/session.js";

interface CreateAppOptions {
  /** server-logs が読むディレクトリ (省略時は ~/.rcf/logs) */
  logDir?: string;
}

export function createApp(clients: RocketChatClients, options?: CreateAppOptions) {
  const app = new Hono();

  app.use("*", cors());
  app.use("/api/*", timingMiddleware);

  app.route("/api/rocketchat", createSessionRouter(clients));
  app.route("/api/rocketchat/channels", createChannelsRouter(clients.rooms, clients.messages));
  app.route("/api/rocketchat/messages", createMessagesRouter(clients.messages));
  app.route("/api/server-logs", createServerLogsRouter(options?.logDir));

  app.get("/api/health", (c) => c.json({ status: "ok" }));

  app.onError((err, c) => errorResponse(c, err));
  app.notFound((c) => c.json({ error: "NOT_FOUND", message: `${c.req.method} ${c.req.path} not found` }, 404));

  return app;
}
