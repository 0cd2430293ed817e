import type { RocketChatClients } from "@repo/rocketchat-api";
import consola from "consola";
import { Hono } from "hono";

export function createSessionRouter(clients: Pick<RocketChatClients, "session" | "store">) {
  const router = new Hono();

  /**
   * POST /api/rocketchat/login
   *
   * Rocket.Chat にログインしてセッションを更新
   */
  router.post("/login", async (c) => {
    const result = await clients.session.login();
    consola.info(`[server/session] Authenticated with Rocket.Chat as ${result.me?.username ?? result.userId}`);

    return c.json({
      status: "success" as const,
      message: "Successfully authenticated with Rocket.Chat",
      userId: result.userId,
    });
  });

  /**
   * GET /api/rocketchat/session
   *
   * セッション保持状況 (ログインは行わない)
   */
  router.get("/session", (c) => {
    return c.json({
      authenticated: clients.session.isAuthenticated(),
      userId: clients.store.getSession()?.userId ?? null,
    });
  });

  return router;
}
