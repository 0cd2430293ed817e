import type { FakeRoute } from "@repo/rocketchat-api/testing";
import { createFakeUpstream, LOGIN_REPLY, TEST_BASE_URL } from "@repo/rocketchat-api/testing";
import { buildRocketChatClients } from "@repo/rocketchat-api";
import { createApp } from "../server/app.js";

/**
 * 偽の Rocket.Chat を upstream にしたファサードアプリを作成
 */
export function createTestApp(routes: Record<string, FakeRoute> = {}, options?: { logDir?: string }) {
  const upstream = createFakeUpstream({ "POST /login": LOGIN_REPLY, ...routes });
  const clients = buildRocketChatClients({
    url: TEST_BASE_URL,
    username: "bot",
    password: "test-secret",
    fetch: upstream.fetch,
  });
  return { app: createApp(clients, options), upstream, clients };
}
