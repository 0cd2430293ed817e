import { CredentialStore } from "./credential-store.js";
import { RocketChatHttp } from "./http.js";
import { MessageClient } from "./messages.js";
import { RoomClient } from "./rooms.js";
import { SessionManager } from "./session.js";
import type { RocketChatClientConfig } from "./types.js";

export interface RocketChatClients {
  store: CredentialStore;
  session: SessionManager;
  rooms: RoomClient;
  messages: MessageClient;
}

/**
 * Wire one credential store, session manager and resource clients together
 */
export function buildRocketChatClients(config: RocketChatClientConfig): RocketChatClients {
  const store = new CredentialStore(config);
  const http = new RocketChatHttp(store, { timeoutMs: config.timeoutMs, fetch: config.fetch });
  const session = new SessionManager(store, http);

  return {
    store,
    session,
    rooms: new RoomClient(session, http),
    messages: new MessageClient(session, http),
  };
}

/**
 * Create Rocket.Chat clients from config. Returns null when a credential is missing.
 */
export function createRocketChatClients(config: {
  url?: string;
  username?: string;
  password?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}): RocketChatClients | null {
  if (!config.url || !config.username || !config.password) {
    return null;
  }

  return buildRocketChatClients({
    url: config.url,
    username: config.username,
    password: config.password,
    timeoutMs: config.timeoutMs,
    fetch: config.fetch,
  });
}
