import type { RocketChatCredentials, RocketChatSession } from "./types.js";

/**
 * Holds the upstream base URL, the login credentials and the current session.
 *
 * One instance is shared by the session manager and every resource client.
 * Concurrent logins may overwrite the session in any order (last write wins);
 * each request reads the session right before it is sent.
 */
export class CredentialStore {
  readonly baseUrl: string;
  readonly username: string;
  readonly password: string;
  private session: RocketChatSession | null = null;

  constructor(credentials: RocketChatCredentials) {
    this.baseUrl = credentials.url.replace(/\/+$/, "");
    this.username = credentials.username;
    this.password = credentials.password;
  }

  getSession(): RocketChatSession | null {
    return this.session;
  }

  setSession(session: RocketChatSession): void {
    this.session = { token: session.token, userId: session.userId };
  }

  /** true iff both the token and the user id are non-empty */
  hasSession(): boolean {
    return Boolean(this.session?.token) && Boolean(this.session?.userId);
  }
}
