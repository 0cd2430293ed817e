import type { AuthResult } from "@repo/types";
import consola from "consola";
import type { CredentialStore } from "./credential-store.js";
import { ENDPOINTS } from "./endpoints.js";
import { AuthenticationError } from "./errors.js";
import type { RocketChatHttp } from "./http.js";
import type { LoginResponse } from "./types.js";
import { loginResponseSchema } from "./types.js";

/**
 * Performs the login exchange and keeps the credential store's session current.
 *
 * There is no expiry tracking: a session stays in use until the next login.
 */
export class SessionManager {
  private store: CredentialStore;
  private http: RocketChatHttp;
  private pendingLogin: Promise<AuthResult> | null = null;

  constructor(store: CredentialStore, http: RocketChatHttp) {
    this.store = store;
    this.http = http;
  }

  /**
   * Log in with the configured username and password, replacing any prior session
   */
  async login(): Promise<AuthResult> {
    consola.debug(`[rocketchat/session] Authenticating with Rocket.Chat API at ${this.store.baseUrl}`);

    const body = await this.http.postJson(
      ENDPOINTS.login,
      { username: this.store.username, password: this.store.password },
      AuthenticationError,
      { authenticated: false },
    );

    const parsed = loginResponseSchema.safeParse(body);
    if (!parsed.success) {
      consola.error("[rocketchat/session] Login response has no session:", body);
      throw new AuthenticationError("Login response is missing the auth token or user id", {
        upstreamBody: body,
        cause: parsed.error,
      });
    }

    const { authToken, userId } = parsed.data.data;
    this.store.setSession({ token: authToken, userId });
    consola.debug("[rocketchat/session] Successfully authenticated with Rocket.Chat API");

    return toAuthResult(parsed.data);
  }

  /**
   * No network I/O: only inspects the credential store
   */
  isAuthenticated(): boolean {
    return this.store.hasSession();
  }

  /**
   * Log in unless a session is already held.
   * Callers arriving while a login is in flight wait for that same login.
   */
  async ensureAuthenticated(): Promise<void> {
    if (this.isAuthenticated()) return;

    if (!this.pendingLogin) {
      this.pendingLogin = this.login().finally(() => {
        this.pendingLogin = null;
      });
    }

    await this.pendingLogin;
  }
}

function toAuthResult(response: LoginResponse): AuthResult {
  const { authToken, userId, me } = response.data;

  return {
    authToken,
    userId,
    me: me
      ? {
          id: me._id ?? null,
          username: me.username ?? null,
          name: me.name ?? null,
          email: me.email ?? me.emails?.[0]?.address ?? null,
        }
      : null,
  };
}
