import consola from "consola";
import type { CredentialStore } from "./credential-store.js";
import type { RocketChatErrorClass } from "./errors.js";
import type { JsonObject } from "./types.js";
import { jsonObjectSchema } from "./types.js";

const DEFAULT_TIMEOUT_MS = 30000;

export interface RocketChatHttpOptions {
  timeoutMs?: number;
  fetch?: typeof fetch;
}

type QueryParams = Record<string, string | number | null | undefined>;

/**
 * Thin fetch wrapper for the Rocket.Chat REST API.
 *
 * Every failure (transport, non-2xx, non-JSON, non-object body) is raised as
 * the error class given by the calling operation.
 */
export class RocketChatHttp {
  private store: CredentialStore;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(store: CredentialStore, options: RocketChatHttpOptions = {}) {
    this.store = store;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  // ============================================
  // Public: Request Helpers
  // ============================================

  /**
   * Make authenticated GET request. Null and undefined query values are omitted.
   */
  async get(path: string, query: QueryParams, errorClass: RocketChatErrorClass): Promise<JsonObject> {
    const url = this.buildUrl(path);
    for (const [key, value] of Object.entries(query)) {
      if (value !== null && value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    return this.send(url, { method: "GET", headers: this.authHeaders(errorClass) }, errorClass);
  }

  /**
   * Make POST request with a JSON body
   */
  async postJson(
    path: string,
    body: Record<string, unknown>,
    errorClass: RocketChatErrorClass,
    options: { authenticated?: boolean } = {},
  ): Promise<JsonObject> {
    const headers: Record<string, string> = {
      ...(options.authenticated === false ? {} : this.authHeaders(errorClass)),
      "Content-Type": "application/json",
    };

    return this.send(
      this.buildUrl(path),
      { method: "POST", headers, body: JSON.stringify(body) },
      errorClass,
    );
  }

  /**
   * Make authenticated multipart POST request.
   * Content-Type (with boundary) is set by fetch from the FormData.
   */
  async postForm(path: string, form: FormData, errorClass: RocketChatErrorClass): Promise<JsonObject> {
    return this.send(
      this.buildUrl(path),
      { method: "POST", headers: this.authHeaders(errorClass), body: form },
      errorClass,
    );
  }

  // ============================================
  // Private
  // ============================================

  private buildUrl(path: string): URL {
    return new URL(`${this.store.baseUrl}${path}`);
  }

  private authHeaders(errorClass: RocketChatErrorClass): Record<string, string> {
    const session = this.store.getSession();
    if (!session) {
      throw new errorClass("No Rocket.Chat session available");
    }

    return {
      "X-Auth-Token": session.token,
      "X-User-Id": session.userId,
    };
  }

  private async send(
    url: URL,
    init: RequestInit,
    errorClass: RocketChatErrorClass,
  ): Promise<JsonObject> {
    const label = `${init.method ?? "GET"} ${url.pathname}`;
    consola.debug(`[rocketchat] ${label}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      consola.error(`[rocketchat] ${label} failed:`, error);
      throw new errorClass(`Rocket.Chat request failed: ${errorMessage(error)}`, { cause: error });
    }

    // The body can still fail (connection reset, timeout) after the headers arrived
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      consola.error(`[rocketchat] ${label} body read failed:`, error);
      throw new errorClass(`Rocket.Chat request failed: ${errorMessage(error)}`, {
        upstreamStatus: response.status,
        cause: error,
      });
    }
    const body = parseJson(text);

    if (!response.ok) {
      consola.error(`[rocketchat] ${label} returned ${response.status}:`, text);
      const status = response.statusText
        ? `${response.status} ${response.statusText}`
        : String(response.status);
      throw new errorClass(`Rocket.Chat API error: ${status}`, {
        upstreamStatus: response.status,
        upstreamBody: body ?? text,
      });
    }

    const parsed = jsonObjectSchema.safeParse(body);
    if (!parsed.success) {
      consola.error(`[rocketchat] ${label} returned a non-object payload:`, text);
      throw new errorClass("Rocket.Chat API returned a malformed payload", {
        upstreamStatus: response.status,
        upstreamBody: body ?? text,
      });
    }

    return parsed.data;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
