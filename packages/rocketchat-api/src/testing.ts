/**
 * In-process Rocket.Chat stand-in for tests.
 *
 * Replies are looked up by "<METHOD> <pathname>"; every request is recorded.
 */

export const TEST_BASE_URL = "http://rocketchat.test/api/v1";

export interface FakeReply {
  status?: number;
  body?: unknown;
  /** Raw response text, sent instead of the JSON-encoded body */
  text?: string;
  /** Streamed response body, sent instead of text or body */
  stream?: ReadableStream<Uint8Array>;
}

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  /** Parsed JSON body, the FormData of a multipart request, or null */
  body: unknown;
}

export type FakeRoute = FakeReply | ((request: RecordedRequest) => FakeReply);

export interface FakeUpstream {
  fetch: typeof fetch;
  requests: RecordedRequest[];
  /** Requests whose pathname matches */
  requestsTo(pathname: string): RecordedRequest[];
  route(key: string, reply: FakeRoute): void;
}

export const LOGIN_REPLY: FakeReply = {
  body: {
    status: "success",
    data: {
      authToken: "test-token",
      userId: "U-bot",
      me: { _id: "U-bot", username: "bot", name: "Bot", emails: [{ address: "bot@example.com" }] },
    },
  },
};

export function createFakeUpstream(routes: Record<string, FakeRoute> = {}): FakeUpstream {
  const table = new Map<string, FakeRoute>(Object.entries(routes));
  const requests: RecordedRequest[] = [];

  const fakeFetch: typeof fetch = async (input, init) => {
    const href = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    const method = init?.method ?? "GET";
    const rawBody = init?.body;
    let body: unknown = null;
    if (typeof rawBody === "string") {
      body = JSON.parse(rawBody);
    } else if (rawBody instanceof FormData) {
      body = rawBody;
    }
    const request: RecordedRequest = { method, url, headers: new Headers(init?.headers), body };
    requests.push(request);

    const path = url.pathname.slice(new URL(TEST_BASE_URL).pathname.length);
    const key = `${method} ${path}`;
    const route = table.get(key) ?? table.get(`${method} ${stripLastSegment(path)}/*`);
    if (!route) {
      return new Response(JSON.stringify({ success: false, error: `No route for ${key}` }), {
        status: 404,
      });
    }

    const reply = typeof route === "function" ? route(request) : route;
    return new Response(reply.stream ?? reply.text ?? JSON.stringify(reply.body), {
      status: reply.status ?? 200,
      headers: { "Content-Type": "application/json" },
    });
  };

  return {
    fetch: fakeFetch,
    requests,
    requestsTo: (pathname) => requests.filter((r) => r.url.pathname.endsWith(pathname)),
    route: (key, reply) => {
      table.set(key, reply);
    },
  };
}

/**
 * A response body that sends `partial` and then fails, like a connection
 * reset after the headers arrived
 */
export function interruptedBody(partial: string, reason = "terminated"): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode(partial));
      controller.error(new TypeError(reason));
    },
  });
}

function stripLastSegment(pathname: string): string {
  return pathname.slice(0, pathname.lastIndexOf("/"));
}
