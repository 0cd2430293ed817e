import { describe, expect, it } from "vitest";
import { createTestApp } from "../../test/helpers.js";

const results = {
  messages: [
    { _id: "M1", rid: "R1", msg: "deploy done", ts: "2024-03-01T09:30:00+09:00" },
  ],
  success: true,
};

describe("GET /api/rocketchat/messages/search", () => {
  it("searches every room when no room id is given", async () => {
    const { app, upstream } = createTestApp({ "GET /chat.search": { body: results } });

    const res = await app.request("/api/rocketchat/messages/search?searchText=deploy");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([
      {
        id: "M1",
        roomId: "R1",
        body: "deploy done",
        timestamp: "2024-03-01T00:30:00.000Z",
        author: null,
        attachments: [],
      },
    ]);
    const params = upstream.requestsTo("/chat.search")[0].url.searchParams;
    expect(params.get("searchText")).toBe("deploy");
    expect(params.has("roomId")).toBe(false);
  });

  it("scopes the search to a room", async () => {
    const { app, upstream } = createTestApp({ "GET /chat.search": { body: results } });

    await app.request("/api/rocketchat/messages/search?searchText=deploy&roomId=R1");

    expect(upstream.requestsTo("/chat.search")[0].url.searchParams.get("roomId")).toBe("R1");
  });

  it("treats an empty room id as a search of every room", async () => {
    const { app, upstream } = createTestApp({ "GET /chat.search": { body: results } });

    const res = await app.request("/api/rocketchat/messages/search?searchText=deploy&roomId=");

    expect(res.status).toBe(200);
    expect(upstream.requestsTo("/chat.search")[0].url.searchParams.has("roomId")).toBe(false);
  });

  it("requires searchText", async () => {
    const { app, upstream } = createTestApp();

    const res = await app.request("/api/rocketchat/messages/search");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "INVALID_REQUEST" });
    expect(upstream.requests).toHaveLength(0);
  });

  it("renders an upstream failure as 502", async () => {
    const { app } = createTestApp({
      "GET /chat.search": { status: 500, text: "Internal Server Error" },
    });

    const res = await app.request("/api/rocketchat/messages/search?searchText=deploy");

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: "SEARCH_FAILED",
      message: "Rocket.Chat API error: 500",
      details: { upstreamStatus: 500, upstream: "Internal Server Error" },
    });
  });
});
