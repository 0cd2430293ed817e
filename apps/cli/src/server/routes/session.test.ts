import { describe, expect, it } from "vitest";
import { createTestApp } from "../../test/helpers.js";

describe("session routes", () => {
  it("reports no session before the first login", async () => {
    const { app, upstream } = createTestApp();

    const res = await app.request("/api/rocketchat/session");

    expect(await res.json()).toEqual({ authenticated: false, userId: null });
    expect(upstream.requests).toHaveLength(0);
  });

  it("logs in and reports the session", async () => {
    const { app, upstream } = createTestApp();

    const login = await app.request("/api/rocketchat/login", { method: "POST" });

    expect(login.status).toBe(200);
    expect(await login.json()).toEqual({
      status: "success",
      message: "Successfully authenticated with Rocket.Chat",
      userId: "U-bot",
    });
    expect(upstream.requestsTo("/login")[0].body).toEqual({
      username: "bot",
      password: "test-secret",
    });

    const session = await app.request("/api/rocketchat/session");
    expect(await session.json()).toEqual({ authenticated: true, userId: "U-bot" });
  });

  it("renders rejected credentials as 401", async () => {
    const { app } = createTestApp({
      "POST /login": { status: 401, body: { status: "error", message: "Unauthorized" } },
    });

    const res = await app.request("/api/rocketchat/login", { method: "POST" });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: "AUTHENTICATION_FAILED",
      message: "Rocket.Chat API error: 401",
      details: { upstreamStatus: 401, upstream: { status: "error", message: "Unauthorized" } },
    });
  });

  it("renders an unreachable Rocket.Chat as 401 with no upstream status", async () => {
    const { app, upstream } = createTestApp();
    upstream.route("POST /login", () => {
      throw new TypeError("fetch failed");
    });

    const res = await app.request("/api/rocketchat/login", { method: "POST" });

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({
      error: "AUTHENTICATION_FAILED",
      message: "Rocket.Chat request failed: fetch failed",
      details: { upstreamStatus: null },
    });
  });
});
