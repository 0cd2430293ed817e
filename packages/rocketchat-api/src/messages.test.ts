import { describe, expect, it } from "vitest";
import { buildRocketChatClients } from "./client.js";
import {
  AuthenticationError,
  MessageListError,
  MessageSendError,
  MessageUploadError,
  SearchError,
  TimestampParseError,
} from "./errors.js";
import type { FakeRoute } from "./testing.js";
import { createFakeUpstream, LOGIN_REPLY, TEST_BASE_URL } from "./testing.js";

function setup(routes: Record<string, FakeRoute>) {
  const upstream = createFakeUpstream({ "POST /login": LOGIN_REPLY, ...routes });
  const clients = buildRocketChatClients({
    url: TEST_BASE_URL,
    username: "bot",
    password: "test-secret",
    fetch: upstream.fetch,
  });
  return { upstream, ...clients };
}

const sentMessage = {
  _id: "M1",
  rid: "R1",
  msg: "hello",
  ts: "2024-05-01T10:00:00.000Z",
  u: { _id: "U-bot", username: "bot", name: "Bot" },
};

const fileA = { name: "a.txt", type: "text/plain", data: new Blob(["alpha"]) };
const fileB = { name: "b.txt", type: "text/plain", data: new Blob(["beta"]) };

describe("MessageClient.sendMessage", () => {
  it("posts roomId and text", async () => {
    const { upstream, messages } = setup({
      "POST /chat.postMessage": { body: { success: true, message: sentMessage } },
    });

    const message = await messages.sendMessage("R1", "hello");

    const [request] = upstream.requestsTo("/chat.postMessage");
    expect(request.body).toEqual({ roomId: "R1", text: "hello" });
    expect(request.headers.get("X-Auth-Token")).toBe("test-token");
    expect(message).toEqual({
      id: "M1",
      roomId: "R1",
      body: "hello",
      timestamp: new Date("2024-05-01T10:00:00.000Z"),
      author: { id: "U-bot", username: "bot", name: "Bot" },
      attachments: [],
    });
  });

  it("fails when the message key is absent", async () => {
    const { messages } = setup({
      "POST /chat.postMessage": { body: { success: false, error: "error-not-allowed" } },
    });

    await expect(messages.sendMessage("R1", "hello")).rejects.toBeInstanceOf(MessageSendError);
  });

  it("fails with the login error when login is unreachable", async () => {
    const { messages } = setup({ "POST /login": { status: 503, text: "unavailable" } });

    const error = await messages.sendMessage("R1", "hello").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ upstreamStatus: 503, upstreamBody: "unavailable" });
  });
});

describe("MessageClient.sendMessageWithAttachment", () => {
  const uploadReply: FakeRoute = {
    body: {
      success: true,
      message: {
        ...sentMessage,
        attachments: [{ title: "a.txt", type: "file", title_link: "/file-upload/F1/a.txt" }],
      },
    },
  };

  it("uploads only the first file in one multipart request", async () => {
    const { upstream, messages } = setup({ "POST /rooms.upload/*": uploadReply });

    const message = await messages.sendMessageWithAttachment("R1", "hi", [fileA, fileB]);

    const uploads = upstream.requestsTo("/rooms.upload/R1");
    expect(uploads).toHaveLength(1);
    const form = uploads[0].body;
    if (!(form instanceof FormData)) throw new Error("expected a multipart body");
    expect(form.get("msg")).toBe("hi");
    expect(form.get("roomId")).toBe("R1");
    expect(form.getAll("file")).toHaveLength(1);
    const file = form.get("file");
    expect(file).toHaveProperty("name", "a.txt");
    expect(file).toHaveProperty("type", "text/plain");
    expect(uploads[0].headers.get("X-User-Id")).toBe("U-bot");
    expect(message.attachments).toEqual([
      {
        title: "a.txt",
        type: "file",
        description: null,
        link: "/file-upload/F1/a.txt",
        linkIsDownload: false,
        imageUrl: null,
        imageType: null,
        imageSizeBytes: null,
      },
    ]);
  });

  it("sends the uploaded bytes", async () => {
    const { upstream, messages } = setup({ "POST /rooms.upload/*": uploadReply });

    await messages.sendMessageWithAttachment("R1", "hi", [fileA]);

    const form = upstream.requestsTo("/rooms.upload/R1")[0].body;
    if (!(form instanceof FormData)) throw new Error("expected a multipart body");
    const file = form.get("file");
    if (!(file instanceof Blob)) throw new Error("expected a file part");
    expect(await file.text()).toBe("alpha");
  });

  it("falls back to a plain send without files", async () => {
    const { upstream, messages } = setup({
      "POST /chat.postMessage": { body: { message: sentMessage } },
    });

    await messages.sendMessageWithAttachment("R1", "hello", []);

    expect(upstream.requestsTo("/chat.postMessage")).toHaveLength(1);
    expect(upstream.requests.some((r) => r.url.pathname.includes("rooms.upload"))).toBe(false);
  });

  it("fails when success is false", async () => {
    const { messages } = setup({ "POST /rooms.upload/*": { body: { success: false } } });

    await expect(messages.sendMessageWithAttachment("R1", "hi", [fileA])).rejects.toBeInstanceOf(
      MessageUploadError,
    );
  });

  it("reports a wrongly typed attachment field as an upload error", async () => {
    const { messages } = setup({
      "POST /rooms.upload/*": {
        body: {
          success: true,
          message: { ...sentMessage, attachments: [{ title: "a.txt", image_size: "big" }] },
        },
      },
    });

    await expect(messages.sendMessageWithAttachment("R1", "hi", [fileA])).rejects.toBeInstanceOf(
      MessageUploadError,
    );
  });

  it("fails when success is true but the message is missing", async () => {
    const { messages } = setup({ "POST /rooms.upload/*": { body: { success: true } } });

    await expect(messages.sendMessageWithAttachment("R1", "hi", [fileA])).rejects.toThrow(
      "Failed to upload file",
    );
  });
});

describe("MessageClient.getMessages", () => {
  it("returns the messages in upstream order", async () => {
    const { upstream, messages } = setup({
      "GET /channels.messages": {
        body: {
          messages: [
            {
              _id: "M1",
              rid: "R1",
              msg: "hi",
              ts: "2024-01-01T00:00:00Z",
              u: { _id: "U1", username: "alice" },
            },
          ],
        },
      },
    });

    const result = await messages.getMessages("R1", 50);

    expect(result).toHaveLength(1);
    expect(result[0].body).toBe("hi");
    expect(result[0].author?.username).toBe("alice");
    expect(result[0].timestamp).toEqual(new Date("2024-01-01T00:00:00Z"));
    const [request] = upstream.requestsTo("/channels.messages");
    expect(request.url.searchParams.get("roomId")).toBe("R1");
    expect(request.url.searchParams.get("count")).toBe("50");
  });

  it("defaults the count to 50", async () => {
    const { upstream, messages } = setup({ "GET /channels.messages": { body: { messages: [] } } });

    await messages.getMessages("R1");

    const [request] = upstream.requestsTo("/channels.messages");
    expect(request.url.searchParams.get("count")).toBe("50");
  });

  it("does not re-sort", async () => {
    const { messages } = setup({
      "GET /channels.messages": {
        body: {
          messages: [
            { _id: "M2", ts: "2024-01-02T00:00:00Z" },
            { _id: "M1", ts: "2024-01-01T00:00:00Z" },
            { _id: "M3", ts: "2024-01-03T00:00:00Z" },
          ],
        },
      },
    });

    const result = await messages.getMessages("R1", 3);

    expect(result.map((m) => m.id)).toEqual(["M2", "M1", "M3"]);
  });

  it("fails on a malformed message timestamp", async () => {
    const { messages } = setup({
      "GET /channels.messages": {
        body: { messages: [sentMessage, { _id: "M2", ts: "yesterday" }] },
      },
    });

    const error = await messages.getMessages("R1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimestampParseError);
    expect(error).toMatchObject({ field: "ts", value: "yesterday" });
  });

  it("reports a wrongly typed attachment field as a message list error", async () => {
    const { messages } = setup({
      "GET /channels.messages": {
        body: { messages: [{ _id: "M1", attachments: [{ title_link_download: "yes" }] }] },
      },
    });

    await expect(messages.getMessages("R1")).rejects.toBeInstanceOf(MessageListError);
  });

  it("fails when the messages key is absent", async () => {
    const { messages } = setup({ "GET /channels.messages": { body: { success: true } } });

    await expect(messages.getMessages("R1")).rejects.toBeInstanceOf(MessageListError);
  });
});

describe("MessageClient.searchMessages", () => {
  it("searches every room without a room id", async () => {
    const { upstream, messages } = setup({ "GET /chat.search": { body: { messages: [] } } });

    await messages.searchMessages("hello", null);

    const [request] = upstream.requestsTo("/chat.search");
    expect(request.url.searchParams.get("searchText")).toBe("hello");
    expect(request.url.searchParams.has("roomId")).toBe(false);
  });

  it("scopes the search to a room", async () => {
    const { upstream, messages } = setup({ "GET /chat.search": { body: { messages: [] } } });

    await messages.searchMessages("hello", "R1");

    const [request] = upstream.requestsTo("/chat.search");
    expect(request.url.search).toBe("?searchText=hello&roomId=R1");
  });

  it("maps the hits", async () => {
    const { messages } = setup({
      "GET /chat.search": { body: { messages: [sentMessage], success: true } },
    });

    const result = await messages.searchMessages("hello");

    expect(result.map((m) => m.id)).toEqual(["M1"]);
  });

  it("fails when the messages key is absent", async () => {
    const { messages } = setup({ "GET /chat.search": { body: { success: false } } });

    await expect(messages.searchMessages("hello")).rejects.toBeInstanceOf(SearchError);
  });
});
