/**
 * Rocket.Chat Channels API Routes
 *
 * チャンネル一覧・作成・詳細と、チャンネル内メッセージの取得・送信
 */

import type { AttachmentFile, MessageClient, RoomClient } from "@repo/rocketchat-api";
import { Hono } from "hono";
import { z } from "zod";
import { invalidRequestResponse } from "../errors.js";

const DEFAULT_MESSAGE_LIMIT = 50;

const createChannelSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  members: z.array(z.string()).default([]),
  readOnly: z.boolean().default(false),
  description: z.string().optional(),
});

const listMessagesQuerySchema = z.object({
  limit: z.coerce.number().int().positive().default(DEFAULT_MESSAGE_LIMIT),
});

const sendMessageSchema = z.object({
  message: z.string().refine((s) => s.trim().length > 0, "message is required"),
});

export function createChannelsRouter(rooms: RoomClient, messages: MessageClient) {
  const router = new Hono();

  /**
   * GET /api/rocketchat/channels
   *
   * 公開チャンネル一覧を取得
   */
  router.get("/", async (c) => {
    return c.json(await rooms.listPublicChannels());
  });

  /**
   * POST /api/rocketchat/channels
   *
   * チャンネルを作成
   * Body: { name: string, members?: string[], readOnly?: boolean, description?: string }
   */
  router.post("/", async (c) => {
    const body = await c.req.json<unknown>().catch(() => null);
    const parsed = createChannelSchema.safeParse(body);
    if (!parsed.success) {
      return invalidRequestResponse(c, parsed.error);
    }

    const { name, members, readOnly, description } = parsed.data;
    return c.json(await rooms.createChannel(name, members, readOnly, description));
  });

  /**
   * GET /api/rocketchat/channels/:roomId
   *
   * チャンネル詳細を取得
   */
  router.get("/:roomId", async (c) => {
    return c.json(await rooms.getChannelInfo(c.req.param("roomId")));
  });

  /**
   * GET /api/rocketchat/channels/:roomId/messages?limit=50
   *
   * チャンネルのメッセージを取得 (upstream の順序のまま)
   */
  router.get("/:roomId/messages", async (c) => {
    const parsed = listMessagesQuerySchema.safeParse({ limit: c.req.query("limit") });
    if (!parsed.success) {
      return invalidRequestResponse(c, parsed.error);
    }

    return c.json(await messages.getMessages(c.req.param("roomId"), parsed.data.limit));
  });

  /**
   * POST /api/rocketchat/channels/:roomId/messages
   *
   * メッセージを送信
   * - JSON: { message: string }
   * - multipart/form-data: message + file (最初の 1 ファイルのみアップロード)
   */
  router.post("/:roomId/messages", async (c) => {
    const roomId = c.req.param("roomId");

    if (c.req.header("Content-Type")?.startsWith("multipart/form-data")) {
      const form = await c.req.parseBody({ all: true });
      const parsed = sendMessageSchema.safeParse({ message: form.message });
      if (!parsed.success) {
        return invalidRequestResponse(c, parsed.error);
      }

      const files = collectFiles(form.file);
      return c.json(await messages.sendMessageWithAttachment(roomId, parsed.data.message, files));
    }

    const body = await c.req.json<unknown>().catch(() => null);
    const parsed = sendMessageSchema.safeParse(body);
    if (!parsed.success) {
      return invalidRequestResponse(c, parsed.error);
    }

    return c.json(await messages.sendMessage(roomId, parsed.data.message));
  });

  return router;
}

/**
 * multipart の file フィールド (単数 / 複数) を AttachmentFile の配列に変換
 */
function collectFiles(value: string | File | (string | File)[] | undefined): AttachmentFile[] {
  const values = value === undefined ? [] : Array.isArray(value) ? value : [value];

  return values
    .filter((v): v is File => typeof v !== "string")
    .map((file) => ({ name: file.name, type: file.type || undefined, data: file }));
}
