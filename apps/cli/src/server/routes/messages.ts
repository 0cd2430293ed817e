import type { MessageClient } from "@repo/rocketchat-api";
import { Hono } from "hono";
import { z } from "zod";
import { invalidRequestResponse } from "../errors.js";

const searchQuerySchema = z.object({
  searchText: z.string().min(1, "searchText is required"),
  roomId: z.string().optional(),
});

export function createMessagesRouter(messages: MessageClient) {
  const router = new Hono();

  /**
   * GET /api/rocketchat/messages/search?searchText=...&roomId=...
   *
   * メッセージ検索 (roomId 省略時は全ルーム)
   */
  router.get("/search", async (c) => {
    const parsed = searchQuerySchema.safeParse({
      searchText: c.req.query("searchText"),
      // 空の roomId は全ルーム検索として扱う
      roomId: c.req.query("roomId") || undefined,
    });
    if (!parsed.success) {
      return invalidRequestResponse(c, parsed.error);
    }

    return c.json(await messages.searchMessages(parsed.data.searchText, parsed.data.roomId ?? null));
  });

  return router;
}
