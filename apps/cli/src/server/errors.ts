/**
 * 共通エラーレスポンス関数
 *
 * Rocket.Chat クライアントのエラー種別を HTTP ステータスと構造化ボディに変換する
 */

import type { RocketChatErrorKind } from "@repo/rocketchat-api";
import { RocketChatError, TimestampParseError } from "@repo/rocketchat-api";
import type { ApiErrorBody } from "@repo/types";
import consola from "consola";
import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { z } from "zod";

/**
 * エラー種別ごとのエラーコード
 */
const ERROR_CODES: Record<RocketChatErrorKind, string> = {
  authentication: "AUTHENTICATION_FAILED",
  channel_list: "CHANNEL_LIST_FAILED",
  channel_create: "CHANNEL_CREATE_FAILED",
  channel_info: "CHANNEL_INFO_FAILED",
  message_send: "MESSAGE_SEND_FAILED",
  message_upload: "MESSAGE_UPLOAD_FAILED",
  message_list: "MESSAGE_LIST_FAILED",
  search: "SEARCH_FAILED",
};

/**
 * 例外をエラーレスポンスに変換する (app.onError から呼ばれる)
 *
 * - 認証失敗: 401
 * - その他の upstream 失敗 / 不正なタイムスタンプ: 502
 * - 想定外: 500
 */
export function errorResponse(c: Context, error: unknown) {
  consola.error(`[server] ${c.req.method} ${c.req.path} failed:`, error);

  if (error instanceof RocketChatError) {
    const body: ApiErrorBody = {
      error: ERROR_CODES[error.kind],
      message: error.message,
      details: {
        upstreamStatus: error.upstreamStatus,
        upstream: error.upstreamBody,
      },
    };
    return c.json(body, error.kind === "authentication" ? 401 : 502);
  }

  if (error instanceof TimestampParseError) {
    const body: ApiErrorBody = {
      error: "INVALID_UPSTREAM_TIMESTAMP",
      message: error.message,
      details: { field: error.field, value: error.value },
    };
    return c.json(body, 502);
  }

  if (error instanceof HTTPException) {
    return error.getResponse();
  }

  const body: ApiErrorBody = {
    error: "INTERNAL_ERROR",
    message: error instanceof Error ? error.message : "Unknown error",
  };
  return c.json(body, 500);
}

/**
 * リクエスト検証エラー (HTTP 400)
 */
export function invalidRequestResponse(c: Context, error: z.ZodError | string) {
  const body: ApiErrorBody =
    typeof error === "string"
      ? { error: "INVALID_REQUEST", message: error }
      : {
          error: "INVALID_REQUEST",
          message: error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; "),
        };
  return c.json(body, 400);
}
