/**
 * 共有型定義パッケージ
 *
 * Rocket.Chat クライアントとファサードサーバーで共有する型定義をまとめてexportします。
 */

export type {
  AccountProfile,
  ApiErrorBody,
  AuthResult,
  Message,
  MessageAttachment,
  MessageAuthor,
  Room,
  RoomCreator,
} from "./rocketchat.js";
