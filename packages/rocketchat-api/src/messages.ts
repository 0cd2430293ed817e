import type { Message } from "@repo/types";
import consola from "consola";
import { ENDPOINTS } from "./endpoints.js";
import type { RocketChatErrorClass } from "./errors.js";
import { MessageListError, MessageSendError, MessageUploadError, SearchError } from "./errors.js";
import type { RocketChatHttp } from "./http.js";
import { toMessage, translate } from "./mappers.js";
import type { SessionManager } from "./session.js";
import type { AttachmentFile, JsonObject } from "./types.js";
import {
  messageListResponseSchema,
  messageResponseSchema,
  uploadResponseSchema,
} from "./types.js";

const DEFAULT_MESSAGE_LIMIT = 50;

/**
 * Message endpoints (chat.postMessage / rooms.upload / channels.messages / chat.search)
 */
export class MessageClient {
  private session: SessionManager;
  private http: RocketChatHttp;

  constructor(session: SessionManager, http: RocketChatHttp) {
    this.session = session;
    this.http = http;
  }

  // ============================================
  // Messages: Write Operations
  // ============================================

  /**
   * Post a message to a room
   */
  async sendMessage(roomId: string, text: string): Promise<Message> {
    consola.debug(`[rocketchat/messages] Sending message to room ${roomId}`);
    await this.session.ensureAuthenticated();

    const body = await this.http.postJson(
      ENDPOINTS.chatPostMessage,
      { roomId, text },
      MessageSendError,
    );
    const parsed = messageResponseSchema.safeParse(body);
    if (!parsed.success) {
      consola.error("[rocketchat/messages] Failed to send message:", body);
      throw new MessageSendError("Failed to send message", { upstreamBody: body });
    }

    return translate(MessageSendError, body, () => toMessage(parsed.data.message));
  }

  /**
   * Post a message with a file through rooms.upload.
   *
   * Rocket.Chat takes one file per multipart request: only the first file is
   * sent and the rest are dropped. Without files this is sendMessage.
   */
  async sendMessageWithAttachment(
    roomId: string,
    text: string,
    files: readonly AttachmentFile[] | null | undefined,
  ): Promise<Message> {
    if (!files || files.length === 0) {
      return this.sendMessage(roomId, text);
    }
    const file = files[0];

    consola.debug(
      `[rocketchat/messages] Sending message with ${files.length} files to room ${roomId}`,
    );
    if (files.length > 1) {
      consola.warn(
        `[rocketchat/messages] Only the first file is uploaded; ${files.length - 1} dropped`,
      );
    }
    await this.session.ensureAuthenticated();

    const form = new FormData();
    form.append("msg", text);
    form.append("roomId", roomId);
    const content = file.type ? new Blob([file.data], { type: file.type }) : file.data;
    form.append("file", content, file.name);

    const body = await this.http.postForm(
      `${ENDPOINTS.roomsUpload}/${encodeURIComponent(roomId)}`,
      form,
      MessageUploadError,
    );
    const parsed = uploadResponseSchema.safeParse(body);
    if (!parsed.success) {
      consola.error("[rocketchat/messages] Failed to upload file:", body);
      throw new MessageUploadError("Failed to upload file", { upstreamBody: body });
    }

    return translate(MessageUploadError, body, () => toMessage(parsed.data.message));
  }

  // ============================================
  // Messages: Read Operations
  // ============================================

  /**
   * Get messages of a room, in the order Rocket.Chat returns them
   */
  async getMessages(roomId: string, limit: number = DEFAULT_MESSAGE_LIMIT): Promise<Message[]> {
    consola.debug(`[rocketchat/messages] Getting messages from room ${roomId}`);
    await this.session.ensureAuthenticated();

    const body = await this.http.get(
      ENDPOINTS.channelsMessages,
      { roomId, count: limit },
      MessageListError,
    );
    return this.toMessageList(body, MessageListError, "Failed to retrieve messages");
  }

  /**
   * Search messages. Without a room id the search covers every room.
   */
  async searchMessages(searchText: string, roomId?: string | null): Promise<Message[]> {
    if (roomId == null) {
      consola.debug(`[rocketchat/messages] Searching for "${searchText}" in all rooms`);
    } else {
      consola.debug(`[rocketchat/messages] Searching for "${searchText}" in room ${roomId}`);
    }
    await this.session.ensureAuthenticated();

    const body = await this.http.get(ENDPOINTS.chatSearch, { searchText, roomId }, SearchError);
    return this.toMessageList(body, SearchError, "Failed to search messages");
  }

  private toMessageList(
    body: JsonObject,
    errorClass: RocketChatErrorClass,
    failure: string,
  ): Message[] {
    const parsed = messageListResponseSchema.safeParse(body);
    if (!parsed.success) {
      consola.error(`[rocketchat/messages] ${failure}:`, body);
      throw new errorClass(failure, { upstreamBody: body });
    }

    consola.debug(`[rocketchat/messages] Retrieved ${parsed.data.messages.length} messages`);
    return translate(errorClass, body, () => parsed.data.messages.map(toMessage));
  }
}
