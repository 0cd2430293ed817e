/**
 * @repo/rocketchat-api
 *
 * Rocket.Chat REST API client: session handling plus channel and message
 * endpoints translated into the facade's entity shapes.
 *
 * @example
 * ```typescript
 * import { createRocketChatClients } from "@repo/rocketchat-api";
 *
 * const clients = createRocketChatClients({
 *   url: "https://chat.example.com/api/v1",
 *   username: "bot",
 *   password: "test-secret",
 * });
 *
 * // Logs in on first use
 * const channels = await clients?.rooms.listPublicChannels();
 * await clients?.messages.sendMessage("GENERAL", "Hello!");
 * const hits = await clients?.messages.searchMessages("deploy", "GENERAL");
 * ```
 */

export type { RocketChatClients } from "./client.js";
export { buildRocketChatClients, createRocketChatClients } from "./client.js";
export { CredentialStore } from "./credential-store.js";
export { ENDPOINTS } from "./endpoints.js";
export type { RocketChatErrorClass, RocketChatErrorKind, RocketChatErrorOptions } from "./errors.js";
export {
  AuthenticationError,
  ChannelCreateError,
  ChannelInfoError,
  ChannelListError,
  MessageListError,
  MessageSendError,
  MessageUploadError,
  RocketChatError,
  SearchError,
  TimestampParseError,
} from "./errors.js";
export { RocketChatHttp } from "./http.js";
export { parseInstant, toMessage, toRoom } from "./mappers.js";
export { MessageClient } from "./messages.js";
export { RoomClient } from "./rooms.js";
export { SessionManager } from "./session.js";
export type {
  AttachmentFile,
  RocketChatClientConfig,
  RocketChatCredentials,
  RocketChatSession,
} from "./types.js";
