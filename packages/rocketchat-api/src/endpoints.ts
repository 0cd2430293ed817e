/**
 * Rocket.Chat REST endpoints, relative to the configured base URL
 */
export const ENDPOINTS = {
  login: "/login",
  channelsList: "/channels.list",
  channelsCreate: "/channels.create",
  channelsInfo: "/channels.info",
  channelsMessages: "/channels.messages",
  chatSearch: "/chat.search",
  chatPostMessage: "/chat.postMessage",
  roomsUpload: "/rooms.upload",
} as const;
