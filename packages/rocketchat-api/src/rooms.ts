import type { Room } from "@repo/types";
import consola from "consola";
import { ENDPOINTS } from "./endpoints.js";
import { ChannelCreateError, ChannelInfoError, ChannelListError } from "./errors.js";
import type { RocketChatHttp } from "./http.js";
import { toRoom, translate } from "./mappers.js";
import type { SessionManager } from "./session.js";
import { channelListResponseSchema, channelResponseSchema } from "./types.js";

/**
 * Channel endpoints (channels.list / channels.create / channels.info)
 */
export class RoomClient {
  private session: SessionManager;
  private http: RocketChatHttp;

  constructor(session: SessionManager, http: RocketChatHttp) {
    this.session = session;
    this.http = http;
  }

  /**
   * Get list of public channels
   */
  async listPublicChannels(): Promise<Room[]> {
    consola.debug("[rocketchat/rooms] Getting public channels");
    await this.session.ensureAuthenticated();

    const body = await this.http.get(ENDPOINTS.channelsList, {}, ChannelListError);
    const parsed = channelListResponseSchema.safeParse(body);
    if (!parsed.success) {
      consola.error("[rocketchat/rooms] Failed to retrieve channels:", body);
      throw new ChannelListError("Failed to retrieve channels", { upstreamBody: body });
    }

    consola.debug(`[rocketchat/rooms] Retrieved ${parsed.data.channels.length} channels`);
    return translate(ChannelListError, body, () => parsed.data.channels.map(toRoom));
  }

  /**
   * Create a public channel. An empty description is not sent.
   */
  async createChannel(
    name: string,
    members: readonly string[] = [],
    readOnly = false,
    description?: string | null,
  ): Promise<Room> {
    consola.debug(`[rocketchat/rooms] Creating channel ${name}`);
    await this.session.ensureAuthenticated();

    const request: Record<string, unknown> = {
      name,
      members: [...members],
      readOnly,
    };
    if (description) {
      request.description = description;
    }

    const body = await this.http.postJson(ENDPOINTS.channelsCreate, request, ChannelCreateError);
    const parsed = channelResponseSchema.safeParse(body);
    if (!parsed.success) {
      consola.error("[rocketchat/rooms] Failed to create channel:", body);
      throw new ChannelCreateError("Failed to create channel", { upstreamBody: body });
    }

    return translate(ChannelCreateError, body, () => toRoom(parsed.data.channel));
  }

  /**
   * Get channel info
   */
  async getChannelInfo(roomId: string): Promise<Room> {
    consola.debug(`[rocketchat/rooms] Getting info for channel ${roomId}`);
    await this.session.ensureAuthenticated();

    const body = await this.http.get(ENDPOINTS.channelsInfo, { roomId }, ChannelInfoError);
    const parsed = channelResponseSchema.safeParse(body);
    if (!parsed.success) {
      consola.error("[rocketchat/rooms] Failed to retrieve channel info:", body);
      throw new ChannelInfoError("Failed to retrieve channel info", { upstreamBody: body });
    }

    return translate(ChannelInfoError, body, () => toRoom(parsed.data.channel));
  }
}
