/**
 * Rocket.Chat API Types
 */

import { z } from "zod";

// ============================================
// Configuration
// ============================================

export interface RocketChatCredentials {
  /** REST API base URL including the version prefix (e.g. https://chat.example.com/api/v1) */
  url: string;
  username: string;
  password: string;
}

export interface RocketChatClientConfig extends RocketChatCredentials {
  /** Timeout for each upstream call in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

export interface RocketChatSession {
  token: string;
  userId: string;
}

// ============================================
// Operation Inputs
// ============================================

/** A file to upload alongside a message */
export interface AttachmentFile {
  name: string;
  /** MIME type (default: application/octet-stream) */
  type?: string;
  data: Blob;
}

// ============================================
// Wire Payloads
// ============================================

export const jsonObjectSchema = z.record(z.string(), z.unknown());

export type JsonObject = z.infer<typeof jsonObjectSchema>;

export const wireUserSchema = z.object({
  _id: z.string().nullish(),
  username: z.string().nullish(),
  name: z.string().nullish(),
});

/** Timestamps stay untyped here: they are parsed strictly by the translator. */
export const wireRoomSchema = z.object({
  _id: z.string().nullish(),
  name: z.string().nullish(),
  t: z.string().nullish(),
  u: wireUserSchema.nullish(),
  topic: z.string().nullish(),
  description: z.string().nullish(),
  ro: z.boolean().nullish(),
  default: z.boolean().nullish(),
  ts: z.unknown(),
  _updatedAt: z.unknown(),
});

export type WireRoom = z.infer<typeof wireRoomSchema>;

export const wireAttachmentSchema = z.object({
  title: z.string().nullish(),
  type: z.string().nullish(),
  description: z.string().nullish(),
  title_link: z.string().nullish(),
  title_link_download: z.boolean().nullish(),
  image_url: z.string().nullish(),
  image_type: z.string().nullish(),
  image_size: z.number().nullish(),
});

export type WireAttachment = z.infer<typeof wireAttachmentSchema>;

export const wireMessageSchema = z.object({
  _id: z.string().nullish(),
  rid: z.string().nullish(),
  msg: z.string().nullish(),
  ts: z.unknown(),
  u: wireUserSchema.nullish(),
  attachments: z.array(wireAttachmentSchema).nullish(),
});

export type WireMessage = z.infer<typeof wireMessageSchema>;

export const loginResponseSchema = z.object({
  status: z.string().optional(),
  data: z.object({
    authToken: z.string().min(1),
    userId: z.string().min(1),
    me: z
      .object({
        _id: z.string().nullish(),
        username: z.string().nullish(),
        name: z.string().nullish(),
        email: z.string().nullish(),
        emails: z.array(z.object({ address: z.string() })).nullish(),
      })
      .nullish(),
  }),
});

export type LoginResponse = z.infer<typeof loginResponseSchema>;

export const channelListResponseSchema = z.object({
  channels: z.array(z.unknown()),
  count: z.number().optional(),
});

export const channelResponseSchema = z.object({
  channel: jsonObjectSchema,
});

export const messageResponseSchema = z.object({
  message: jsonObjectSchema,
});

export const uploadResponseSchema = z.object({
  success: z.literal(true),
  message: jsonObjectSchema,
});

export const messageListResponseSchema = z.object({
  messages: z.array(z.unknown()),
});
