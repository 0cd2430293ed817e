/**
 * Shape translation: Rocket.Chat wire payloads → facade entities
 *
 * Absent (or null) keys leave the field at its default. Timestamps are parsed
 * strictly and never defaulted once present.
 */

import type { Message, MessageAttachment, Room } from "@repo/types";
import { z } from "zod";
import type { RocketChatErrorClass } from "./errors.js";
import { TimestampParseError } from "./errors.js";
import type { WireAttachment } from "./types.js";
import { wireMessageSchema, wireRoomSchema } from "./types.js";

const instantSchema = z.string().datetime({ offset: true });

/**
 * ISO-8601 instant → Date. Anything else throws TimestampParseError.
 */
export function parseInstant(value: unknown, field: string): Date {
  const result = instantSchema.safeParse(value);
  if (!result.success) {
    throw new TimestampParseError(field, value);
  }

  const date = new Date(result.data);
  if (Number.isNaN(date.getTime())) {
    throw new TimestampParseError(field, value);
  }
  return date;
}

function optionalInstant(value: unknown, field: string): Date | null {
  return value === undefined || value === null ? null : parseInstant(value, field);
}

/**
 * Channel payload (`_id`, `t`, `u`, `ro`, ...) → Room
 */
export function toRoom(raw: unknown): Room {
  const data = wireRoomSchema.parse(raw);

  return {
    id: data._id ?? null,
    name: data.name ?? null,
    kind: data.t ?? null,
    creator: data.u ? { id: data.u._id ?? null, username: data.u.username ?? null } : null,
    topic: data.topic ?? null,
    description: data.description ?? null,
    readOnly: data.ro ?? false,
    isDefault: data.default ?? false,
    createdAt: optionalInstant(data.ts, "ts"),
    updatedAt: optionalInstant(data._updatedAt, "_updatedAt"),
  };
}

function toAttachment(data: WireAttachment): MessageAttachment {
  return {
    title: data.title ?? null,
    type: data.type ?? null,
    description: data.description ?? null,
    link: data.title_link ?? null,
    linkIsDownload: data.title_link_download ?? false,
    imageUrl: data.image_url ?? null,
    imageType: data.image_type ?? null,
    imageSizeBytes: data.image_size ?? null,
  };
}

/**
 * Message payload (`_id`, `rid`, `msg`, `u`, ...) → Message
 */
export function toMessage(raw: unknown): Message {
  const data = wireMessageSchema.parse(raw);

  return {
    id: data._id ?? null,
    roomId: data.rid ?? null,
    body: data.msg ?? null,
    timestamp: optionalInstant(data.ts, "ts"),
    author: data.u
      ? { id: data.u._id ?? null, username: data.u.username ?? null, name: data.u.name ?? null }
      : null,
    attachments: (data.attachments ?? []).map(toAttachment),
  };
}

/**
 * Run a translation, reporting wrongly typed payload fields as the operation's error.
 * TimestampParseError passes through unchanged.
 */
export function translate<T>(
  errorClass: RocketChatErrorClass,
  upstreamBody: unknown,
  fn: () => T,
): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new errorClass(`Rocket.Chat API returned a malformed payload: ${error.message}`, {
        upstreamBody,
        cause: error,
      });
    }
    throw error;
  }
}
