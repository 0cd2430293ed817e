/**
 * Rocket.Chat API error taxonomy
 *
 * Every client operation fails with exactly one of these kinds. The raw
 * upstream status and body (or the transport failure as `cause`) travel
 * with the error so the facade can render them.
 */

export type RocketChatErrorKind =
  | "authentication"
  | "channel_list"
  | "channel_create"
  | "channel_info"
  | "message_send"
  | "message_upload"
  | "message_list"
  | "search";

export interface RocketChatErrorOptions {
  /** HTTP status returned by Rocket.Chat, when a response was received */
  upstreamStatus?: number;
  /** Parsed JSON (or raw text) returned by Rocket.Chat */
  upstreamBody?: unknown;
  cause?: unknown;
}

export abstract class RocketChatError extends Error {
  abstract readonly kind: RocketChatErrorKind;
  readonly upstreamStatus: number | null;
  readonly upstreamBody: unknown;

  constructor(message: string, options: RocketChatErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.upstreamStatus = options.upstreamStatus ?? null;
    this.upstreamBody = options.upstreamBody ?? null;
  }
}

export type RocketChatErrorClass = new (
  message: string,
  options?: RocketChatErrorOptions,
) => RocketChatError;

export class AuthenticationError extends RocketChatError {
  readonly kind = "authentication";
}

export class ChannelListError extends RocketChatError {
  readonly kind = "channel_list";
}

export class ChannelCreateError extends RocketChatError {
  readonly kind = "channel_create";
}

export class ChannelInfoError extends RocketChatError {
  readonly kind = "channel_info";
}

export class MessageSendError extends RocketChatError {
  readonly kind = "message_send";
}

export class MessageUploadError extends RocketChatError {
  readonly kind = "message_upload";
}

export class MessageListError extends RocketChatError {
  readonly kind = "message_list";
}

export class SearchError extends RocketChatError {
  readonly kind = "search";
}

/**
 * An upstream timestamp that is not a valid ISO-8601 instant.
 * Never coerced to null: the operation that met it fails.
 */
export class TimestampParseError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown) {
    super(`Invalid timestamp in "${field}": ${JSON.stringify(value)}`);
    this.name = "TimestampParseError";
    this.field = field;
    this.value = value;
  }
}
