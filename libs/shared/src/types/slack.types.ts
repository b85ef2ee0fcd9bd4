import { z } from 'zod';

// Socket Mode frames. Unknown fields are kept (passthrough) so nothing is lost
// when a frame is logged or forwarded.

export const helloFrameSchema = z
  .object({
    type: z.literal('hello'),
    num_connections: z.number().optional(),
    debug_info: z.record(z.unknown()).optional(),
    connection_info: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const disconnectFrameSchema = z
  .object({
    type: z.literal('disconnect'),
    reason: z.string().optional(),
    debug_info: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const envelopeFrameSchema = z
  .object({
    type: z.string(),
    envelope_id: z.string().min(1),
    payload: z.record(z.unknown()).optional(),
    accepts_response_payload: z.boolean().optional(),
    retry_attempt: z.number().optional(),
    retry_reason: z.string().optional(),
  })
  .passthrough();

// Events API payload events

export const appMentionEventSchema = z
  .object({
    type: z.literal('app_mention'),
    text: z.string(),
    user: z.string(),
    ts: z.string(),
    channel: z.string(),
    thread_ts: z.string().optional(),
    event_ts: z.string().optional(),
    bot_id: z.string().optional(),
  })
  .passthrough();

export const channelMessageEventSchema = z
  .object({
    type: z.literal('message'),
    text: z.string(),
    user: z.string(),
    ts: z.string(),
    channel: z.string(),
    channel_type: z.string().optional(),
    thread_ts: z.string().optional(),
    event_ts: z.string().optional(),
    bot_id: z.string().optional(),
  })
  .passthrough();

export const messageDeletedEventSchema = z
  .object({
    type: z.literal('message'),
    subtype: z.literal('message_deleted'),
    channel: z.string(),
    deleted_ts: z.string(),
    ts: z.string(),
    hidden: z.boolean().optional(),
    previous_message: z.unknown().optional(),
  })
  .passthrough();

export const threadReplyEventSchema = z
  .object({
    type: z.literal('message'),
    ts: z.string(),
    thread_ts: z.string(),
    channel: z.string(),
    text: z.string().optional(),
    user: z.string().optional(),
    bot_id: z.string().optional(),
  })
  .passthrough();

export const reactionEventSchema = z
  .object({
    type: z.enum(['reaction_added', 'reaction_removed']),
    user: z.string(),
    reaction: z.string(),
    item: z
      .object({
        type: z.string(),
        channel: z.string().optional(),
        ts: z.string().optional(),
      })
      .passthrough(),
    item_user: z.string().optional(),
    event_ts: z.string().optional(),
  })
  .passthrough();

export type HelloFrame = z.infer<typeof helloFrameSchema>;
export type DisconnectFrame = z.infer<typeof disconnectFrameSchema>;
export type EnvelopeFrame = z.infer<typeof envelopeFrameSchema>;
export type AppMentionEvent = z.infer<typeof appMentionEventSchema>;
export type ChannelMessageEvent = z.infer<typeof channelMessageEventSchema>;
export type MessageDeletedEvent = z.infer<typeof messageDeletedEventSchema>;
export type ThreadReplyEvent = z.infer<typeof threadReplyEventSchema>;
export type ReactionEvent = z.infer<typeof reactionEventSchema>;

export type SlackEvent =
  | { kind: 'mention'; event: AppMentionEvent }
  | { kind: 'channel_message'; event: ChannelMessageEvent }
  | { kind: 'message_deleted'; event: MessageDeletedEvent }
  | { kind: 'reaction_updated'; event: ReactionEvent }
  | { kind: 'thread_reply'; event: ThreadReplyEvent }
  | { kind: 'unrecognized'; event?: unknown };

export type CommandMessageEvent = AppMentionEvent | ChannelMessageEvent;

export type InboundFrame =
  | { kind: 'hello'; frame: HelloFrame }
  | { kind: 'disconnect'; frame: DisconnectFrame }
  | {
      kind: 'envelope';
      envelopeId: string;
      frame: EnvelopeFrame;
      event: SlackEvent;
    }
  | { kind: 'unparseable'; raw: string; reason: string; envelopeId?: string };

export interface AckFrame {
  envelope_id: string;
}

export interface PostMessageParams {
  channel: string;
  text: string;
  thread_ts?: string;
}

/** Obtains a Socket Mode WebSocket URL for the app-level token. */
export interface ConnectionProvider {
  openConnection(): Promise<string>;
}

/** Posts a reply into a channel, optionally inside a thread. */
export interface ChatPoster {
  postMessage(params: PostMessageParams): Promise<{ ts?: string }>;
}
