import {
  InboundFrame,
  SlackEvent,
  appMentionEventSchema,
  channelMessageEventSchema,
  messageDeletedEventSchema,
  disconnectFrameSchema,
  envelopeFrameSchema,
  helloFrameSchema,
  reactionEventSchema,
  threadReplyEventSchema,
} from '../types/slack.types';

const ENVELOPE_ID_RE = /"envelope_id"\s*:\s*"([^"\\]+)"/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classify the `event` of an events_api payload. Anything outside the known
 * shapes, including a known type with missing fields, is `unrecognized`.
 */
export function classifyEvent(raw: unknown): SlackEvent {
  if (!isRecord(raw)) return { kind: 'unrecognized', event: raw };

  switch (raw.type) {
    case 'app_mention': {
      const parsed = appMentionEventSchema.safeParse(raw);
      if (parsed.success) return { kind: 'mention', event: parsed.data };
      break;
    }
    case 'message': {
      if (raw.subtype === 'message_deleted') {
        const parsed = messageDeletedEventSchema.safeParse(raw);
        if (parsed.success) return { kind: 'message_deleted', event: parsed.data };
        break;
      }
      if (typeof raw.thread_ts === 'string' && raw.thread_ts !== raw.ts) {
        const parsed = threadReplyEventSchema.safeParse(raw);
        if (parsed.success) return { kind: 'thread_reply', event: parsed.data };
        break;
      }
      if (raw.subtype === undefined) {
        const parsed = channelMessageEventSchema.safeParse(raw);
        if (parsed.success) return { kind: 'channel_message', event: parsed.data };
      }
      break;
    }
    case 'reaction_added':
    case 'reaction_removed': {
      const parsed = reactionEventSchema.safeParse(raw);
      if (parsed.success) return { kind: 'reaction_updated', event: parsed.data };
      break;
    }
  }

  return { kind: 'unrecognized', event: raw };
}

/**
 * Fallback used only after the typed parse failed: look for a string
 * `envelope_id` in the untyped JSON, then in the raw text itself.
 */
export function recoverEnvelopeId(raw: string): string | undefined {
  try {
    const data: unknown = JSON.parse(raw);
    if (isRecord(data) && typeof data.envelope_id === 'string' && data.envelope_id) {
      return data.envelope_id;
    }
  } catch {
    // not JSON, fall through to the text scan
  }
  return ENVELOPE_ID_RE.exec(raw)?.[1];
}

export function parseFrame(raw: string): InboundFrame {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return {
      kind: 'unparseable',
      raw,
      reason: (err as Error).message,
      envelopeId: recoverEnvelopeId(raw),
    };
  }

  const hello = helloFrameSchema.safeParse(data);
  if (hello.success) return { kind: 'hello', frame: hello.data };

  const disconnect = disconnectFrameSchema.safeParse(data);
  if (disconnect.success) return { kind: 'disconnect', frame: disconnect.data };

  const envelope = envelopeFrameSchema.safeParse(data);
  if (!envelope.success) {
    return {
      kind: 'unparseable',
      raw,
      reason: envelope.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; '),
      envelopeId: recoverEnvelopeId(raw),
    };
  }

  return {
    kind: 'envelope',
    envelopeId: envelope.data.envelope_id,
    frame: envelope.data,
    event: classifyEvent(envelope.data.payload?.event),
  };
}
