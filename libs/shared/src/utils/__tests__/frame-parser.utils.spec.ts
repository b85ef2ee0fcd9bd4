import { classifyEvent, parseFrame, recoverEnvelopeId } from '../frame-parser.utils';
import { InboundFrame } from '../../types/slack.types';

function eventsApi(envelopeId: string, event: Record<string, unknown>): string {
  return JSON.stringify({
    envelope_id: envelopeId,
    type: 'events_api',
    accepts_response_payload: false,
    payload: { type: 'event_callback', team_id: 'T1', event },
  });
}

function expectEnvelope(frame: InboundFrame): Extract<InboundFrame, { kind: 'envelope' }> {
  if (frame.kind !== 'envelope') {
    throw new Error(`expected an envelope, got ${frame.kind}`);
  }
  return frame;
}

describe('parseFrame', () => {
  it('should parse hello frames', () => {
    const frame = parseFrame(
      '{"type":"hello","num_connections":1,"debug_info":{"host":"h"},"connection_info":{"app_id":"A1"}}',
    );

    expect(frame.kind).toBe('hello');
  });

  it('should parse disconnect frames with their reason', () => {
    const frame = parseFrame('{"type":"disconnect","reason":"refresh_requested"}');

    expect(frame).toEqual({
      kind: 'disconnect',
      frame: { type: 'disconnect', reason: 'refresh_requested' },
    });
  });

  it('should classify app_mention events', () => {
    const frame = expectEnvelope(
      parseFrame(
        eventsApi('env-1', {
          type: 'app_mention',
          text: 'hi',
          user: 'U1',
          ts: '100.1',
          channel: 'C1',
          blocks: [],
        }),
      ),
    );

    expect(frame.envelopeId).toBe('env-1');
    expect(frame.frame.type).toBe('events_api');
    expect(frame.event.kind).toBe('mention');
    expect(frame.event.event).toHaveProperty('blocks', []);
  });

  it('should keep unknown envelope fields', () => {
    const raw = JSON.stringify({ envelope_id: 'env-2', type: 'events_api', extra: 7 });

    expect(expectEnvelope(parseFrame(raw)).frame).toHaveProperty('extra', 7);
  });

  it('should classify an envelope without an event as unrecognized', () => {
    const frame = expectEnvelope(
      parseFrame('{"envelope_id":"env-3","type":"slash_commands","payload":{"command":"/x"}}'),
    );

    expect(frame.envelopeId).toBe('env-3');
    expect(frame.event).toEqual({ kind: 'unrecognized', event: undefined });
  });

  it('should report a frame that fails the typed parse but still recover its id', () => {
    const frame = parseFrame('{"envelope_id":"env-9","payload":"oops"}');

    expect(frame.kind).toBe('unparseable');
    if (frame.kind !== 'unparseable') return;
    expect(frame.envelopeId).toBe('env-9');
    expect(frame.reason).toContain('type: Required');
  });

  it('should recover the id from truncated JSON', () => {
    const frame = parseFrame('{"envelope_id":"env-10","type":"events_api","payload":{');

    expect(frame.kind).toBe('unparseable');
    if (frame.kind !== 'unparseable') return;
    expect(frame.envelopeId).toBe('env-10');
  });

  it('should leave the id undefined for garbage', () => {
    const frame = parseFrame('garbage');

    expect(frame.kind).toBe('unparseable');
    if (frame.kind !== 'unparseable') return;
    expect(frame.envelopeId).toBeUndefined();
  });
});

describe('classifyEvent', () => {
  const base = { text: 'hi', user: 'U1', ts: '2.0', channel: 'C1' };

  it.each([
    [{ type: 'message', ...base }, 'channel_message'],
    [{ type: 'message', ...base, thread_ts: '2.0' }, 'channel_message'],
    [{ type: 'message', ...base, thread_ts: '1.0' }, 'thread_reply'],
    [{ type: 'message', subtype: 'message_deleted', channel: 'C1', deleted_ts: '1.0', ts: '3.0' }, 'message_deleted'],
    [{ type: 'message', subtype: 'message_changed', channel: 'C1', ts: '3.0' }, 'unrecognized'],
    [{ type: 'reaction_added', user: 'U1', reaction: 'eyes', item: { type: 'message', channel: 'C1', ts: '1.0' } }, 'reaction_updated'],
    [{ type: 'reaction_removed', user: 'U1', reaction: 'eyes', item: { type: 'message' } }, 'reaction_updated'],
    [{ type: 'app_mention', user: 'U1', ts: '1.0', channel: 'C1' }, 'unrecognized'],
    [{ type: 'team_join', user: { id: 'U2' } }, 'unrecognized'],
  ])('should classify %o as %s', (raw, kind) => {
    expect(classifyEvent(raw).kind).toBe(kind);
  });

  it('should treat non-objects as unrecognized', () => {
    expect(classifyEvent('text')).toEqual({ kind: 'unrecognized', event: 'text' });
  });
});

describe('recoverEnvelopeId', () => {
  it('should ignore a non-string id', () => {
    expect(recoverEnvelopeId('{"envelope_id": 42}')).toBeUndefined();
  });

  it('should ignore an empty id', () => {
    expect(recoverEnvelopeId('{"envelope_id":""}')).toBeUndefined();
  });

  it('should scan text that is not JSON', () => {
    expect(recoverEnvelopeId('xx "envelope_id" : "abc-1" yy')).toBe('abc-1');
  });
});
