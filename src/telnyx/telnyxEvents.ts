import type { TrunkEvent } from '../calls/events';
import { TelnyxCallPayloadSchema, TelnyxWebhookSchema } from './types';

export type TelnyxEventMapping =
  | { kind: 'event'; event: TrunkEvent }
  | { kind: 'ignored'; reason: 'unhandled_event' | 'outbound_call' }
  | { kind: 'invalid'; reason: string };

/** Fields worth logging from any webhook, including ones that fail verification. */
export interface TelnyxEventMeta {
  eventType?: string;
  callControlId?: string;
}

export function readEventMeta(body: unknown): TelnyxEventMeta {
  const envelope = TelnyxWebhookSchema.safeParse(body);
  if (!envelope.success) {
    return {};
  }
  const eventType = envelope.data.data.event_type;
  const call = TelnyxCallPayloadSchema.safeParse(envelope.data.data.payload);
  return call.success ? { eventType, callControlId: call.data.call_control_id } : { eventType };
}

/** Same as readEventMeta, for a body that has not been parsed yet. */
export function readRawEventMeta(rawBody: Buffer): TelnyxEventMeta {
  if (rawBody.length === 0) {
    return {};
  }
  let body: unknown;
  try {
    body = JSON.parse(rawBody.toString('utf8'));
  } catch {
    // Unparseable bodies carry no meta.
    return {};
  }
  return readEventMeta(body);
}

/** Telnyx sends `to` either as a plain string or as `{ phone_number }`. */
function partyNumber(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (value && typeof value === 'object' && 'phone_number' in value && typeof value.phone_number === 'string') {
    return value.phone_number.trim();
  }
  return '';
}

/**
 * Maps a Telnyx Call Control webhook onto the trunk events the dispatcher
 * understands. The Telnyx connection id stands in for the trunk id.
 */
export function toTrunkEvent(body: unknown, requestId?: string): TelnyxEventMapping {
  const envelope = TelnyxWebhookSchema.safeParse(body);
  if (!envelope.success) {
    return { kind: 'invalid', reason: 'malformed_envelope' };
  }

  const eventType = envelope.data.data.event_type;
  const handled = ['call.initiated', 'call.answered', 'call.hangup', 'call.ended'];
  if (!handled.includes(eventType)) {
    return { kind: 'ignored', reason: 'unhandled_event' };
  }

  const parsed = TelnyxCallPayloadSchema.safeParse(envelope.data.data.payload);
  if (!parsed.success) {
    return { kind: 'invalid', reason: 'missing_call_control_id' };
  }
  const payload = parsed.data;
  const callId = payload.call_control_id;

  switch (eventType) {
    case 'call.initiated': {
      if (payload.direction && payload.direction !== 'incoming') {
        return { kind: 'ignored', reason: 'outbound_call' };
      }
      return {
        kind: 'event',
        event: {
          type: 'call.invite',
          callId,
          trunkId: payload.connection_id ?? '',
          callerId: partyNumber(payload.from),
          calleeId: partyNumber(payload.to),
          requestId,
        },
      };
    }
    case 'call.answered':
      return { kind: 'event', event: { type: 'call.answered', callId } };
    default:
      return {
        kind: 'event',
        event: { type: 'call.hangup', callId, reasonCode: payload.hangup_cause ?? 'normal_clearing' },
      };
  }
}
