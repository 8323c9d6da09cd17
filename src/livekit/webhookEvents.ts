/** Fields of a LiveKit WebhookEvent this service reads. */
export interface LiveKitWebhookEvent {
  event: string;
  id?: string;
  room?: { name: string };
  participant?: { identity: string };
}

export type LiveKitSignal =
  | { kind: 'agent_joined'; roomName: string; identity: string }
  | { kind: 'agent_left'; roomName: string; identity: string }
  | { kind: 'room_finished'; roomName: string }
  | { kind: 'ignored'; reason: 'unsupported_event' | 'missing_room' | 'non_agent_participant' };

export function classifyLiveKitEvent(event: LiveKitWebhookEvent, agentIdentityPrefix: string): LiveKitSignal {
  const roomName = event.room?.name?.trim();
  if (!roomName) {
    return { kind: 'ignored', reason: 'missing_room' };
  }

  switch (event.event) {
    case 'room_finished':
      return { kind: 'room_finished', roomName };
    case 'participant_joined':
    case 'participant_left': {
      const identity = event.participant?.identity ?? '';
      if (!identity.startsWith(agentIdentityPrefix)) {
        return { kind: 'ignored', reason: 'non_agent_participant' };
      }
      return event.event === 'participant_joined'
        ? { kind: 'agent_joined', roomName, identity }
        : { kind: 'agent_left', roomName, identity };
    }
    default:
      return { kind: 'ignored', reason: 'unsupported_event' };
  }
}
