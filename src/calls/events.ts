import type { CapacityFailureReason } from '../limits/types';
import type { CallId, CallSessionState } from './types';

export interface CallInviteEvent {
  type: 'call.invite';
  callId: CallId;
  trunkId: string;
  callerId: string;
  calleeId: string;
  requestId?: string;
}

export interface CallAnsweredEvent {
  type: 'call.answered';
  callId: CallId;
}

export interface CallHangupEvent {
  type: 'call.hangup';
  callId: CallId;
  reasonCode: string;
}

export type TrunkEvent = CallInviteEvent | CallAnsweredEvent | CallHangupEvent;

export type RoomEvent =
  | { type: 'room.created'; roomName: string }
  | { type: 'room.create_failed'; roomName: string; error: string }
  | { type: 'room.finished'; roomName: string };

export type AgentEvent =
  | { type: 'agent.ready'; roomName: string; agentId: string }
  | { type: 'agent.failed'; roomName: string; agentId: string; error: string }
  | { type: 'agent.exited'; roomName: string; agentId: string; expected: boolean; detail?: string };

export type TimedPhase = Extract<CallSessionState, 'MATCHING' | 'ROOM_PENDING' | 'AGENT_STARTING' | 'ACTIVE' | 'ENDING'>;

export type CapacityOutcome =
  | { kind: 'acquired' }
  | { kind: 'denied'; reason: CapacityFailureReason }
  | { kind: 'unavailable'; error: string };

export type ControlEvent =
  | { type: 'session.stop'; callId: CallId; reason: 'STOPPED' | 'SHUTDOWN' }
  | { type: 'capacity.settled'; callId: CallId; token: number; outcome: CapacityOutcome }
  | { type: 'timer.expired'; callId: CallId; phase: TimedPhase; token: number }
  | { type: 'teardown.settled'; callId: CallId; token: number };

export type SessionEvent = TrunkEvent | RoomEvent | AgentEvent | ControlEvent;

export type RoomScopedEvent = RoomEvent | AgentEvent;
export type CallScopedEvent = TrunkEvent | ControlEvent;

export function isRoomScoped(event: SessionEvent): event is RoomScopedEvent {
  return 'roomName' in event;
}
