import type { AgentProfile, DispatchRule } from '../dispatch/types';

export type CallId = string;

export const CALL_SESSION_STATES = [
  'ARRIVED',
  'MATCHING',
  'ROOM_PENDING',
  'AGENT_STARTING',
  'ACTIVE',
  'ENDING',
  'ENDED',
  'REJECTED',
  'FAILED',
] as const;

export type CallSessionState = (typeof CALL_SESSION_STATES)[number];

export type TerminalState = Extract<CallSessionState, 'ENDED' | 'REJECTED' | 'FAILED'>;

export type TerminationReason =
  | 'MALFORMED_REQUEST'
  | 'NO_MATCHING_RULE'
  | 'RULE_REJECTED'
  | 'ROOM_CONFLICT'
  | 'AT_CAPACITY'
  | 'CAPACITY_UNAVAILABLE'
  | 'ROOM_CREATE_TIMEOUT'
  | 'AGENT_START_FAILURE'
  | 'AGENT_CRASH'
  | 'CALLER_HANGUP'
  | 'STOPPED'
  | 'ROOM_CLOSED'
  | 'MAX_DURATION'
  | 'SHUTDOWN'
  | 'INTERNAL_ERROR';

export type AgentState = 'STARTING' | 'READY' | 'FAILED' | 'STOPPED';

export interface AgentHandle {
  agentId: string;
  roomName: string;
  profile: AgentProfile;
  state: AgentState;
  startedAt: Date;
  dispatchId?: string;
}

export interface CallDetails {
  trunkId: string;
  callerId: string;
  calleeId: string;
  requestId?: string;
}

export interface CallSession extends CallDetails {
  readonly callId: CallId;
  state: CallSessionState;
  roomName: string | null;
  rule: DispatchRule | null;
  profile: AgentProfile | null;
  agentId: string | null;
  answered: boolean;
  terminationReason: TerminationReason | null;
  teardownTimedOut: boolean;
  createdAt: Date;
  updatedAt: Date;
  endedAt: Date | null;
}

export type CallSessionPatch = Partial<
  Pick<CallSession, 'rule' | 'profile' | 'agentId' | 'answered' | 'teardownTimedOut'>
>;

export interface CallSessionSnapshot {
  call_id: CallId;
  trunk_id: string;
  caller_id: string;
  callee_id: string;
  state: CallSessionState;
  room_name: string | null;
  rule_id: string | null;
  agent_profile: string | null;
  agent_id: string | null;
  termination_reason: TerminationReason | null;
  teardown_timed_out: boolean;
  created_at: string;
  updated_at: string;
  ended_at: string | null;
}

export function toSnapshot(session: CallSession): CallSessionSnapshot {
  return {
    call_id: session.callId,
    trunk_id: session.trunkId,
    caller_id: session.callerId,
    callee_id: session.calleeId,
    state: session.state,
    room_name: session.roomName,
    rule_id: session.rule?.id ?? null,
    agent_profile: session.profile?.name ?? null,
    agent_id: session.agentId,
    termination_reason: session.terminationReason,
    teardown_timed_out: session.teardownTimedOut,
    created_at: session.createdAt.toISOString(),
    updated_at: session.updatedAt.toISOString(),
    ended_at: session.endedAt ? session.endedAt.toISOString() : null,
  };
}
