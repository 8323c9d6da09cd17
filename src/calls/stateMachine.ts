import type { CallSessionState, TerminalState } from './types';

const TRANSITIONS: Readonly<Record<CallSessionState, readonly CallSessionState[]>> = {
  ARRIVED: ['MATCHING', 'REJECTED', 'FAILED'],
  MATCHING: ['ROOM_PENDING', 'REJECTED', 'FAILED'],
  ROOM_PENDING: ['AGENT_STARTING', 'ENDING', 'FAILED'],
  AGENT_STARTING: ['ACTIVE', 'ENDING', 'FAILED'],
  ACTIVE: ['ENDING', 'FAILED'],
  ENDING: ['ENDED', 'FAILED'],
  ENDED: [],
  REJECTED: [],
  FAILED: [],
};

export function canTransition(from: CallSessionState, to: CallSessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: CallSessionState): state is TerminalState {
  return state === 'ENDED' || state === 'REJECTED' || state === 'FAILED';
}

export function allowedTransitions(from: CallSessionState): readonly CallSessionState[] {
  return TRANSITIONS[from];
}
