import { SessionError } from '../errors';
import { log } from '../log';
import { canTransition, isTerminal } from './stateMachine';
import type {
  CallDetails,
  CallId,
  CallSession,
  CallSessionPatch,
  CallSessionState,
  TerminationReason,
} from './types';

const DEFAULT_GRACE_MS = 60_000;

export interface SessionRegistryOptions {
  graceMs?: number;
  now?: () => Date;
}

export interface RegistryStats {
  total: number;
  live: number;
  terminal: number;
  rooms: number;
}

/**
 * Single source of truth for call sessions. Each method runs to completion
 * without yielding, so a create, bind or transition is atomic with respect to
 * every other caller on the event loop.
 */
export class SessionRegistry {
  private readonly sessions = new Map<CallId, CallSession>();
  private readonly rooms = new Map<string, CallId>();
  private readonly retiredRooms = new Map<string, CallId>();
  private readonly removalTimers = new Map<CallId, NodeJS.Timeout>();
  private readonly graceMs: number;
  private readonly now: () => Date;

  constructor(options: SessionRegistryOptions = {}) {
    this.graceMs = Math.max(options.graceMs ?? DEFAULT_GRACE_MS, 0);
    this.now = options.now ?? (() => new Date());
  }

  public createSession(callId: CallId, details: CallDetails): CallSession {
    const existing = this.sessions.get(callId);
    if (existing) {
      throw new SessionError('DUPLICATE_CALL', `session already exists for call ${callId}`, {
        call_id: callId,
        state: existing.state,
      });
    }

    const createdAt = this.now();
    const session: CallSession = {
      callId,
      trunkId: details.trunkId,
      callerId: details.callerId,
      calleeId: details.calleeId,
      requestId: details.requestId,
      state: 'ARRIVED',
      roomName: null,
      rule: null,
      profile: null,
      agentId: null,
      answered: false,
      terminationReason: null,
      teardownTimedOut: false,
      createdAt,
      updatedAt: createdAt,
      endedAt: null,
    };

    this.sessions.set(callId, session);
    return session;
  }

  public get(callId: CallId): CallSession {
    const session = this.sessions.get(callId);
    if (!session) {
      throw new SessionError('NOT_FOUND', `no session for call ${callId}`, { call_id: callId });
    }
    return session;
  }

  public find(callId: CallId): CallSession | undefined {
    return this.sessions.get(callId);
  }

  /**
   * Resolves a room to its live session, or to the terminal session that last
   * held it while that session is still within its grace period.
   */
  public findByRoom(roomName: string): CallSession | undefined {
    const callId = this.rooms.get(roomName) ?? this.retiredRooms.get(roomName);
    return callId ? this.sessions.get(callId) : undefined;
  }

  /**
   * Associates a room with a live session. Fails when another live session
   * holds the room; rebinding the same pair is a no-op.
   */
  public bindRoom(callId: CallId, roomName: string): CallSession {
    const session = this.get(callId);
    const holder = this.rooms.get(roomName);

    if (holder && holder !== callId) {
      throw new SessionError('ROOM_CONFLICT', `room ${roomName} is held by call ${holder}`, {
        call_id: callId,
        room_name: roomName,
        holder_call_id: holder,
      });
    }
    if (isTerminal(session.state)) {
      throw new SessionError('INVALID_TRANSITION', `cannot bind room to terminal call ${callId}`, {
        call_id: callId,
        state: session.state,
      });
    }
    if (session.roomName && session.roomName !== roomName) {
      throw new SessionError('ROOM_CONFLICT', `call ${callId} is already bound to ${session.roomName}`, {
        call_id: callId,
        room_name: roomName,
      });
    }

    this.rooms.set(roomName, callId);
    session.roomName = roomName;
    session.updatedAt = this.now();
    return session;
  }

  public transition(callId: CallId, next: CallSessionState, reason?: TerminationReason): CallSession {
    const session = this.get(callId);
    const previous = session.state;

    if (!canTransition(previous, next)) {
      throw new SessionError('INVALID_TRANSITION', `illegal transition ${previous} -> ${next}`, {
        call_id: callId,
        from: previous,
        to: next,
      });
    }

    const now = this.now();
    session.state = next;
    session.updatedAt = now;
    if (reason && session.terminationReason === null) {
      session.terminationReason = reason;
    }

    if (isTerminal(next)) {
      session.endedAt = now;
      this.releaseRoom(session);
      this.scheduleRemoval(callId);
    }

    return session;
  }

  public update(callId: CallId, patch: CallSessionPatch): CallSession {
    const session = this.get(callId);
    if (patch.agentId !== undefined && session.agentId !== null && patch.agentId !== session.agentId) {
      throw new SessionError('AGENT_ALREADY_ASSIGNED', `call ${callId} already has agent ${session.agentId}`, {
        call_id: callId,
        agent_id: session.agentId,
      });
    }

    Object.assign(session, patch);
    session.updatedAt = this.now();
    return session;
  }

  public remove(callId: CallId): boolean {
    const session = this.sessions.get(callId);
    if (!session) {
      return false;
    }

    this.releaseRoom(session);
    this.forgetRetiredRoom(session);
    this.clearRemovalTimer(callId);
    this.sessions.delete(callId);
    return true;
  }

  public list(): CallSession[] {
    return Array.from(this.sessions.values());
  }

  public liveSessions(): CallSession[] {
    return this.list().filter((session) => !isTerminal(session.state));
  }

  public stats(): RegistryStats {
    let live = 0;
    for (const session of this.sessions.values()) {
      if (!isTerminal(session.state)) {
        live += 1;
      }
    }
    return {
      total: this.sessions.size,
      live,
      terminal: this.sessions.size - live,
      rooms: this.rooms.size,
    };
  }

  public dispose(): void {
    for (const timer of this.removalTimers.values()) {
      clearTimeout(timer);
    }
    this.removalTimers.clear();
    this.sessions.clear();
    this.rooms.clear();
    this.retiredRooms.clear();
  }

  private releaseRoom(session: CallSession): void {
    if (session.roomName && this.rooms.get(session.roomName) === session.callId) {
      this.rooms.delete(session.roomName);
      this.retiredRooms.set(session.roomName, session.callId);
    }
  }

  private forgetRetiredRoom(session: CallSession): void {
    if (session.roomName && this.retiredRooms.get(session.roomName) === session.callId) {
      this.retiredRooms.delete(session.roomName);
    }
  }

  private scheduleRemoval(callId: CallId): void {
    this.clearRemovalTimer(callId);
    const timer = setTimeout(() => {
      this.removalTimers.delete(callId);
      const session = this.sessions.get(callId);
      if (session && isTerminal(session.state)) {
        this.forgetRetiredRoom(session);
        this.sessions.delete(callId);
        log.debug({ event: 'call_session_removed', call_id: callId, state: session.state }, 'call session removed');
      }
    }, this.graceMs);
    timer.unref?.();
    this.removalTimers.set(callId, timer);
  }

  private clearRemovalTimer(callId: CallId): void {
    const timer = this.removalTimers.get(callId);
    if (timer) {
      clearTimeout(timer);
      this.removalTimers.delete(callId);
    }
  }
}
