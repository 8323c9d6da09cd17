import type { AgentSupervisor } from '../agents/agentSupervisor';
import type { RuleMatcher } from '../dispatch/ruleMatcher';
import type { AcceptRule, AgentProfile } from '../dispatch/types';
import { isSessionError } from '../errors';
import type { CapacityGuard, CapacityRequest } from '../limits/types';
import { log } from '../log';
import type { SessionEventBus } from '../observability/sessionEvents';
import type { RoomMetadata, RoomService } from '../rooms/types';
import type { TrunkControl } from '../trunk/types';
import { withDeadline } from './deadline';
import type { AgentEvent, CapacityOutcome, SessionEvent, TimedPhase } from './events';
import type { SessionRegistry } from './sessionRegistry';
import { isTerminal } from './stateMachine';
import type { CallId, CallSession, CallSessionState, TerminationReason } from './types';

export interface OrchestratorTimeouts {
  roomCreateMs: number;
  agentStartMs: number;
  teardownMs: number;
  capacityMs: number;
  maxSessionMs?: number;
}

export interface SessionOrchestratorDeps {
  registry: SessionRegistry;
  matcher: RuleMatcher;
  trunk: TrunkControl;
  rooms: RoomService;
  agents: AgentSupervisor;
  events: SessionEventBus;
  timeouts: OrchestratorTimeouts;
  capacity?: CapacityGuard;
  /** Delivers an event back onto the owning session's queue. */
  post: (event: SessionEvent) => void;
}

/**
 * One capacity request. Whichever of "acquired" and "abandoned" happens
 * second issues the release, so a slot granted after the session gave up
 * waiting is still returned.
 */
interface CapacityAttempt {
  request: CapacityRequest;
  acquired: boolean;
  abandoned: boolean;
  released: boolean;
}

interface AcceptedCall {
  roomName: string;
  rule: AcceptRule;
  profile: AgentProfile;
}

/** Per-call bookkeeping that never leaves the orchestrator. */
interface SessionRuntime {
  token: number;
  timer?: NodeJS.Timeout;
  accepted?: AcceptedCall;
  capacity?: CapacityAttempt;
  roomRequested: boolean;
  roomClosedRemotely: boolean;
  trunkEnded: boolean;
  rejectIssued: boolean;
  hangupIssued: boolean;
  agentStopIssued: boolean;
  roomCloseIssued: boolean;
}

const ENDABLE: readonly CallSessionState[] = ['ROOM_PENDING', 'AGENT_STARTING', 'ACTIVE'];

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drives each call from invite to a terminal state. Every method runs inside
 * the call's queue task; collaborator commands are started but never awaited
 * here, and their outcomes come back as events through `post`.
 */
export class SessionOrchestrator {
  private readonly runtimes = new Map<CallId, SessionRuntime>();

  constructor(private readonly deps: SessionOrchestratorDeps) {}

  public async handle(callId: CallId, event: SessionEvent): Promise<void> {
    const session = this.deps.registry.find(callId);
    if (!session) {
      log.warn({ event: 'session_event_orphaned', call_id: callId, session_event: event.type }, 'event for missing session');
      return;
    }

    if (isTerminal(session.state)) {
      log.debug(
        { event: 'session_event_dropped_terminal', call_id: callId, session_event: event.type, state: session.state },
        'event for terminal session dropped',
      );
      return;
    }

    try {
      await this.apply(session, event);
    } catch (error) {
      log.error(
        { err: error, event: 'session_event_failed', call_id: callId, session_event: event.type, state: session.state },
        'session event handling failed',
      );
      this.fail(session, 'INTERNAL_ERROR', errorMessage(error));
    }
  }

  public liveCount(): number {
    return this.deps.registry.stats().live;
  }

  private async apply(session: CallSession, event: SessionEvent): Promise<void> {
    switch (event.type) {
      case 'call.invite':
        if (session.state !== 'ARRIVED') {
          log.info({ event: 'call_invite_duplicate', call_id: session.callId, state: session.state }, 'duplicate invite ignored');
          return;
        }
        this.onInvite(session);
        return;

      case 'call.answered':
        if (!session.answered) {
          this.deps.registry.update(session.callId, { answered: true });
        }
        return;

      case 'call.hangup': {
        const runtime = this.runtime(session.callId);
        runtime.trunkEnded = true;
        if (session.state === 'ARRIVED' || session.state === 'MATCHING') {
          this.reject(session, 'CALLER_HANGUP', 'CALLER_HANGUP');
          return;
        }
        if (ENDABLE.includes(session.state)) {
          this.beginEnding(session, 'CALLER_HANGUP', event.reasonCode);
        }
        return;
      }

      case 'room.created':
        if (session.state === 'ROOM_PENDING' && event.roomName === session.roomName) {
          this.onRoomCreated(session);
        }
        return;

      case 'room.create_failed':
        if (session.state === 'ROOM_PENDING' && event.roomName === session.roomName) {
          this.fail(session, 'ROOM_CREATE_TIMEOUT', event.error);
        }
        return;

      case 'room.finished':
        if (event.roomName !== session.roomName) {
          return;
        }
        this.runtime(session.callId).roomClosedRemotely = true;
        if (session.state === 'AGENT_STARTING' || session.state === 'ACTIVE') {
          this.beginEnding(session, 'ROOM_CLOSED');
        }
        return;

      case 'agent.ready':
      case 'agent.failed':
      case 'agent.exited':
        this.onAgentEvent(session, event);
        return;

      case 'session.stop':
        if (session.state === 'ARRIVED' || session.state === 'MATCHING') {
          this.reject(session, event.reason, event.reason);
          return;
        }
        if (ENDABLE.includes(session.state)) {
          this.beginEnding(session, event.reason);
        }
        return;

      case 'capacity.settled':
        if (session.state === 'MATCHING' && event.token === this.runtime(session.callId).token) {
          this.onCapacitySettled(session, event.outcome);
        }
        return;

      case 'timer.expired':
        this.onTimer(session, event.phase, event.token);
        return;

      case 'teardown.settled':
        if (session.state === 'ENDING' && event.token === this.runtime(session.callId).token) {
          this.finishEnding(session, false);
        }
        return;
    }
  }

  private onInvite(session: CallSession): void {
    this.move(session, 'MATCHING');

    const outcome = this.deps.matcher.match({
      callId: session.callId,
      trunkId: session.trunkId,
      callerId: session.callerId,
      calleeId: session.calleeId,
    });

    if (outcome.action === 'REJECT') {
      log.info(
        {
          event: 'call_rejected_by_rules',
          call_id: session.callId,
          reason: outcome.reason,
          rule_id: outcome.rule?.id,
          requestId: session.requestId,
        },
        'call rejected by dispatch rules',
      );
      this.reject(session, outcome.reason, outcome.rejectCode);
      return;
    }

    this.deps.registry.update(session.callId, { rule: outcome.rule, profile: outcome.profile });
    const runtime = this.runtime(session.callId);
    runtime.accepted = { roomName: outcome.roomName, rule: outcome.rule, profile: outcome.profile };

    const { capacity } = this.deps;
    if (!capacity) {
      this.admit(session);
      return;
    }

    const attempt: CapacityAttempt = {
      request: { trunkId: session.trunkId, callId: session.callId, requestId: session.requestId },
      acquired: false,
      abandoned: false,
      released: false,
    };
    runtime.capacity = attempt;
    const token = this.armTimer(session, 'MATCHING', this.deps.timeouts.capacityMs);
    const callId = session.callId;

    capacity.tryAcquire(attempt.request).then(
      (result) => {
        if (!result.ok) {
          this.deps.post({ type: 'capacity.settled', callId, token, outcome: { kind: 'denied', reason: result.reason } });
          return;
        }
        attempt.acquired = true;
        if (attempt.abandoned) {
          log.info({ event: 'capacity_late_grant_released', call_id: callId }, 'capacity granted after the call gave up');
          this.releaseCapacity(attempt);
          return;
        }
        this.deps.post({ type: 'capacity.settled', callId, token, outcome: { kind: 'acquired' } });
      },
      (error: unknown) => {
        log.error({ err: error, event: 'capacity_check_failed', call_id: callId }, 'capacity check failed');
        this.deps.post({ type: 'capacity.settled', callId, token, outcome: { kind: 'unavailable', error: errorMessage(error) } });
      },
    );
  }

  private onCapacitySettled(session: CallSession, outcome: CapacityOutcome): void {
    this.clearTimer(session.callId);
    switch (outcome.kind) {
      case 'acquired':
        this.admit(session);
        return;
      case 'denied':
        log.warn({ event: 'call_at_capacity', call_id: session.callId, reason: outcome.reason }, 'call denied by capacity');
        this.reject(session, 'AT_CAPACITY', 'AT_CAPACITY');
        return;
      case 'unavailable':
        this.reject(session, 'CAPACITY_UNAVAILABLE', 'CAPACITY_UNAVAILABLE');
        return;
    }
  }

  /** Binds the room, answers the trunk and requests the room. */
  private admit(session: CallSession): void {
    const runtime = this.runtime(session.callId);
    const accepted = runtime.accepted;
    if (!accepted) {
      throw new Error(`session ${session.callId} admitted without a dispatch outcome`);
    }
    const { roomName, rule, profile } = accepted;

    try {
      this.deps.registry.bindRoom(session.callId, roomName);
    } catch (error) {
      if (isSessionError(error, 'ROOM_CONFLICT')) {
        log.warn({ event: 'room_conflict', call_id: session.callId, room_name: roomName, ...error.details }, 'room conflict');
        this.reject(session, 'ROOM_CONFLICT', 'ROOM_CONFLICT');
        return;
      }
      throw error;
    }

    this.move(session, 'ROOM_PENDING');

    this.deps.trunk.answer(session.callId).catch((error: unknown) => {
      log.warn({ err: error, event: 'trunk_answer_failed', call_id: session.callId }, 'trunk answer failed');
    });

    const metadata: RoomMetadata = {
      ...(rule.roomMetadata ?? {}),
      call_id: session.callId,
      trunk_id: session.trunkId,
      caller_id: session.callerId,
      callee_id: session.calleeId,
      rule_id: rule.id,
      agent_profile: profile.name,
    };

    runtime.roomRequested = true;
    this.armTimer(session, 'ROOM_PENDING', this.deps.timeouts.roomCreateMs);
    const callId = session.callId;
    this.deps.rooms.createRoom(roomName, metadata).then(
      () => {
        // Teardown already ran against a room that did not exist yet.
        if (runtime.roomCloseIssued) {
          log.info({ event: 'room_closed_after_late_create', call_id: callId, room_name: roomName }, 'closing room created after teardown');
          this.deps.rooms.closeRoom(roomName).catch((error: unknown) => {
            log.warn({ err: error, event: 'room_close_failed', call_id: callId, room_name: roomName }, 'room close failed');
          });
          return;
        }
        this.deps.post({ type: 'room.created', roomName });
      },
      (error: unknown) => {
        log.warn({ err: error, event: 'room_create_failed', call_id: callId, room_name: roomName }, 'room create failed');
        this.deps.post({ type: 'room.create_failed', roomName, error: errorMessage(error) });
      },
    );
  }

  private onRoomCreated(session: CallSession): void {
    const { roomName, profile } = session;
    if (!roomName || !profile) {
      throw new Error(`session ${session.callId} reached room ack without room or profile`);
    }

    this.move(session, 'AGENT_STARTING');
    this.armTimer(session, 'AGENT_STARTING', this.deps.timeouts.agentStartMs);

    const handle = this.deps.agents.start(roomName, profile);
    this.deps.registry.update(session.callId, { agentId: handle.agentId });
  }

  private onAgentEvent(session: CallSession, event: AgentEvent): void {
    if (event.roomName !== session.roomName || event.agentId !== session.agentId) {
      log.debug(
        { event: 'agent_event_stale', call_id: session.callId, room_name: event.roomName, agent_id: event.agentId },
        'stale agent event ignored',
      );
      return;
    }

    switch (event.type) {
      case 'agent.ready':
        if (session.state === 'AGENT_STARTING') {
          this.move(session, 'ACTIVE');
          const { maxSessionMs } = this.deps.timeouts;
          if (maxSessionMs) {
            this.armTimer(session, 'ACTIVE', maxSessionMs);
          } else {
            this.clearTimer(session.callId);
          }
        }
        return;

      case 'agent.failed':
        if (session.state === 'AGENT_STARTING') {
          this.fail(session, 'AGENT_START_FAILURE', event.error);
        } else if (session.state === 'ACTIVE') {
          this.beginEnding(session, 'AGENT_CRASH', event.error);
        }
        return;

      case 'agent.exited':
        if (event.expected) {
          return;
        }
        if (session.state === 'AGENT_STARTING') {
          this.fail(session, 'AGENT_START_FAILURE', event.detail ?? 'agent exited before ready');
        } else if (session.state === 'ACTIVE') {
          this.beginEnding(session, 'AGENT_CRASH', event.detail);
        }
        return;
    }
  }

  private onTimer(session: CallSession, phase: TimedPhase, token: number): void {
    const runtime = this.runtime(session.callId);
    if (token !== runtime.token || phase !== session.state) {
      return;
    }

    switch (phase) {
      case 'MATCHING':
        log.warn({ event: 'capacity_check_timeout', call_id: session.callId }, 'capacity check did not answer in time');
        this.reject(session, 'CAPACITY_UNAVAILABLE', 'CAPACITY_UNAVAILABLE');
        return;
      case 'ROOM_PENDING':
        this.fail(session, 'ROOM_CREATE_TIMEOUT', `no room ack within ${this.deps.timeouts.roomCreateMs}ms`);
        return;
      case 'AGENT_STARTING':
        this.fail(session, 'AGENT_START_FAILURE', `agent not ready within ${this.deps.timeouts.agentStartMs}ms`);
        return;
      case 'ACTIVE':
        this.beginEnding(session, 'MAX_DURATION');
        return;
      case 'ENDING':
        this.finishEnding(session, true);
        return;
    }
  }

  private reject(session: CallSession, reason: TerminationReason, trunkCode: string): void {
    const runtime = this.runtime(session.callId);
    this.move(session, 'REJECTED', reason);

    if (!runtime.trunkEnded && !runtime.rejectIssued) {
      runtime.rejectIssued = true;
      this.deps.trunk.reject(session.callId, trunkCode).catch((error: unknown) => {
        log.warn({ err: error, event: 'trunk_reject_failed', call_id: session.callId }, 'trunk reject failed');
      });
    }

    this.finalize(session);
  }

  private beginEnding(session: CallSession, reason: TerminationReason, detail?: string): void {
    this.move(session, 'ENDING', reason, detail);
    const token = this.armTimer(session, 'ENDING', this.deps.timeouts.teardownMs);

    void this.teardown(session).then(() => {
      this.deps.post({ type: 'teardown.settled', callId: session.callId, token });
    });
  }

  private finishEnding(session: CallSession, timedOut: boolean): void {
    this.clearTimer(session.callId);
    this.move(session, 'ENDED', undefined, timedOut ? 'TEARDOWN_TIMEOUT' : undefined);
    if (timedOut) {
      this.markTeardownTimedOut(session);
    }
    this.finalize(session);
  }

  /**
   * Moves a live session to FAILED and releases whatever it holds. Teardown
   * runs in the background; the session is already terminal.
   */
  private fail(session: CallSession, reason: TerminationReason, detail?: string): void {
    if (isTerminal(session.state)) {
      return;
    }

    try {
      this.move(session, 'FAILED', reason, detail);
    } catch (error) {
      log.error({ err: error, event: 'session_fail_transition_failed', call_id: session.callId }, 'cannot mark session failed');
      return;
    }

    const { teardownMs } = this.deps.timeouts;
    void withDeadline(this.teardown(session), teardownMs, 'teardown').catch(() => {
      this.markTeardownTimedOut(session);
    });
    this.finalize(session);
  }

  private markTeardownTimedOut(session: CallSession): void {
    // A FAILED session may already have been evicted by the time its teardown expires.
    if (this.deps.registry.find(session.callId)) {
      this.deps.registry.update(session.callId, { teardownTimedOut: true });
    }
    log.warn(
      { event: 'teardown_timeout', call_id: session.callId, room_name: session.roomName, state: session.state },
      'teardown did not finish in time',
    );
    this.deps.events.publishTeardownTimeout({
      callId: session.callId,
      trunkId: session.trunkId,
      roomName: session.roomName,
      state: session.state,
      reason: session.terminationReason,
      at: new Date(),
    });
  }

  /** Issues each cleanup command at most once per session; never rejects. */
  private async teardown(session: CallSession): Promise<void> {
    const runtime = this.runtime(session.callId);
    const { roomName, callId } = session;
    const reasonCode = session.terminationReason ?? 'INTERNAL_ERROR';
    const tasks: Array<{ name: string; promise: Promise<void> }> = [];

    if (roomName && session.agentId && !runtime.agentStopIssued) {
      runtime.agentStopIssued = true;
      tasks.push({ name: 'agent_stop', promise: this.deps.agents.stop(roomName) });
    }
    if (roomName && runtime.roomRequested && !runtime.roomCloseIssued && !runtime.roomClosedRemotely) {
      runtime.roomCloseIssued = true;
      tasks.push({ name: 'room_close', promise: this.deps.rooms.closeRoom(roomName) });
    }
    if (!runtime.trunkEnded && !runtime.hangupIssued && !runtime.rejectIssued) {
      runtime.hangupIssued = true;
      tasks.push({ name: 'trunk_hangup', promise: this.deps.trunk.hangup(callId, reasonCode) });
    }

    const results = await Promise.allSettled(tasks.map((task) => task.promise));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        log.warn(
          { err: result.reason, event: 'teardown_command_failed', command: tasks[index].name, call_id: callId, room_name: roomName },
          'teardown command failed',
        );
      }
    });
  }

  private finalize(session: CallSession): void {
    const runtime = this.runtimes.get(session.callId);
    if (!runtime) {
      return;
    }

    this.clearTimer(session.callId);
    const attempt = runtime.capacity;
    if (attempt) {
      attempt.abandoned = true;
      if (attempt.acquired) {
        this.releaseCapacity(attempt);
      }
    }
    this.runtimes.delete(session.callId);
  }

  private releaseCapacity(attempt: CapacityAttempt): void {
    const { capacity } = this.deps;
    if (!capacity || attempt.released) {
      return;
    }
    attempt.released = true;
    capacity.release(attempt.request).catch((error: unknown) => {
      log.warn({ err: error, event: 'capacity_release_failed', call_id: attempt.request.callId }, 'capacity release failed');
    });
  }

  private move(session: CallSession, next: CallSessionState, reason?: TerminationReason, detail?: string): void {
    const from = session.state;
    this.deps.registry.transition(session.callId, next, reason);
    const now = new Date();
    this.deps.events.publish({
      callId: session.callId,
      trunkId: session.trunkId,
      roomName: session.roomName,
      from,
      to: next,
      reason: isTerminal(next) || next === 'ENDING' ? session.terminationReason : null,
      detail,
      at: now,
      durationMs: now.getTime() - session.createdAt.getTime(),
    });
  }

  private armTimer(session: CallSession, phase: TimedPhase, ms: number): number {
    const runtime = this.runtime(session.callId);
    this.clearTimer(session.callId);
    runtime.token += 1;
    const token = runtime.token;
    const callId = session.callId;

    runtime.timer = setTimeout(() => {
      runtime.timer = undefined;
      this.deps.post({ type: 'timer.expired', callId, phase, token });
    }, ms);
    runtime.timer.unref?.();
    return token;
  }

  private clearTimer(callId: CallId): void {
    const runtime = this.runtimes.get(callId);
    if (runtime?.timer) {
      clearTimeout(runtime.timer);
      runtime.timer = undefined;
    }
  }

  private runtime(callId: CallId): SessionRuntime {
    let runtime = this.runtimes.get(callId);
    if (!runtime) {
      runtime = {
        token: 0,
        roomRequested: false,
        roomClosedRemotely: false,
        trunkEnded: false,
        rejectIssued: false,
        hangupIssued: false,
        agentStopIssued: false,
        roomCloseIssued: false,
      };
      this.runtimes.set(callId, runtime);
    }
    return runtime;
  }
}
