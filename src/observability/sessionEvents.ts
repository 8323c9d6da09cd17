import { log } from '../log';
import type { CallId, CallSessionState, TerminationReason } from '../calls/types';

export interface SessionTransitionEvent {
  callId: CallId;
  trunkId: string;
  roomName: string | null;
  from: CallSessionState;
  to: CallSessionState;
  reason: TerminationReason | null;
  detail?: string;
  at: Date;
  durationMs: number;
}

/** Teardown commands for a terminal (or ending) session did not settle in time. */
export interface TeardownTimeoutEvent {
  callId: CallId;
  trunkId: string;
  roomName: string | null;
  state: CallSessionState;
  reason: TerminationReason | null;
  at: Date;
}

type TransitionListener = (event: SessionTransitionEvent) => void;
type TeardownTimeoutListener = (event: TeardownTimeoutEvent) => void;

export class SessionEventBus {
  private readonly listeners = new Set<TransitionListener>();
  private readonly teardownListeners = new Set<TeardownTimeoutListener>();

  public subscribe(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public onTeardownTimeout(listener: TeardownTimeoutListener): () => void {
    this.teardownListeners.add(listener);
    return () => {
      this.teardownListeners.delete(listener);
    };
  }

  public publish(event: SessionTransitionEvent): void {
    log.info(
      {
        event: 'session_transition',
        call_id: event.callId,
        trunk_id: event.trunkId,
        room_name: event.roomName,
        from: event.from,
        to: event.to,
        reason: event.reason,
        detail: event.detail,
        duration_ms: event.durationMs,
      },
      'session transition',
    );

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.error({ err: error, call_id: event.callId, event: 'session_listener_failed' }, 'session listener failed');
      }
    }
  }

  public publishTeardownTimeout(event: TeardownTimeoutEvent): void {
    for (const listener of this.teardownListeners) {
      try {
        listener(event);
      } catch (error) {
        log.error({ err: error, call_id: event.callId, event: 'teardown_listener_failed' }, 'teardown listener failed');
      }
    }
  }
}
