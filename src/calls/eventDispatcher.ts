import { isSessionError } from '../errors';
import { log } from '../log';
import type { SessionEvent } from './events';
import { isRoomScoped } from './events';
import type { KeyedQueue } from './keyedQueue';
import type { SessionRegistry } from './sessionRegistry';
import { isTerminal } from './stateMachine';
import type { CallId } from './types';

export type DispatchResult =
  | 'delivered'
  | 'dropped_unknown'
  | 'dropped_terminal'
  | 'dropped_duplicate'
  | 'dropped_invalid';

export interface EventDispatcherDeps {
  registry: SessionRegistry;
  queue: KeyedQueue;
  handle: (callId: CallId, event: SessionEvent) => Promise<void>;
  onDropped?: (event: SessionEvent, result: DispatchResult) => void;
}

function hasText(value: string | undefined): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * Routes inbound events to the owning session's queue. Invites create their
 * session here so that two invites for one call id can never both win.
 */
export class EventDispatcher {
  constructor(private readonly deps: EventDispatcherDeps) {}

  public dispatch(event: SessionEvent): DispatchResult {
    const callId = this.resolve(event);
    if (typeof callId !== 'string') {
      return this.drop(event, callId);
    }

    this.deps.queue.enqueue(callId, {
      name: event.type,
      run: () => this.deps.handle(callId, event),
    });
    return 'delivered';
  }

  private resolve(event: SessionEvent): CallId | Exclude<DispatchResult, 'delivered'> {
    const { registry } = this.deps;

    if (event.type === 'call.invite') {
      if (!hasText(event.callId)) {
        return 'dropped_invalid';
      }
      try {
        registry.createSession(event.callId, {
          trunkId: event.trunkId,
          callerId: event.callerId,
          calleeId: event.calleeId,
          requestId: event.requestId,
        });
      } catch (error) {
        if (isSessionError(error, 'DUPLICATE_CALL')) {
          return 'dropped_duplicate';
        }
        throw error;
      }
      return event.callId;
    }

    if (isRoomScoped(event)) {
      const session = registry.findByRoom(event.roomName);
      if (!session) {
        return 'dropped_unknown';
      }
      return isTerminal(session.state) ? 'dropped_terminal' : session.callId;
    }

    const session = registry.find(event.callId);
    if (!session) {
      return 'dropped_unknown';
    }
    return isTerminal(session.state) ? 'dropped_terminal' : session.callId;
  }

  private drop(event: SessionEvent, result: Exclude<DispatchResult, 'delivered'>): DispatchResult {
    log.info(
      {
        event: 'session_event_dropped',
        session_event: event.type,
        result,
        call_id: 'callId' in event ? event.callId : undefined,
        room_name: 'roomName' in event ? event.roomName : undefined,
      },
      'session event dropped',
    );
    this.deps.onDropped?.(event, result);
    return result;
  }
}
