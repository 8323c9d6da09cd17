import { randomUUID } from 'crypto';
import { SessionError } from '../errors';
import { log } from '../log';
import type { AgentEvent } from '../calls/events';
import type { AgentHandle } from '../calls/types';
import type { AgentProfile } from '../dispatch/types';
import type { AgentRuntime } from './types';

type AgentListener = (event: AgentEvent) => void;

interface HandleEntry {
  handle: AgentHandle;
  stopRequested: boolean;
  /** Settles once the dispatch request does; never rejects. */
  dispatching: Promise<void>;
  stopping?: Promise<void>;
}

/**
 * Owns agent handles, one per room. Starting returns at once in STARTING;
 * readiness, failure and exit arrive later as events. A handle is never
 * restarted or replaced while it exists.
 */
export class AgentSupervisor {
  private readonly entries = new Map<string, HandleEntry>();
  private readonly listeners = new Set<AgentListener>();

  constructor(private readonly runtime: AgentRuntime) {}

  public onEvent(listener: AgentListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public start(roomName: string, profile: AgentProfile): AgentHandle {
    const existing = this.entries.get(roomName);
    if (existing) {
      throw new SessionError('AGENT_ALREADY_ASSIGNED', `room ${roomName} already has agent ${existing.handle.agentId}`, {
        room_name: roomName,
        agent_id: existing.handle.agentId,
      });
    }

    const handle: AgentHandle = {
      agentId: randomUUID(),
      roomName,
      profile,
      state: 'STARTING',
      startedAt: new Date(),
    };
    let settleDispatch: () => void = () => undefined;
    const entry: HandleEntry = {
      handle,
      stopRequested: false,
      dispatching: new Promise<void>((resolve) => {
        settleDispatch = resolve;
      }),
    };
    this.entries.set(roomName, entry);

    log.info(
      {
        event: 'agent_start_requested',
        room_name: roomName,
        agent_id: handle.agentId,
        agent_profile: profile.name,
        agent_name: profile.agentName,
      },
      'agent start requested',
    );

    this.runtime
      .dispatch(roomName, profile, handle.agentId)
      .then((receipt) => {
        handle.dispatchId = receipt.dispatchId;
        log.info(
          { event: 'agent_dispatched', room_name: roomName, agent_id: handle.agentId, dispatch_id: receipt.dispatchId },
          'agent dispatched',
        );
      })
      .catch((error: unknown) => {
        log.warn({ err: error, event: 'agent_dispatch_failed', room_name: roomName, agent_id: handle.agentId }, 'agent dispatch failed');
        if (this.entries.get(roomName) !== entry || handle.state !== 'STARTING' || entry.stopRequested) {
          return;
        }
        handle.state = 'FAILED';
        this.emit({
          type: 'agent.failed',
          roomName,
          agentId: handle.agentId,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(settleDispatch);

    return handle;
  }

  public get(roomName: string): AgentHandle | undefined {
    return this.entries.get(roomName)?.handle;
  }

  public list(): AgentHandle[] {
    return Array.from(this.entries.values(), (entry) => entry.handle);
  }

  /** Called by the runtime's event feed when the worker has joined its room. */
  public markReady(roomName: string): boolean {
    const entry = this.entries.get(roomName);
    if (!entry || entry.handle.state !== 'STARTING' || entry.stopRequested) {
      return false;
    }

    entry.handle.state = 'READY';
    this.emit({ type: 'agent.ready', roomName, agentId: entry.handle.agentId });
    return true;
  }

  /** Called by the runtime's event feed when the worker has left its room. */
  public markExited(roomName: string, detail?: string): boolean {
    const entry = this.entries.get(roomName);
    if (!entry) {
      return false;
    }

    const { handle } = entry;
    const previous = handle.state;
    if (previous === 'STOPPED' || previous === 'FAILED') {
      return false;
    }

    if (entry.stopRequested) {
      handle.state = 'STOPPED';
      this.emit({ type: 'agent.exited', roomName, agentId: handle.agentId, expected: true, detail });
      return true;
    }

    if (previous === 'STARTING') {
      handle.state = 'FAILED';
      this.emit({
        type: 'agent.failed',
        roomName,
        agentId: handle.agentId,
        error: detail ?? 'exited before ready',
      });
      return true;
    }

    handle.state = 'STOPPED';
    log.warn({ event: 'agent_crashed', room_name: roomName, agent_id: handle.agentId, detail }, 'agent exited unexpectedly');
    this.emit({ type: 'agent.exited', roomName, agentId: handle.agentId, expected: false, detail });
    return true;
  }

  /**
   * Releases the room's worker. A dispatch still in flight is waited for
   * first so the release carries its dispatch id. Resolves once the runtime
   * acknowledges; the handle is dropped either way. Repeated calls share one
   * release.
   */
  public stop(roomName: string): Promise<void> {
    const entry = this.entries.get(roomName);
    if (!entry) {
      return Promise.resolve();
    }
    if (entry.stopping) {
      return entry.stopping;
    }

    entry.stopRequested = true;
    const { handle } = entry;
    log.info({ event: 'agent_stop_requested', room_name: roomName, agent_id: handle.agentId }, 'agent stop requested');

    entry.stopping = entry.dispatching
      .then(() => this.runtime.release(roomName, handle.dispatchId))
      .then(() => {
        if (handle.state !== 'FAILED') {
          handle.state = 'STOPPED';
        }
        log.info({ event: 'agent_stopped', room_name: roomName, agent_id: handle.agentId }, 'agent stopped');
      })
      .finally(() => {
        if (this.entries.get(roomName) === entry) {
          this.entries.delete(roomName);
        }
      });

    return entry.stopping;
  }

  private emit(event: AgentEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.error({ err: error, event: 'agent_listener_failed', agent_event: event.type }, 'agent listener failed');
      }
    }
  }
}
