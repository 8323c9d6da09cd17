import { AgentSupervisor } from './agents/agentSupervisor';
import type { AgentRuntime } from './agents/types';
import { EventDispatcher, type DispatchResult } from './calls/eventDispatcher';
import { KeyedQueue } from './calls/keyedQueue';
import { SessionOrchestrator, type OrchestratorTimeouts } from './calls/sessionOrchestrator';
import { SessionRegistry } from './calls/sessionRegistry';
import { isTerminal } from './calls/stateMachine';
import type { CallId } from './calls/types';
import { RuleMatcher } from './dispatch/ruleMatcher';
import type { RuleSet } from './dispatch/types';
import type { CapacityGuard } from './limits/types';
import { log } from './log';
import { SessionEventBus } from './observability/sessionEvents';
import type { RoomService } from './rooms/types';
import type { TrunkControl } from './trunk/types';
import type { SessionEvent } from './calls/events';

export interface DispatchRuntimeOptions {
  ruleSet: RuleSet;
  trunk: TrunkControl;
  rooms: RoomService;
  agentRuntime: AgentRuntime;
  timeouts: OrchestratorTimeouts;
  capacity?: CapacityGuard;
  graceMs?: number;
  onDropped?: (event: SessionEvent, result: DispatchResult) => void;
}

export type StopResult = 'accepted' | 'not_found' | 'already_terminal';

export type ReloadResult = { ok: true; rules: number; source: string } | { ok: false; error: string };

/**
 * Wires the session core together. Everything that reaches a session goes
 * through `dispatcher`; the orchestrator only runs inside queue tasks.
 */
export class DispatchRuntime {
  public readonly registry: SessionRegistry;
  public readonly queue = new KeyedQueue();
  public readonly matcher: RuleMatcher;
  public readonly agents: AgentSupervisor;
  public readonly events = new SessionEventBus();
  public readonly orchestrator: SessionOrchestrator;
  public readonly dispatcher: EventDispatcher;
  private readonly detachAgents: () => void;

  constructor(options: DispatchRuntimeOptions) {
    this.registry = new SessionRegistry({ graceMs: options.graceMs });
    this.matcher = new RuleMatcher(options.ruleSet);
    this.agents = new AgentSupervisor(options.agentRuntime);

    this.orchestrator = new SessionOrchestrator({
      registry: this.registry,
      matcher: this.matcher,
      trunk: options.trunk,
      rooms: options.rooms,
      agents: this.agents,
      events: this.events,
      timeouts: options.timeouts,
      capacity: options.capacity,
      post: (event) => {
        this.dispatcher.dispatch(event);
      },
    });

    this.dispatcher = new EventDispatcher({
      registry: this.registry,
      queue: this.queue,
      handle: (callId, event) => this.orchestrator.handle(callId, event),
      onDropped: options.onDropped,
    });

    this.detachAgents = this.agents.onEvent((event) => {
      this.dispatcher.dispatch(event);
    });
  }

  public stopSession(callId: CallId, reason: 'STOPPED' | 'SHUTDOWN' = 'STOPPED'): StopResult {
    const session = this.registry.find(callId);
    if (!session) {
      return 'not_found';
    }
    if (isTerminal(session.state)) {
      return 'already_terminal';
    }
    this.dispatcher.dispatch({ type: 'session.stop', callId, reason });
    return 'accepted';
  }

  /** Asks every live session to end. Returns how many were asked. */
  public stopAll(reason: 'STOPPED' | 'SHUTDOWN'): number {
    let count = 0;
    for (const session of this.registry.liveSessions()) {
      if (this.stopSession(session.callId, reason) === 'accepted') {
        count += 1;
      }
    }
    return count;
  }

  /** Resolves true once no session is live, or false when the deadline passes first. */
  public drain(timeoutMs: number): Promise<boolean> {
    if (this.registry.stats().live === 0) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const finish = (drained: boolean): void => {
        clearTimeout(timer);
        unsubscribe();
        resolve(drained);
      };
      const timer = setTimeout(() => finish(false), timeoutMs);
      const unsubscribe = this.events.subscribe(() => {
        if (this.registry.stats().live === 0) {
          finish(true);
        }
      });
    });
  }

  /** Swaps in a new rule set; on failure the current rules stay in force. */
  public async reloadRules(load: () => Promise<RuleSet>): Promise<ReloadResult> {
    try {
      const ruleSet = await load();
      this.matcher.replace(ruleSet);
      log.info(
        { event: 'dispatch_rules_reloaded', source: ruleSet.source, rules: ruleSet.rules.length },
        'dispatch rules reloaded',
      );
      return { ok: true, rules: ruleSet.rules.length, source: ruleSet.source };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ err: error, event: 'dispatch_rules_reload_failed' }, 'dispatch rules reload failed; keeping current rules');
      return { ok: false, error: message };
    }
  }

  public dispose(): void {
    this.detachAgents();
    this.registry.dispose();
  }
}
