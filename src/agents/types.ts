import type { AgentProfile } from '../dispatch/types';

export interface AgentDispatchReceipt {
  dispatchId: string;
}

/**
 * Launches and releases agent workers. Readiness and exit are not reported
 * through this interface; the runtime's own event feed calls back into the
 * supervisor.
 */
export interface AgentRuntime {
  dispatch(roomName: string, profile: AgentProfile, agentId: string): Promise<AgentDispatchReceipt>;
  release(roomName: string, dispatchId?: string): Promise<void>;
}
