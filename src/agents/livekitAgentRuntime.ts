import { AgentDispatchClient } from 'livekit-server-sdk';
import { env } from '../env';
import type { AgentProfile } from '../dispatch/types';
import { isLiveKitNotFound } from '../livekit/errors';
import { log } from '../log';
import type { AgentDispatchReceipt, AgentRuntime } from './types';

/** The AgentDispatchClient calls this adapter makes. */
export interface LiveKitDispatchApi {
  createDispatch(roomName: string, agentName: string, options?: { metadata?: string }): Promise<{ id: string }>;
  deleteDispatch(dispatchId: string, roomName: string): Promise<void>;
}

/**
 * Starts agent workers through LiveKit explicit agent dispatch. The worker
 * reports readiness by joining the room, which arrives on the LiveKit webhook.
 */
export class LiveKitAgentRuntime implements AgentRuntime {
  private readonly api: LiveKitDispatchApi;

  constructor(api?: LiveKitDispatchApi) {
    this.api = api ?? new AgentDispatchClient(env.LIVEKIT_URL, env.LIVEKIT_API_KEY, env.LIVEKIT_API_SECRET);
  }

  public async dispatch(roomName: string, profile: AgentProfile, agentId: string): Promise<AgentDispatchReceipt> {
    const metadata = JSON.stringify({ ...(profile.metadata ?? {}), agent_id: agentId, agent_profile: profile.name });
    const dispatch = await this.api.createDispatch(roomName, profile.agentName, { metadata });
    log.info(
      { event: 'livekit_agent_dispatched', room_name: roomName, agent_id: agentId, dispatch_id: dispatch.id, agent_name: profile.agentName },
      'livekit agent dispatched',
    );
    return { dispatchId: dispatch.id };
  }

  public async release(roomName: string, dispatchId?: string): Promise<void> {
    if (!dispatchId) {
      return;
    }
    try {
      await this.api.deleteDispatch(dispatchId, roomName);
    } catch (error) {
      if (!isLiveKitNotFound(error)) {
        throw error;
      }
      log.debug({ event: 'livekit_dispatch_already_gone', room_name: roomName, dispatch_id: dispatchId }, 'dispatch already gone');
    }
  }
}
