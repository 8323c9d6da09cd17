import { Router } from 'express';
import type { AgentSupervisor } from '../agents/agentSupervisor';
import type { EventDispatcher } from '../calls/eventDispatcher';
import { classifyLiveKitEvent, type LiveKitWebhookEvent } from '../livekit/webhookEvents';
import { log } from '../log';

export interface LiveKitWebhookVerifier {
  receive(body: string, authHeader?: string, skipAuth?: boolean): Promise<LiveKitWebhookEvent>;
}

export interface LiveKitWebhookDeps {
  receiver: LiveKitWebhookVerifier;
  agents: AgentSupervisor;
  dispatcher: EventDispatcher;
  agentIdentityPrefix: string;
  skipSignature: boolean;
}

/**
 * LiveKit room webhooks. Agent participants joining or leaving drive the
 * supervisor; a finished room goes straight to the owning session.
 */
export function createLiveKitWebhookRouter(deps: LiveKitWebhookDeps): Router {
  const router = Router();

  router.post('/', async (req, res) => {
    const requestId = req.id;
    const rawBody = req.rawBody?.toString('utf8') ?? '';

    let event: LiveKitWebhookEvent;
    try {
      event = await deps.receiver.receive(rawBody, req.header('authorization'), deps.skipSignature);
    } catch (error) {
      log.warn({ err: error, requestId, action_taken: 'reject_invalid_signature' }, 'livekit webhook rejected');
      res.status(401).json({ error: 'invalid_signature' });
      return;
    }

    const signal = classifyLiveKitEvent(event, deps.agentIdentityPrefix);
    let actionTaken: string = signal.kind;

    switch (signal.kind) {
      case 'agent_joined':
        if (!deps.agents.markReady(signal.roomName)) {
          actionTaken = 'ignored_no_starting_agent';
        }
        break;
      case 'agent_left':
        if (!deps.agents.markExited(signal.roomName, `participant ${signal.identity} left`)) {
          actionTaken = 'ignored_no_live_agent';
        }
        break;
      case 'room_finished':
        actionTaken = `room_finished_${deps.dispatcher.dispatch({ type: 'room.finished', roomName: signal.roomName })}`;
        break;
      case 'ignored':
        actionTaken = `ignored_${signal.reason}`;
        break;
    }

    log.info(
      {
        requestId,
        event: 'livekit_webhook_ack',
        livekit_event: event.event,
        livekit_event_id: event.id,
        room_name: event.room?.name,
        identity: event.participant?.identity,
        action_taken: actionTaken,
      },
      'livekit webhook ack',
    );
    res.status(200).json({ ok: true });
  });

  return router;
}
