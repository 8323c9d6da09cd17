import { Router } from 'express';
import type { EventDispatcher } from '../calls/eventDispatcher';
import { log } from '../log';
import { readEventMeta, readRawEventMeta, toTrunkEvent } from '../telnyx/telnyxEvents';
import { verifyTelnyxSignature, type TelnyxVerifyOptions } from '../telnyx/telnyxVerify';

/**
 * Telnyx Call Control webhooks. The request is acknowledged as soon as the
 * event is queued on its session; nothing here waits on session work.
 */
export function createTelnyxWebhookRouter(dispatcher: EventDispatcher, verifyOptions: TelnyxVerifyOptions = {}): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const requestId = req.id;
    const rawBody = req.rawBody ?? Buffer.from('');
    const signatureEd25519 = req.header('telnyx-signature-ed25519');
    const signatureHmac = req.header('telnyx-signature');
    const signature = signatureEd25519 ?? signatureHmac ?? '';
    const timestamp = req.header('telnyx-timestamp') ?? '';
    const scheme = signatureEd25519 ? 'ed25519' : signatureHmac ? 'hmac-sha256' : undefined;

    const rawMeta = readRawEventMeta(rawBody);
    const signatureCheck = verifyTelnyxSignature({ rawBody, signature, timestamp, scheme }, verifyOptions);

    if (signatureCheck.skipped) {
      log.warn({ requestId, event_type: rawMeta.eventType }, 'telnyx signature check skipped (dev)');
    }

    if (!signatureCheck.ok) {
      log.warn(
        {
          requestId,
          event_type: rawMeta.eventType,
          call_id: rawMeta.callControlId,
          failure: signatureCheck.failure,
          action_taken: 'reject_invalid_signature',
        },
        'telnyx webhook ack',
      );
      res.status(401).json({ error: 'invalid_signature' });
      return;
    }

    const meta = readEventMeta(req.body);
    const mapping = toTrunkEvent(req.body, requestId);
    let actionTaken: string;
    switch (mapping.kind) {
      case 'event':
        actionTaken = dispatcher.dispatch(mapping.event);
        break;
      case 'ignored':
        actionTaken = `ignored_${mapping.reason}`;
        break;
      case 'invalid':
        actionTaken = `ignored_${mapping.reason}`;
        break;
    }

    log.info(
      {
        requestId,
        event_type: meta.eventType ?? rawMeta.eventType,
        call_id: meta.callControlId ?? rawMeta.callControlId,
        action_taken: actionTaken,
      },
      'telnyx webhook ack',
    );

    res.status(200).json({ ok: true });
  });

  return router;
}
