import { timingSafeEqual } from 'crypto';
import { Router, type NextFunction, type Request, type Response } from 'express';
import { toSnapshot } from '../calls/types';
import { log } from '../log';
import type { DispatchRuntime } from '../runtime';
import type { RuleSet } from '../dispatch/types';

export interface OperatorRouterOptions {
  runtime: DispatchRuntime;
  loadRules: () => Promise<RuleSet>;
  adminToken?: string;
}

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

function requireAdmin(adminToken: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!adminToken) {
      next();
      return;
    }
    const header = req.header('authorization') ?? '';
    const provided = header.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';
    if (!provided || !tokensMatch(adminToken, provided)) {
      log.warn({ requestId: req.id, event: 'operator_unauthorized', path: req.path }, 'operator request unauthorized');
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    next();
  };
}

/** Operator endpoints: session inspection, manual stop and rule reload. */
export function createOperatorRouter({ runtime, loadRules, adminToken }: OperatorRouterOptions): Router {
  const router = Router();
  // Guarded per route so unmatched paths under the mount still fall through to 404.
  const admin = requireAdmin(adminToken);

  router.get('/sessions', admin, (_req, res) => {
    res.status(200).json({ sessions: runtime.registry.list().map(toSnapshot) });
  });

  router.get('/sessions/:callId', admin, (req, res) => {
    const session = runtime.registry.find(req.params.callId);
    if (!session) {
      res.status(404).json({ error: 'not_found' });
      return;
    }
    res.status(200).json(toSnapshot(session));
  });

  router.post('/sessions/:callId/stop', admin, (req, res) => {
    const result = runtime.stopSession(req.params.callId);
    log.info(
      { requestId: req.id, event: 'operator_stop', call_id: req.params.callId, result },
      'operator stop requested',
    );
    switch (result) {
      case 'accepted':
        res.status(202).json({ ok: true });
        return;
      case 'not_found':
        res.status(404).json({ error: 'not_found' });
        return;
      case 'already_terminal':
        res.status(409).json({ error: 'already_terminal' });
        return;
    }
  });

  router.post('/rules/reload', admin, async (_req, res) => {
    const result = await runtime.reloadRules(loadRules);
    if (result.ok) {
      res.status(200).json({ ok: true, rules: result.rules, source: result.source });
      return;
    }
    res.status(422).json({ ok: false, error: result.error });
  });

  return router;
}
