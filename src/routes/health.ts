import { Router } from 'express';
import type { DispatchRuntime } from '../runtime';

export function createHealthRouter(runtime: DispatchRuntime): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const ruleSet = runtime.matcher.current();
    res.status(200).json({
      status: 'ok',
      sessions: runtime.registry.stats(),
      rules: { source: ruleSet.source, count: ruleSet.rules.length, loaded_at: ruleSet.loadedAt.toISOString() },
    });
  });

  return router;
}
