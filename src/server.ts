import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createHealthRouter } from './routes/health';
import { createLiveKitWebhookRouter, type LiveKitWebhookVerifier } from './routes/livekitWebhook';
import { createOperatorRouter } from './routes/sessions';
import { createTelnyxWebhookRouter } from './routes/telnyxWebhook';
import type { RuleSet } from './dispatch/types';
import type { DispatchRuntime } from './runtime';
import type { TelnyxVerifyOptions } from './telnyx/telnyxVerify';

export interface ServerOptions {
  runtime: DispatchRuntime;
  loadRules: () => Promise<RuleSet>;
  livekitReceiver: LiveKitWebhookVerifier;
  agentIdentityPrefix: string;
  livekitSkipSignature: boolean;
  telnyxVerify?: TelnyxVerifyOptions;
  adminToken?: string;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  req.id = requestId;
  next();
}

function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err, requestId: req.id }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function buildServer(options: ServerOptions): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(metricsMiddleware);
  app.use(
    express.json({
      // LiveKit posts webhooks as application/webhook+json
      type: ['application/json', 'application/webhook+json'],
      verify: (req: Request, _res, buf) => {
        req.rawBody = buf;
      },
    }),
  );
  app.use(requestIdMiddleware);

  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/health', createHealthRouter(options.runtime));
  app.use('/v1/telnyx/webhook', createTelnyxWebhookRouter(options.runtime.dispatcher, options.telnyxVerify));
  app.use(
    '/v1/livekit/webhook',
    createLiveKitWebhookRouter({
      receiver: options.livekitReceiver,
      agents: options.runtime.agents,
      dispatcher: options.runtime.dispatcher,
      agentIdentityPrefix: options.agentIdentityPrefix,
      skipSignature: options.livekitSkipSignature,
    }),
  );
  app.use(
    '/v1',
    createOperatorRouter({ runtime: options.runtime, loadRules: options.loadRules, adminToken: options.adminToken }),
  );

  app.use(errorHandler);

  const server = http.createServer(app);
  return { app, server };
}
