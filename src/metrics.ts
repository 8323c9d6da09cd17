import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';
import type { DispatchResult } from './calls/eventDispatcher';
import type { SessionEvent } from './calls/events';
import type { SessionRegistry } from './calls/sessionRegistry';
import { isTerminal } from './calls/stateMachine';
import type { SessionEventBus } from './observability/sessionEvents';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures seconds; the *_ms metrics here
 * are observed directly in milliseconds.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'sip_dispatch_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

const sessionTransitionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}session_transitions_total`,
  help: 'Session state transitions',
  labelNames: ['from', 'to'] as const,
  registers: [register],
});

const sessionsTerminalTotal = new client.Counter({
  name: `${METRICS_PREFIX}sessions_terminal_total`,
  help: 'Sessions that reached a terminal state, by state and reason',
  labelNames: ['state', 'reason'] as const,
  registers: [register],
});

const sessionDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}session_duration_seconds`,
  help: 'Time from invite to terminal state in seconds',
  labelNames: ['state'] as const,
  buckets: [0.1, 0.5, 1, 5, 10, 30, 60, 120, 300, 900, 1800, 3600],
  registers: [register],
});

const teardownTimeoutsTotal = new client.Counter({
  name: `${METRICS_PREFIX}teardown_timeouts_total`,
  help: 'Sessions whose teardown did not settle before the deadline, by session state',
  labelNames: ['state'] as const,
  registers: [register],
});

const droppedEventsTotal = new client.Counter({
  name: `${METRICS_PREFIX}dropped_events_total`,
  help: 'Inbound events dropped by the dispatcher',
  labelNames: ['type', 'result'] as const,
  registers: [register],
});

let liveSessionSource: (() => number) | null = null;

new client.Gauge({
  name: `${METRICS_PREFIX}live_sessions`,
  help: 'Sessions not yet in a terminal state',
  registers: [register],
  collect() {
    this.set(liveSessionSource ? liveSessionSource() : 0);
  },
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') return `${req.baseUrl}${routePath}`;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

export function incDroppedEvent(event: SessionEvent, result: DispatchResult): void {
  droppedEventsTotal.inc({ type: event.type, result });
}

/** Feeds session transitions and the live-session gauge from the runtime. */
export function bindSessionMetrics(bus: SessionEventBus, registry: SessionRegistry): () => void {
  liveSessionSource = () => registry.stats().live;

  const unsubscribe = bus.subscribe((event) => {
    sessionTransitionsTotal.inc({ from: event.from, to: event.to });
    if (!isTerminal(event.to)) {
      return;
    }

    sessionsTerminalTotal.inc({ state: event.to, reason: event.reason ?? 'none' });
    sessionDurationSeconds.observe({ state: event.to }, event.durationMs / 1000);
  });
  const unsubscribeTeardown = bus.onTeardownTimeout((event) => {
    teardownTimeoutsTotal.inc({ state: event.state });
  });

  return () => {
    unsubscribe();
    unsubscribeTeardown();
    liveSessionSource = null;
  };
}
