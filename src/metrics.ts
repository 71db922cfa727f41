import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Pipeline Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures SECONDS; the *_ms metrics
 * here are observed in milliseconds from process.hrtime.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'call_pipeline_';

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

// Turn stages (classify/llm/persist)
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Stage duration in milliseconds',
  labelNames: ['stage'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const callsStartedTotal = new client.Counter({
  name: `${METRICS_PREFIX}calls_started_total`,
  help: 'Calls accepted for initiation',
  registers: [register],
});

const callsRateLimitedTotal = new client.Counter({
  name: `${METRICS_PREFIX}calls_rate_limited_total`,
  help: 'Call initiations rejected by the per-caller rate limit',
  registers: [register],
});

const callsCompletedTotal = new client.Counter({
  name: `${METRICS_PREFIX}calls_completed_total`,
  help: 'Calls completed, by termination reason and adversarial level',
  labelNames: ['reason', 'adversarial_level'] as const,
  registers: [register],
});

const callsFailedTotal = new client.Counter({
  name: `${METRICS_PREFIX}calls_failed_total`,
  help: 'Calls that ended in failure',
  labelNames: ['reason'] as const,
  registers: [register],
});

const turnsTotal = new client.Counter({
  name: `${METRICS_PREFIX}turns_total`,
  help: 'Conversation turns processed, by reply source',
  labelNames: ['source'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  buckets: [30, 60, 120, 300, 600, 900, 1800],
  registers: [register],
});

const callTurns = new client.Histogram({
  name: `${METRICS_PREFIX}call_turns`,
  help: 'Number of turns per call',
  buckets: [1, 2, 5, 10, 20, 30, 40],
  registers: [register],
});

const webhookDeliveriesTotal = new client.Counter({
  name: `${METRICS_PREFIX}webhook_deliveries_total`,
  help: 'Webhook delivery attempts by outcome',
  labelNames: ['outcome'] as const,
  registers: [register],
});

const webhookDeliveryDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}webhook_delivery_duration_ms`,
  help: 'Webhook delivery latency in milliseconds',
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
  registers: [register],
});

const outboxPending = new client.Gauge({
  name: `${METRICS_PREFIX}outbox_pending`,
  help: 'Entries waiting for delivery',
  registers: [register],
});

const outboxDeadLetters = new client.Gauge({
  name: `${METRICS_PREFIX}outbox_dead_letters`,
  help: 'Entries that exhausted their retries',
  registers: [register],
});

const queueDialsTotal = new client.Counter({
  name: `${METRICS_PREFIX}queue_dials_total`,
  help: 'Calls taken from the call queue, by outcome',
  labelNames: ['outcome'] as const,
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath =
    typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string'
      ? route.path
      : undefined;

  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

// ---------- exports used by server ----------

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

// ---------- stage timing API ----------

/**
 * Starts a stage timer and returns an end() function.
 */
export function startStageTimer(stage: string): () => void {
  const start = nowNs();
  return () => {
    stageDurationMs.observe({ stage }, nsToMs(nowNs() - start));
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

// ---------- call lifecycle ----------

export function recordCallStarted(): void {
  callsStartedTotal.inc();
}

export function recordCallRateLimited(): void {
  callsRateLimitedTotal.inc();
}

export function recordTurn(source: string): void {
  turnsTotal.inc({ source });
}

export function recordCallCompleted(opts: {
  reason: string;
  adversarialLevel: string;
  durationMs: number | null;
  turns: number;
}): void {
  callsCompletedTotal.inc({ reason: opts.reason, adversarial_level: opts.adversarialLevel });
  if (opts.durationMs !== null && opts.durationMs >= 0) {
    callDurationSeconds.observe(opts.durationMs / 1000);
  }
  callTurns.observe(opts.turns);
}

export function recordCallFailed(reason: string): void {
  const label = reason.trim() !== '' ? reason : 'unknown';
  callsFailedTotal.inc({ reason: label });
}

// ---------- delivery ----------

export type DeliveryOutcome = 'delivered' | 'retry_scheduled' | 'dead_lettered' | 'error';

export function recordDelivery(outcome: DeliveryOutcome, durationMs?: number): void {
  webhookDeliveriesTotal.inc({ outcome });
  if (durationMs !== undefined) {
    webhookDeliveryDurationMs.observe(durationMs);
  }
}

export function setOutboxGauges(stats: { pending: number; dead: number }): void {
  outboxPending.set(stats.pending);
  outboxDeadLetters.set(stats.dead);
}

// ---------- call queue ----------

export function recordQueueDial(outcome: 'dialed' | 'rejected'): void {
  queueDialsTotal.inc({ outcome });
}
