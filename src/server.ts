import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { InvalidRequestError, isPipelineError, RateLimitedError } from './errors';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import type { CallPipeline } from './pipeline/callPipeline';
import type { CallQueue } from './queue/callQueue';
import { createCallsRouter } from './routes/calls';
import { createHealthRouter } from './routes/health';
import { createQueueRouter } from './routes/queue';
import type { StateStore } from './store/types';

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (isPipelineError(err)) {
    if (err instanceof RateLimitedError) {
      res.status(err.status).json({ error: err.code, resetAt: err.resetAt ? err.resetAt.toISOString() : null });
      return;
    }
    if (err instanceof InvalidRequestError) {
      res.status(err.status).json({ error: err.code, message: err.message, issues: err.issues });
      return;
    }
    res.status(err.status).json({ error: err.code });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ error: 'invalid_request', message: 'malformed json body' });
    return;
  }

  log.error({ err, request_id: res.locals.requestId, path: req.path }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export interface ServerDeps {
  pipeline: CallPipeline;
  queue: CallQueue;
  store: StateStore;
}

export function buildServer(deps: ServerDeps): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(metricsMiddleware);
  app.use(express.json({ limit: '256kb' }));
  app.use(requestIdMiddleware);

  app.use('/health', createHealthRouter(deps.store));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/v1/calls', createCallsRouter(deps.pipeline));
  app.use('/v1/queue', createQueueRouter(deps.queue, deps.pipeline));

  app.use(errorHandler);

  const server = http.createServer(app);
  return { app, server };
}
