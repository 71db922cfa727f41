import { Router } from 'express';
import { z } from 'zod';
import type { CallPipeline } from '../pipeline/callPipeline';
import type { CallQueue } from '../queue/callQueue';
import type { QueuedCall } from '../queue/types';
import { handle, parseBody, phoneNumberSchema } from './validation';

const QueueCallBodySchema = z.object({
  phoneNumber: phoneNumberSchema,
  destinationUrl: z.string().url().optional(),
  metadata: z.record(z.string().max(500)).optional(),
  priority: z.number().int().min(0).max(100).optional(),
  scheduledAt: z.coerce.date().optional(),
});

const BatchBodySchema = z.object({
  calls: z.array(QueueCallBodySchema).min(1).max(500),
});

const LimitSchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).default(100),
});

// The number is kept for dialing; responses carry only its last four digits.
function publicItem(item: QueuedCall) {
  const { phoneNumber, ...rest } = item;
  return { ...rest, phoneLast4: phoneNumber.replace(/\D/g, '').slice(-4) };
}

export function createQueueRouter(queue: CallQueue, pipeline: CallPipeline): Router {
  const router = Router();

  router.post(
    '/',
    handle(async (req, res) => {
      const body = parseBody(BatchBodySchema, req.body);
      res.status(202).json(await queue.enqueueBatch(body.calls));
    }),
  );

  router.get(
    '/stats',
    handle(async (_req, res) => {
      res.status(200).json(await queue.stats());
    }),
  );

  router.post(
    '/next',
    handle(async (_req, res) => {
      const result = await pipeline.dialNext();
      if (!result) {
        res.status(204).end();
        return;
      }
      if (result.status === 'rejected') {
        res.status(200).json(result);
        return;
      }
      res.status(201).json({
        status: result.status,
        queueId: result.queueId,
        phoneNumber: result.phoneNumber,
        callId: result.session.callId,
        callStatus: result.session.status,
      });
    }),
  );

  router.get(
    '/failed',
    handle(async (req, res) => {
      const { limit } = parseBody(LimitSchema, req.query);
      const items = await queue.listFailed(limit);
      res.status(200).json({ calls: items.map(publicItem) });
    }),
  );

  router.post(
    '/failed/retry',
    handle(async (req, res) => {
      const { limit } = parseBody(LimitSchema, req.body);
      res.status(200).json({ retried: await queue.retryFailed(limit) });
    }),
  );

  return router;
}
