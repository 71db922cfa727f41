import { Request, Router } from 'express';
import { z } from 'zod';
import { TerminationReasonSchema } from '../conversation/types';
import { InvalidRequestError } from '../errors';
import type { CallPipeline } from '../pipeline/callPipeline';
import { handle, parseBody, phoneNumberSchema } from './validation';

const CALL_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

const InitiateCallBodySchema = z.object({
  phoneNumber: phoneNumberSchema,
  destinationUrl: z.string().url().optional(),
  metadata: z.record(z.string().max(500)).optional(),
  callId: z.string().regex(CALL_ID_PATTERN).optional(),
});

const TurnBodySchema = z.object({
  utterance: z.string().max(4000),
});

const HangupBodySchema = z.object({
  reason: TerminationReasonSchema.optional(),
});

const FailBodySchema = z.object({
  reason: z.string().trim().min(1).max(200),
});

function callIdParam(req: Request): string {
  const callId = req.params.callId;
  if (!CALL_ID_PATTERN.test(callId)) {
    throw new InvalidRequestError('invalid call id', [{ path: 'callId', message: 'Invalid' }]);
  }
  return callId;
}

export function createCallsRouter(pipeline: CallPipeline): Router {
  const router = Router();

  router.post(
    '/',
    handle(async (req, res) => {
      const body = parseBody(InitiateCallBodySchema, req.body);
      const session = await pipeline.initiateCall(body);
      res.status(201).json({
        callId: session.callId,
        status: session.status,
        createdAt: session.createdAt,
      });
    }),
  );

  router.get(
    '/:callId',
    handle(async (req, res) => {
      const session = await pipeline.getCall(callIdParam(req));
      res.status(200).json(session);
    }),
  );

  router.post(
    '/:callId/open',
    handle(async (req, res) => {
      res.status(200).json(await pipeline.openCall(callIdParam(req)));
    }),
  );

  router.post(
    '/:callId/turns',
    handle(async (req, res) => {
      const callId = callIdParam(req);
      const body = parseBody(TurnBodySchema, req.body);
      res.status(200).json(await pipeline.handleTurn(callId, body.utterance));
    }),
  );

  router.post(
    '/:callId/hangup',
    handle(async (req, res) => {
      const callId = callIdParam(req);
      const body = parseBody(HangupBodySchema, req.body);
      const session = await pipeline.completeCall(callId, body.reason ?? 'hangup');
      res.status(200).json({
        callId: session.callId,
        status: session.status,
        completedAt: session.completedAt ?? null,
        deliveryEventId: session.deliveryEventId ?? null,
      });
    }),
  );

  router.post(
    '/:callId/fail',
    handle(async (req, res) => {
      const callId = callIdParam(req);
      const body = parseBody(FailBodySchema, req.body);
      const session = await pipeline.failCall(callId, body.reason);
      res.status(200).json({ callId: session.callId, status: session.status });
    }),
  );

  return router;
}
