import { randomUUID } from 'node:crypto';
import { hashCallerIdentity } from '../calls/identity';
import type { SessionStore } from '../calls/sessionStore';
import type { CallSession } from '../calls/types';
import { adversarialLevel } from '../conversation/conversationEngine';
import type { ConversationEngine, TurnOutcome } from '../conversation/conversationEngine';
import { closingPrompt, FALLBACK_PROMPT, FINISHED_PROMPT, GREETING_PROMPT } from '../conversation/prompts';
import type { ConversationStage, TerminationReason } from '../conversation/types';
import {
  CallExistsError,
  InvalidRequestError,
  isPipelineError,
  RateLimitedError,
  SessionNotFoundError,
} from '../errors';
import type { RateLimiter } from '../limits/rateLimiter';
import { log } from '../log';
import {
  incStageError,
  recordCallCompleted,
  recordCallFailed,
  recordCallRateLimited,
  recordCallStarted,
  recordQueueDial,
  recordTurn,
} from '../metrics';
import { logCallEvent } from '../observability/callLogs';
import type { DeliveryOutbox } from '../outbox/outbox';
import type { CallQueue } from '../queue/callQueue';
import type { Clock } from '../store/types';
import { systemClock } from '../store/types';
import { DEFAULT_SEVERITY_THRESHOLDS } from '../timeline/timelineAnalyzer';
import type { SeverityThresholds } from '../timeline/types';
import { buildProfilePayload } from './profile';

export interface InitiateCallRequest {
  phoneNumber: string;
  destinationUrl?: string;
  metadata?: Record<string, string>;
  callId?: string;
  queueId?: string;
}

export interface TurnResponse {
  prompt: string;
  continueCall: boolean;
  stage: ConversationStage;
}

export type DialResult =
  | { status: 'dialed'; queueId: string; phoneNumber: string; session: CallSession }
  | { status: 'rejected'; queueId: string; reason: string; queueStatus: 'pending' | 'failed' };

export interface CallPipelineOptions {
  sessions: SessionStore;
  rateLimiter: RateLimiter;
  engine: ConversationEngine;
  outbox: DeliveryOutbox;
  queue?: CallQueue;
  rateLimit: number;
  clock?: Clock;
  defaultDestinationUrl?: string;
  identitySecret?: string;
  thresholds?: SeverityThresholds;
}

function isFinished(session: CallSession): boolean {
  return session.status === 'completed' || session.status === 'failed';
}

/** Same id every time a call's profile is enqueued, so a retried completion is deduped downstream. */
export function profileEventId(session: CallSession): string {
  return `profile:${session.callId}:${Date.parse(session.createdAt)}`;
}

/**
 * Entry point for the telephony side: one method per call event. Holds no
 * call state of its own; every step reads and writes through the stores.
 */
export class CallPipeline {
  private readonly sessions: SessionStore;
  private readonly rateLimiter: RateLimiter;
  private readonly engine: ConversationEngine;
  private readonly outbox: DeliveryOutbox;
  private readonly queue: CallQueue | undefined;
  private readonly rateLimit: number;
  private readonly clock: Clock;
  private readonly defaultDestinationUrl: string | undefined;
  private readonly identitySecret: string | undefined;
  private readonly thresholds: SeverityThresholds;

  constructor(options: CallPipelineOptions) {
    this.sessions = options.sessions;
    this.rateLimiter = options.rateLimiter;
    this.engine = options.engine;
    this.outbox = options.outbox;
    this.queue = options.queue;
    this.rateLimit = options.rateLimit;
    this.clock = options.clock ?? systemClock;
    this.defaultDestinationUrl = options.defaultDestinationUrl;
    this.identitySecret = options.identitySecret;
    this.thresholds = options.thresholds ?? DEFAULT_SEVERITY_THRESHOLDS;
  }

  private nowIso(): string {
    return new Date(this.clock()).toISOString();
  }

  async initiateCall(request: InitiateCallRequest): Promise<CallSession> {
    const destinationUrl = request.destinationUrl ?? this.defaultDestinationUrl;
    if (!destinationUrl) {
      throw new InvalidRequestError('destinationUrl is required when no default destination is configured', [
        { path: 'destinationUrl', message: 'Required' },
      ]);
    }

    const identityHash = hashCallerIdentity(request.phoneNumber, this.identitySecret);

    if (request.callId && (await this.sessions.get(request.callId))) {
      throw new CallExistsError(request.callId);
    }

    const status = await this.rateLimiter.check(identityHash, this.rateLimit);
    if (status.limited) {
      recordCallRateLimited();
      log.info(
        { event: 'call_rate_limited', caller_identity_hash: identityHash, count: status.count, limit: status.limit },
        'call rate limited',
      );
      throw new RateLimitedError(status.count, status.limit, status.resetAt);
    }

    // A concurrent initiation may have taken the last slot since the check.
    const count = await this.rateLimiter.increment(identityHash);
    if (count > this.rateLimit) {
      recordCallRateLimited();
      const current = await this.rateLimiter.check(identityHash, this.rateLimit);
      throw new RateLimitedError(count, this.rateLimit, current.resetAt);
    }

    const callId = request.callId ?? randomUUID();
    const session = await this.sessions.create(callId, identityHash, {
      destinationUrl,
      metadata: request.metadata ?? {},
      queueId: request.queueId,
    });
    if (!session) {
      // Taken by a concurrent initiation after the check above.
      throw new CallExistsError(callId);
    }

    recordCallStarted();
    logCallEvent('call_initiated', callId, { caller_identity_hash: identityHash, calls_in_window: count });
    return session;
  }

  async openCall(callId: string): Promise<TurnResponse> {
    const session = await this.sessions.get(callId);
    if (!session) {
      throw new SessionNotFoundError(callId);
    }
    if (isFinished(session)) {
      return { prompt: FINISHED_PROMPT, continueCall: false, stage: 'closing' };
    }

    if (session.status === 'queued') {
      const nowIso = this.nowIso();
      const state = session.conversationState;
      const opened = await this.sessions.update(callId, {
        status: 'active',
        startedAt: nowIso,
        conversationState: {
          ...state,
          recentTurns: [...state.recentTurns, { role: 'assistant' as const, text: GREETING_PROMPT, at: nowIso }],
        },
      });
      if (!opened) {
        throw new SessionNotFoundError(callId);
      }
      logCallEvent('call_opened', callId);
    }

    return { prompt: GREETING_PROMPT, continueCall: true, stage: session.conversationState.stage };
  }

  async handleTurn(callId: string, utterance: string): Promise<TurnResponse> {
    const session = await this.sessions.get(callId);
    if (!session) {
      throw new SessionNotFoundError(callId);
    }
    if (isFinished(session)) {
      return { prompt: FINISHED_PROMPT, continueCall: false, stage: 'closing' };
    }

    const { conversationState } = session;
    if (conversationState.isComplete) {
      // An earlier turn ended the conversation but could not finish the call.
      const reason = conversationState.terminationReason ?? 'data_complete';
      await this.finishAfterTurn(session, reason);
      return { prompt: closingPrompt(reason), continueCall: false, stage: conversationState.stage };
    }

    const active: CallSession =
      session.status === 'queued' ? { ...session, status: 'active', startedAt: this.nowIso() } : session;

    let outcome: TurnOutcome;
    try {
      outcome = await this.engine.processTurn(active, utterance);
    } catch (error) {
      incStageError('turn');
      log.error({ err: error, event: 'turn_failed', call_id: callId }, 'turn processing failed');
      return { prompt: FALLBACK_PROMPT, continueCall: true, stage: conversationState.stage };
    }

    recordTurn(outcome.replySource);

    const response: TurnResponse = {
      prompt: outcome.message,
      continueCall: outcome.nextAction === 'continue',
      stage: outcome.stage,
    };

    const { updatedSession } = outcome;
    let saved: CallSession | null;
    try {
      saved = await this.sessions.update(callId, {
        status: updatedSession.status,
        startedAt: updatedSession.startedAt,
        extractedFields: updatedSession.extractedFields,
        employmentPeriods: updatedSession.employmentPeriods,
        employmentGaps: updatedSession.employmentGaps,
        adversarialScore: updatedSession.adversarialScore,
        conversationState: updatedSession.conversationState,
      });
    } catch (error) {
      incStageError('persist');
      log.error({ err: error, event: 'turn_persist_failed', call_id: callId }, 'turn could not be saved');
      // A closing line still ends the call; hangup then finishes it from the last saved state.
      return response.continueCall
        ? { prompt: FALLBACK_PROMPT, continueCall: true, stage: conversationState.stage }
        : response;
    }
    if (!saved) {
      throw new SessionNotFoundError(callId);
    }

    if (outcome.nextAction === 'complete') {
      await this.finishAfterTurn(saved, outcome.terminationReason ?? 'data_complete');
    }
    return response;
  }

  /** Ends the call and queues its profile. Calling it again for a finished call is a no-op. */
  async completeCall(callId: string, reason: TerminationReason = 'hangup'): Promise<CallSession> {
    const session = await this.sessions.get(callId);
    if (!session) {
      throw new SessionNotFoundError(callId);
    }
    if (isFinished(session)) {
      return session;
    }
    return this.finish(session, reason);
  }

  async failCall(callId: string, reason: string): Promise<CallSession> {
    const session = await this.sessions.get(callId);
    if (!session) {
      throw new SessionNotFoundError(callId);
    }
    if (isFinished(session)) {
      return session;
    }

    const failed = await this.sessions.update(callId, {
      status: 'failed',
      failureReason: reason,
      completedAt: this.nowIso(),
    });
    if (!failed) {
      throw new SessionNotFoundError(callId);
    }

    recordCallFailed(reason);
    logCallEvent('call_failed', callId, { reason });
    await this.updateQueue(failed, (queue, queueId) => queue.markFailed(queueId, reason));
    return failed;
  }

  /**
   * Dials the next due call from the queue. A call the pipeline refuses
   * (rate limit, bad destination) counts as a failed attempt on the queue item.
   */
  async dialNext(): Promise<DialResult | null> {
    if (!this.queue) {
      throw new Error('call queue is not configured');
    }
    const queue = this.queue;

    await queue.recoverStalled();
    const item = await queue.claimNext();
    if (!item) {
      return null;
    }

    const callId = `${item.queueId}-${item.attempts + 1}`;
    try {
      const session = await this.initiateCall({
        phoneNumber: item.phoneNumber,
        destinationUrl: item.destinationUrl,
        metadata: item.metadata,
        callId,
        queueId: item.queueId,
      });
      await queue.markDialed(item.queueId, callId);
      recordQueueDial('dialed');
      return { status: 'dialed', queueId: item.queueId, phoneNumber: item.phoneNumber, session };
    } catch (error) {
      const reason = isPipelineError(error) ? error.code : 'internal_error';
      const next = await queue.markFailed(item.queueId, reason);
      recordQueueDial('rejected');
      if (!isPipelineError(error)) {
        throw error;
      }
      return {
        status: 'rejected',
        queueId: item.queueId,
        reason,
        queueStatus: next?.status === 'pending' ? 'pending' : 'failed',
      };
    }
  }

  async getCall(callId: string): Promise<CallSession> {
    const session = await this.sessions.get(callId);
    if (!session) {
      throw new SessionNotFoundError(callId);
    }
    return session;
  }

  private async finish(session: CallSession, reason: TerminationReason): Promise<CallSession> {
    const completedAt = this.nowIso();
    const terminationReason = session.conversationState.terminationReason ?? reason;
    const completed: CallSession = {
      ...session,
      status: 'completed',
      completedAt,
      conversationState: {
        ...session.conversationState,
        isComplete: true,
        terminationReason,
      },
    };

    const destinationUrl = completed.destinationUrl ?? this.defaultDestinationUrl;
    let deliveryEventId: string | undefined;
    if (destinationUrl) {
      deliveryEventId = await this.outbox.enqueue(
        completed.callId,
        destinationUrl,
        buildProfilePayload(completed, this.thresholds),
        { eventId: profileEventId(completed), callerIdentityHash: completed.callerIdentityHash },
      );
    } else {
      log.warn(
        { event: 'profile_not_queued', call_id: completed.callId },
        'no destination configured; profile not delivered',
      );
    }

    const saved = await this.sessions.update(completed.callId, {
      status: 'completed',
      completedAt,
      conversationState: completed.conversationState,
      deliveryEventId,
    });
    if (!saved) {
      throw new SessionNotFoundError(completed.callId);
    }

    const startedAt = saved.startedAt ? Date.parse(saved.startedAt) : Number.NaN;
    const turns = saved.conversationState.turnCount;
    recordCallCompleted({
      reason: terminationReason,
      adversarialLevel: adversarialLevel(saved.adversarialScore, turns),
      durationMs: Number.isNaN(startedAt) ? null : Date.parse(completedAt) - startedAt,
      turns,
    });
    logCallEvent('call_completed', saved.callId, {
      reason: terminationReason,
      turns,
      completeness: saved.conversationState.completeness,
      delivery_event_id: deliveryEventId,
    });
    await this.updateQueue(saved, (queue, queueId) => queue.markCompleted(queueId));
    return saved;
  }

  // The caller already has a closing line; a failed finish is retried by hangup or the next turn.
  private async finishAfterTurn(session: CallSession, reason: TerminationReason): Promise<void> {
    try {
      await this.finish(session, reason);
    } catch (error) {
      if (error instanceof SessionNotFoundError) {
        throw error;
      }
      incStageError('complete');
      log.error({ err: error, event: 'call_complete_failed', call_id: session.callId }, 'call could not be finished');
    }
  }

  // Queue bookkeeping never fails the call; a call left dialing is recovered as stalled.
  private async updateQueue(
    session: CallSession,
    action: (queue: CallQueue, queueId: string) => Promise<unknown>,
  ): Promise<void> {
    const { queueId } = session;
    if (!this.queue || !queueId) {
      return;
    }
    try {
      await action(this.queue, queueId);
    } catch (error) {
      incStageError('queue');
      log.error(
        { err: error, event: 'call_queue_update_failed', call_id: session.callId, queue_id: queueId },
        'call queue update failed',
      );
    }
  }
}
