import { createBrainClient } from '../ai/brainClient';
import type { ReplyGenerator } from '../ai/brainClient';
import { SessionStore } from '../calls/sessionStore';
import { ConversationEngine } from '../conversation/conversationEngine';
import { env } from '../env';
import { RateLimiter } from '../limits/rateLimiter';
import { DeliveryOutbox } from '../outbox/outbox';
import { OutboxWorker } from '../outbox/worker';
import { CallQueue } from '../queue/callQueue';
import type { DeliveryTransport } from '../outbox/types';
import { createStateStore } from '../store';
import type { Clock, StateStore } from '../store/types';
import type { SeverityThresholds } from '../timeline/types';
import { CallPipeline } from './callPipeline';

export interface Runtime {
  store: StateStore;
  sessions: SessionStore;
  rateLimiter: RateLimiter;
  engine: ConversationEngine;
  outbox: DeliveryOutbox;
  worker: OutboxWorker;
  queue: CallQueue;
  pipeline: CallPipeline;
}

export interface RuntimeOverrides {
  store?: StateStore;
  clock?: Clock;
  generateReply?: ReplyGenerator;
  transport?: DeliveryTransport;
}

export function severityThresholdsFromEnv(): SeverityThresholds {
  return {
    minorMaxYears: env.GAP_MINOR_MAX_YEARS,
    moderateMaxYears: env.GAP_MODERATE_MAX_YEARS,
    majorMaxYears: env.GAP_MAJOR_MAX_YEARS,
  };
}

/** Wires every component from env; overrides replace the parts tests need to control. */
export function createRuntime(overrides: RuntimeOverrides = {}): Runtime {
  const store = overrides.store ?? createStateStore();
  const clock = overrides.clock;
  const thresholds = severityThresholdsFromEnv();

  const sessions = new SessionStore({ store, clock });
  const rateLimiter = new RateLimiter({ store, clock });
  const engine = new ConversationEngine({
    generateReply: overrides.generateReply ?? createBrainClient(),
    clock,
    config: {
      confidenceThreshold: env.FIELD_CONFIDENCE_THRESHOLD,
      completionThreshold: env.COMPLETION_THRESHOLD,
      weights: { required: env.REQUIRED_FIELDS_WEIGHT, optional: env.OPTIONAL_FIELDS_WEIGHT },
      maxTurns: env.MAX_TURNS,
      adversarialTerminateScore: env.ADVERSARIAL_TERMINATE_SCORE,
      historyWindow: env.HISTORY_WINDOW,
      thresholds,
    },
  });
  const outbox = new DeliveryOutbox({ store, clock, transport: overrides.transport });
  const worker = new OutboxWorker(outbox, {
    intervalMs: env.OUTBOX_POLL_INTERVAL_MS,
    batchSize: env.OUTBOX_BATCH_SIZE,
  });
  const queue = new CallQueue({ store, clock });
  const pipeline = new CallPipeline({
    sessions,
    rateLimiter,
    engine,
    outbox,
    queue,
    clock,
    rateLimit: env.RATE_LIMIT_MAX_CALLS,
    defaultDestinationUrl: env.WEBHOOK_DESTINATION_URL,
    identitySecret: env.IDENTITY_HASH_SECRET,
    thresholds,
  });

  return { store, sessions, rateLimiter, engine, outbox, worker, queue, pipeline };
}
