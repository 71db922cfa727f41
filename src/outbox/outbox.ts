import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import { env } from '../env';
import { log } from '../log';
import { recordDelivery } from '../metrics';
import type { Clock, StateStore } from '../store/types';
import { systemClock } from '../store/types';
import { buildDeliveryRequest, httpTransport } from './transport';
import {
  DeadLetterSchema,
  OutboxEntrySchema,
} from './types';
import type {
  DeadLetter,
  DeliveryTransport,
  DrainStats,
  EnqueueOptions,
  JsonObject,
  OutboxConfig,
  OutboxEntry,
  OutboxStats,
} from './types';

export const PROFILE_EVENT_TYPE = 'call.profile.completed';

type EntryOutcome = 'delivered' | 'retry_scheduled' | 'dead_lettered' | 'skipped' | 'missing';

export function defaultOutboxConfig(): OutboxConfig {
  return {
    prefix: env.OUTBOX_PREFIX,
    ttlMs: env.OUTBOX_TTL_SECONDS * 1000,
    maxRetries: env.OUTBOX_MAX_RETRIES,
    initialDelayMs: env.OUTBOX_INITIAL_DELAY_SECONDS * 1000,
    backoffMultiplier: env.OUTBOX_BACKOFF_MULTIPLIER,
    maxDelayMs: env.OUTBOX_MAX_DELAY_SECONDS * 1000,
    batchSize: env.OUTBOX_BATCH_SIZE,
    leaseMs: env.OUTBOX_LEASE_MS,
    timeoutMs: env.WEBHOOK_TIMEOUT_MS,
  };
}

/** min(initial * multiplier^retryCount, max), where retryCount already counts the failed attempt. */
export function computeRetryDelayMs(
  retryCount: number,
  config: Pick<OutboxConfig, 'initialDelayMs' | 'backoffMultiplier' | 'maxDelayMs'>,
): number {
  const delay = config.initialDelayMs * config.backoffMultiplier ** retryCount;
  return Math.min(delay, config.maxDelayMs);
}

export interface DeliveryOutboxOptions {
  store: StateStore;
  transport?: DeliveryTransport;
  clock?: Clock;
  config?: Partial<OutboxConfig>;
  signingSecret?: string;
}

interface AttemptResult {
  ok: boolean;
  statusCode?: number;
  error?: string;
  durationMs: number;
}

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function parseRecord<T>(
  raw: string | null,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context: { event: string; event_id: string },
): T | null {
  if (raw === null) {
    return null;
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    log.error({ ...context, err: error }, 'outbox record is not valid json');
    return null;
  }
  const parsed = schema.safeParse(decoded);
  if (!parsed.success) {
    log.error({ ...context, issues: parsed.error.issues }, 'outbox record failed validation');
    return null;
  }
  return parsed.data;
}

/**
 * Durable at-least-once delivery of completed call profiles. An entry leaves
 * the pending set only on a 2xx response or by moving to the dead-letter set.
 */
export class DeliveryOutbox {
  private readonly store: StateStore;
  private readonly transport: DeliveryTransport;
  private readonly clock: Clock;
  private readonly config: OutboxConfig;
  private readonly signingSecret: string | undefined;

  constructor(options: DeliveryOutboxOptions) {
    this.store = options.store;
    this.transport = options.transport ?? httpTransport;
    this.clock = options.clock ?? systemClock;
    this.config = { ...defaultOutboxConfig(), ...options.config };
    this.signingSecret = options.signingSecret ?? env.WEBHOOK_SIGNING_SECRET;
  }

  private entryKey(eventId: string): string {
    return `${this.config.prefix}:entry:${eventId}`;
  }

  private lockKey(eventId: string): string {
    return `${this.config.prefix}:lock:${eventId}`;
  }

  private deadKey(eventId: string): string {
    return `${this.config.prefix}:dead:${eventId}`;
  }

  private get dueIndex(): string {
    return `${this.config.prefix}:due`;
  }

  private get deadIndex(): string {
    return `${this.config.prefix}:dead`;
  }

  async enqueue(
    callId: string,
    destinationUrl: string,
    payload: JsonObject,
    options: EnqueueOptions = {},
  ): Promise<string> {
    const now = this.clock();
    const eventId = options.eventId ?? randomUUID();
    const entry: OutboxEntry = {
      eventId,
      callId,
      eventType: options.eventType ?? PROFILE_EVENT_TYPE,
      payload,
      destinationUrl,
      createdAt: new Date(now).toISOString(),
      retryCount: 0,
      nextRetryAt: new Date(now).toISOString(),
      maxRetries: options.maxRetries ?? this.config.maxRetries,
    };
    if (options.callerIdentityHash) {
      entry.callerIdentityHash = options.callerIdentityHash;
    }

    const entryKey = this.entryKey(eventId);
    await this.store.set(entryKey, JSON.stringify(entry), this.config.ttlMs);
    try {
      await this.store.addToIndex(this.dueIndex, eventId, now);
    } catch (error) {
      // An entry outside the due index is never drained; the caller must see the failure.
      await this.store.delete(entryKey).catch((cleanupError: unknown) => {
        log.error(
          { err: cleanupError, event: 'outbox_enqueue_cleanup_failed', event_id: eventId },
          'could not remove unindexed outbox entry',
        );
      });
      throw error;
    }

    log.info(
      { event: 'outbox_enqueued', event_id: eventId, call_id: callId, event_type: entry.eventType },
      'outbox entry enqueued',
    );
    return eventId;
  }

  async get(eventId: string): Promise<OutboxEntry | null> {
    const raw = await this.store.get(this.entryKey(eventId));
    return parseRecord(raw, OutboxEntrySchema, { event: 'outbox_entry_corrupt', event_id: eventId });
  }

  async getDeadLetter(eventId: string): Promise<DeadLetter | null> {
    const raw = await this.store.get(this.deadKey(eventId));
    return parseRecord(raw, DeadLetterSchema, { event: 'outbox_dead_letter_corrupt', event_id: eventId });
  }

  async listDeadLetters(limit = 50, offset = 0): Promise<DeadLetter[]> {
    const ids = await this.store.listIndex(this.deadIndex, offset, limit);
    const letters: DeadLetter[] = [];
    for (const eventId of ids) {
      const letter = await this.getDeadLetter(eventId);
      if (letter) {
        letters.push(letter);
      }
    }
    return letters;
  }

  async stats(): Promise<OutboxStats> {
    const [pending, dead] = await Promise.all([
      this.store.indexSize(this.dueIndex),
      this.store.indexSize(this.deadIndex),
    ]);
    return { pending, dead };
  }

  /** Moves a dead letter back to the pending set with a fresh retry budget. */
  async requeueDeadLetter(eventId: string): Promise<boolean> {
    const letter = await this.getDeadLetter(eventId);
    if (!letter) {
      return false;
    }

    const now = this.clock();
    const { deadLetteredAt: _deadLetteredAt, reason: _reason, ...rest } = letter;
    const entry: OutboxEntry = {
      ...rest,
      retryCount: 0,
      nextRetryAt: new Date(now).toISOString(),
    };

    await this.store.set(this.entryKey(eventId), JSON.stringify(entry), this.config.ttlMs);
    await this.store.addToIndex(this.dueIndex, eventId, now);
    await this.store.removeFromIndex(this.deadIndex, eventId);
    await this.store.delete(this.deadKey(eventId));

    log.info({ event: 'outbox_requeued', event_id: eventId, call_id: entry.callId }, 'dead letter requeued');
    return true;
  }

  /**
   * Attempts every due entry once. Entries run concurrently and independently;
   * a failure in one is logged and counted without affecting the others.
   */
  async drain(batchSize = this.config.batchSize): Promise<DrainStats> {
    const now = this.clock();
    const due = await this.store.rangeByScore(this.dueIndex, now, batchSize);
    const stats: DrainStats = {
      processed: 0,
      delivered: 0,
      retried: 0,
      deadLettered: 0,
      skipped: 0,
      errors: 0,
    };

    const results = await Promise.allSettled(due.map((eventId) => this.processEntry(eventId, now)));

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        stats.errors += 1;
        recordDelivery('error');
        log.error(
          { err: result.reason, event: 'outbox_entry_failed', event_id: due[index] },
          'outbox entry processing failed',
        );
        return;
      }

      switch (result.value) {
        case 'delivered':
          stats.processed += 1;
          stats.delivered += 1;
          break;
        case 'retry_scheduled':
          stats.processed += 1;
          stats.retried += 1;
          break;
        case 'dead_lettered':
          stats.processed += 1;
          stats.deadLettered += 1;
          break;
        case 'skipped':
        case 'missing':
          stats.skipped += 1;
          break;
      }
    });

    return stats;
  }

  private async processEntry(eventId: string, now: number): Promise<EntryOutcome> {
    const lockKey = this.lockKey(eventId);
    const leaseToken = randomUUID();
    const claimed = await this.store.setIfAbsent(lockKey, leaseToken, this.config.leaseMs);
    if (!claimed) {
      return 'skipped';
    }

    try {
      const entry = await this.get(eventId);
      if (!entry) {
        await this.store.removeFromIndex(this.dueIndex, eventId);
        log.error(
          { event: 'outbox_entry_missing', event_id: eventId },
          'outbox entry missing or expired before delivery',
        );
        return 'missing';
      }

      // Rescheduled by another drain since the index was read.
      if (Date.parse(entry.nextRetryAt) > now) {
        return 'skipped';
      }

      const attempt = await this.attempt(entry, now);
      if (attempt.ok) {
        await this.store.delete(this.entryKey(eventId));
        await this.store.removeFromIndex(this.dueIndex, eventId);
        recordDelivery('delivered', attempt.durationMs);
        log.info(
          {
            event: 'outbox_delivered',
            event_id: eventId,
            call_id: entry.callId,
            status_code: attempt.statusCode,
            attempts: entry.retryCount + 1,
          },
          'webhook delivered',
        );
        return 'delivered';
      }

      const failed: OutboxEntry = {
        ...entry,
        retryCount: entry.retryCount + 1,
        lastError: attempt.error,
        lastAttemptAt: new Date(now).toISOString(),
      };
      if (attempt.statusCode !== undefined) {
        failed.lastStatusCode = attempt.statusCode;
      }

      if (failed.retryCount >= failed.maxRetries) {
        await this.deadLetter(failed, now);
        recordDelivery('dead_lettered', attempt.durationMs);
        return 'dead_lettered';
      }

      const nextRetryAt = now + computeRetryDelayMs(failed.retryCount, this.config);
      failed.nextRetryAt = new Date(nextRetryAt).toISOString();
      await this.store.set(this.entryKey(eventId), JSON.stringify(failed), this.config.ttlMs);
      await this.store.addToIndex(this.dueIndex, eventId, nextRetryAt);
      recordDelivery('retry_scheduled', attempt.durationMs);

      log.warn(
        {
          event: 'outbox_retry_scheduled',
          event_id: eventId,
          call_id: entry.callId,
          retry_count: failed.retryCount,
          next_retry_at: failed.nextRetryAt,
          status_code: attempt.statusCode,
          error: attempt.error,
        },
        'webhook delivery failed, retry scheduled',
      );
      return 'retry_scheduled';
    } finally {
      // The lease may have expired and passed to another drain.
      await this.store.deleteIfEquals(lockKey, leaseToken);
    }
  }

  private async attempt(entry: OutboxEntry, now: number): Promise<AttemptResult> {
    const request = buildDeliveryRequest(entry, {
      now,
      timeoutMs: this.config.timeoutMs,
      signingSecret: this.signingSecret,
    });
    const start = nowNs();
    const elapsed = (): number => Number(nowNs() - start) / 1_000_000;

    try {
      const response = await this.transport(request);
      if (response.status >= 200 && response.status < 300) {
        return { ok: true, statusCode: response.status, durationMs: elapsed() };
      }
      const preview = response.body.length > 200 ? `${response.body.slice(0, 200)}...` : response.body;
      return {
        ok: false,
        statusCode: response.status,
        error: `HTTP ${response.status}${preview ? `: ${preview}` : ''}`,
        durationMs: elapsed(),
      };
    } catch (error) {
      return {
        ok: false,
        error: error instanceof Error ? error.message : String(error),
        durationMs: elapsed(),
      };
    }
  }

  private async deadLetter(entry: OutboxEntry, now: number): Promise<void> {
    const letter: DeadLetter = {
      ...entry,
      deadLetteredAt: new Date(now).toISOString(),
      reason: 'max_retries_exceeded',
    };

    // Written before the pending copy is removed, so a crash in between leaves a duplicate, not a loss.
    await this.store.set(this.deadKey(entry.eventId), JSON.stringify(letter));
    await this.store.addToIndex(this.deadIndex, entry.eventId, now);
    await this.store.delete(this.entryKey(entry.eventId));
    await this.store.removeFromIndex(this.dueIndex, entry.eventId);

    log.error(
      {
        event: 'outbox_dead_lettered',
        event_id: entry.eventId,
        call_id: entry.callId,
        retry_count: entry.retryCount,
        last_error: entry.lastError,
        last_status_code: entry.lastStatusCode,
      },
      'webhook delivery exhausted retries',
    );
  }
}
