import { randomUUID } from 'node:crypto';
import { env } from '../env';
import { log } from '../log';
import type { Clock, StateStore } from '../store/types';
import { systemClock } from '../store/types';
import { QueuedCallSchema } from './types';
import type {
  BatchEnqueueResult,
  CallQueueConfig,
  CallQueueStats,
  QueueCallRequest,
  QueuedCall,
} from './types';

export function defaultCallQueueConfig(): CallQueueConfig {
  return {
    prefix: env.CALL_QUEUE_PREFIX,
    ttlMs: env.CALL_QUEUE_TTL_SECONDS * 1000,
    maxAttempts: env.CALL_QUEUE_MAX_ATTEMPTS,
    retryDelayMs: env.CALL_QUEUE_RETRY_DELAY_SECONDS * 1000,
    stallMs: env.CALL_QUEUE_STALL_SECONDS * 1000,
    scanLimit: env.CALL_QUEUE_SCAN_LIMIT,
  };
}

export interface CallQueueOptions {
  store: StateStore;
  clock?: Clock;
  config?: Partial<CallQueueConfig>;
}

/**
 * Outbound calls waiting to be dialed. Items move between three score indexes:
 * pending (scored by when they become due), dialing (by claim time) and failed.
 * An item is added to its next index before it leaves the current one.
 */
export class CallQueue {
  private readonly store: StateStore;
  private readonly clock: Clock;
  private readonly config: CallQueueConfig;

  constructor(options: CallQueueOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.config = { ...defaultCallQueueConfig(), ...options.config };
  }

  private itemKey(queueId: string): string {
    return `${this.config.prefix}:item:${queueId}`;
  }

  private get pendingIndex(): string {
    return `${this.config.prefix}:pending`;
  }

  private get dialingIndex(): string {
    return `${this.config.prefix}:dialing`;
  }

  private get failedIndex(): string {
    return `${this.config.prefix}:failed`;
  }

  async enqueue(request: QueueCallRequest): Promise<QueuedCall> {
    const now = this.clock();
    const nowIso = new Date(now).toISOString();
    const dueAt = request.scheduledAt ? request.scheduledAt.getTime() : now;
    const item: QueuedCall = {
      queueId: randomUUID(),
      phoneNumber: request.phoneNumber,
      metadata: request.metadata ?? {},
      priority: request.priority ?? 1,
      scheduledAt: new Date(dueAt).toISOString(),
      createdAt: nowIso,
      updatedAt: nowIso,
      status: 'pending',
      attempts: 0,
      maxAttempts: this.config.maxAttempts,
    };
    if (request.destinationUrl) {
      item.destinationUrl = request.destinationUrl;
    }

    await this.save(item, now);
    try {
      await this.store.addToIndex(this.pendingIndex, item.queueId, dueAt);
    } catch (error) {
      await this.store.delete(this.itemKey(item.queueId)).catch((cleanupError: unknown) => {
        log.error(
          { err: cleanupError, event: 'call_queue_cleanup_failed', queue_id: item.queueId },
          'could not remove unindexed queue item',
        );
      });
      throw error;
    }

    log.info(
      { event: 'call_queued', queue_id: item.queueId, priority: item.priority, scheduled_at: item.scheduledAt },
      'call queued',
    );
    return item;
  }

  async enqueueBatch(requests: QueueCallRequest[]): Promise<BatchEnqueueResult> {
    const queueIds: string[] = [];
    let failed = 0;

    for (const [index, request] of requests.entries()) {
      try {
        const item = await this.enqueue(request);
        queueIds.push(item.queueId);
      } catch (error) {
        failed += 1;
        log.error({ err: error, event: 'call_queue_add_failed', batch_index: index }, 'could not queue call');
      }
    }

    return { added: queueIds.length, failed, queueIds, total: requests.length };
  }

  async get(queueId: string): Promise<QueuedCall | null> {
    const raw = await this.store.get(this.itemKey(queueId));
    if (raw === null) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      log.error({ err: error, event: 'call_queue_item_corrupt', queue_id: queueId }, 'queue item is not valid json');
      return null;
    }
    const parsed = QueuedCallSchema.safeParse(decoded);
    if (!parsed.success) {
      log.error(
        { event: 'call_queue_item_corrupt', queue_id: queueId, issues: parsed.error.issues },
        'queue item failed validation',
      );
      return null;
    }
    return parsed.data;
  }

  /** Claims the highest-priority due call, oldest first on ties. Null when nothing is due. */
  async claimNext(): Promise<QueuedCall | null> {
    const now = this.clock();
    const dueIds = await this.store.rangeByScore(this.pendingIndex, now, this.config.scanLimit);

    const candidates: QueuedCall[] = [];
    for (const queueId of dueIds) {
      const item = await this.get(queueId);
      if (!item) {
        await this.store.removeFromIndex(this.pendingIndex, queueId);
        continue;
      }
      candidates.push(item);
    }
    candidates.sort(
      (a, b) =>
        b.priority - a.priority
        || Date.parse(a.scheduledAt) - Date.parse(b.scheduledAt)
        || a.createdAt.localeCompare(b.createdAt),
    );

    for (const item of candidates) {
      await this.store.addToIndex(this.dialingIndex, item.queueId, now);
      // ZREM is the claim: only one worker sees it succeed.
      if (!(await this.store.removeFromIndex(this.pendingIndex, item.queueId))) {
        continue;
      }
      const claimed: QueuedCall = { ...item, status: 'dialing', updatedAt: new Date(now).toISOString() };
      await this.save(claimed, now);
      log.info({ event: 'call_queue_claimed', queue_id: item.queueId, attempt: item.attempts + 1 }, 'queued call claimed');
      return claimed;
    }
    return null;
  }

  async markDialed(queueId: string, callId: string): Promise<void> {
    const item = await this.get(queueId);
    if (!item) {
      return;
    }
    const now = this.clock();
    await this.save({ ...item, callId, updatedAt: new Date(now).toISOString() }, now);
  }

  async markCompleted(queueId: string): Promise<boolean> {
    const item = await this.get(queueId);
    if (!item) {
      await this.store.removeFromIndex(this.dialingIndex, queueId);
      return false;
    }
    const now = this.clock();
    await this.save({ ...item, status: 'completed', updatedAt: new Date(now).toISOString() }, now);
    await this.store.removeFromIndex(this.dialingIndex, queueId);
    log.info({ event: 'call_queue_completed', queue_id: queueId, attempts: item.attempts + 1 }, 'queued call completed');
    return true;
  }

  /**
   * Counts a failed attempt. The item goes back to pending after the retry
   * delay, or to the failed set once its attempts are used up.
   */
  async markFailed(queueId: string, reason: string): Promise<QueuedCall | null> {
    const item = await this.get(queueId);
    if (!item) {
      await this.store.removeFromIndex(this.dialingIndex, queueId);
      return null;
    }

    const now = this.clock();
    const attempts = item.attempts + 1;
    let next: QueuedCall;
    if (attempts < item.maxAttempts) {
      const retryAt = now + this.config.retryDelayMs;
      next = {
        ...item,
        status: 'pending',
        attempts,
        lastError: reason,
        scheduledAt: new Date(retryAt).toISOString(),
        updatedAt: new Date(now).toISOString(),
      };
      await this.save(next, now);
      await this.store.addToIndex(this.pendingIndex, queueId, retryAt);
    } else {
      next = { ...item, status: 'failed', attempts, lastError: reason, updatedAt: new Date(now).toISOString() };
      await this.save(next, now);
      await this.store.addToIndex(this.failedIndex, queueId, now);
    }
    await this.store.removeFromIndex(this.dialingIndex, queueId);

    log.warn(
      { event: 'call_queue_attempt_failed', queue_id: queueId, attempts, reason, status: next.status },
      'queued call attempt failed',
    );
    return next;
  }

  async listFailed(limit = 100): Promise<QueuedCall[]> {
    const ids = await this.store.listIndex(this.failedIndex, 0, limit);
    const items: QueuedCall[] = [];
    for (const queueId of ids) {
      const item = await this.get(queueId);
      if (!item) {
        await this.store.removeFromIndex(this.failedIndex, queueId);
        continue;
      }
      items.push(item);
    }
    return items;
  }

  /** Puts failed calls back in the pending set with a fresh attempt budget. */
  async retryFailed(limit = 100): Promise<number> {
    const ids = await this.store.listIndex(this.failedIndex, 0, limit);
    const now = this.clock();
    let retried = 0;

    for (const queueId of ids) {
      const item = await this.get(queueId);
      if (!item) {
        await this.store.removeFromIndex(this.failedIndex, queueId);
        continue;
      }
      const nowIso = new Date(now).toISOString();
      await this.save({ ...item, status: 'pending', attempts: 0, scheduledAt: nowIso, updatedAt: nowIso }, now);
      await this.store.addToIndex(this.pendingIndex, queueId, now);
      await this.store.removeFromIndex(this.failedIndex, queueId);
      retried += 1;
    }

    if (retried > 0) {
      log.info({ event: 'call_queue_retried', retried }, 'failed calls requeued');
    }
    return retried;
  }

  /** Counts calls that have been dialing longer than the stall limit as failed attempts. */
  async recoverStalled(): Promise<number> {
    const cutoff = this.clock() - this.config.stallMs;
    const ids = await this.store.rangeByScore(this.dialingIndex, cutoff, this.config.scanLimit);
    let recovered = 0;

    for (const queueId of ids) {
      const item = await this.get(queueId);
      if (!item || item.status !== 'dialing') {
        await this.store.removeFromIndex(this.dialingIndex, queueId);
        continue;
      }
      await this.markFailed(queueId, 'stalled');
      recovered += 1;
    }
    return recovered;
  }

  async stats(): Promise<CallQueueStats> {
    const [pending, dialing, failed] = await Promise.all([
      this.store.indexSize(this.pendingIndex),
      this.store.indexSize(this.dialingIndex),
      this.store.indexSize(this.failedIndex),
    ]);
    return { pending, dialing, failed, total: pending + dialing + failed };
  }

  // Items scheduled far ahead keep their full TTL past the due time.
  private async save(item: QueuedCall, now: number): Promise<void> {
    const ttlMs = this.config.ttlMs + Math.max(0, Date.parse(item.scheduledAt) - now);
    await this.store.set(this.itemKey(item.queueId), JSON.stringify(item), ttlMs);
  }
}
