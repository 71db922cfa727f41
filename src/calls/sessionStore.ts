import { env } from '../env';
import { log } from '../log';
import type { Clock, StateStore } from '../store/types';
import { systemClock } from '../store/types';
import { initialConversationState } from '../conversation/types';
import { CallSessionSchema } from './types';
import type { CallId, CallSession, SessionInit, SessionPatch } from './types';

export interface SessionStoreOptions {
  store: StateStore;
  clock?: Clock;
  prefix?: string;
  ttlMs?: number;
  maxAgeMs?: number;
}

/**
 * Authoritative call state. Every write stores the whole record; the TTL is
 * refreshed on update but never past createdAt + maxAge.
 */
export class SessionStore {
  private readonly store: StateStore;
  private readonly clock: Clock;
  private readonly prefix: string;
  private readonly ttlMs: number;
  private readonly maxAgeMs: number;

  constructor(options: SessionStoreOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.prefix = options.prefix ?? env.SESSION_PREFIX;
    this.ttlMs = options.ttlMs ?? env.SESSION_TTL_SECONDS * 1000;
    this.maxAgeMs = options.maxAgeMs ?? env.SESSION_MAX_AGE_SECONDS * 1000;
  }

  key(callId: CallId): string {
    return `${this.prefix}:${callId}`;
  }

  private remainingLifetimeMs(session: CallSession, now: number): number {
    return Date.parse(session.createdAt) + this.maxAgeMs - now;
  }

  /** Returns null when a readable session already holds this callId. */
  async create(callId: CallId, callerIdentityHash: string, init: SessionInit = {}): Promise<CallSession | null> {
    const nowIso = new Date(this.clock()).toISOString();
    const session: CallSession = {
      callId,
      callerIdentityHash,
      status: init.status ?? 'queued',
      createdAt: nowIso,
      updatedAt: nowIso,
      metadata: init.metadata ?? {},
      conversationState: initialConversationState(),
      extractedFields: {},
      employmentPeriods: [],
      employmentGaps: [],
      adversarialScore: 0,
    };
    if (init.destinationUrl) {
      session.destinationUrl = init.destinationUrl;
    }
    if (init.queueId) {
      session.queueId = init.queueId;
    }

    const ttlMs = Math.min(this.ttlMs, this.maxAgeMs);
    const created = await this.store.setIfAbsent(this.key(callId), JSON.stringify(session), ttlMs);

    if (!created) {
      const existing = await this.get(callId);
      if (existing) {
        log.warn(
          { event: 'call_session_exists', call_id: callId, caller_identity_hash: callerIdentityHash },
          'call session already exists',
        );
        return null;
      }
      // Existing record is unreadable or expired between the two calls; replace it.
      await this.store.set(this.key(callId), JSON.stringify(session), ttlMs);
    }

    log.info(
      { event: 'call_session_created', call_id: callId, caller_identity_hash: callerIdentityHash },
      'call session created',
    );
    return session;
  }

  async get(callId: CallId): Promise<CallSession | null> {
    const raw = await this.store.get(this.key(callId));
    if (raw === null) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      log.error({ err: error, event: 'call_session_corrupt', call_id: callId }, 'call session is not valid json');
      return null;
    }

    const parsed = CallSessionSchema.safeParse(decoded);
    if (!parsed.success) {
      log.error(
        { event: 'call_session_corrupt', call_id: callId, issues: parsed.error.issues },
        'call session failed validation',
      );
      return null;
    }
    return parsed.data;
  }

  /** Returns null when the session is gone; a missing key is never recreated. */
  async update(callId: CallId, patch: SessionPatch): Promise<CallSession | null> {
    const current = await this.get(callId);
    if (!current) {
      return null;
    }

    const now = this.clock();
    const remaining = this.remainingLifetimeMs(current, now);
    if (remaining <= 0) {
      await this.store.delete(this.key(callId));
      log.info({ event: 'call_session_max_age', call_id: callId }, 'call session reached max age');
      return null;
    }

    const next: CallSession = {
      ...current,
      ...patch,
      callId: current.callId,
      callerIdentityHash: current.callerIdentityHash,
      createdAt: current.createdAt,
      updatedAt: new Date(now).toISOString(),
    };

    const written = await this.store.setIfExists(
      this.key(callId),
      JSON.stringify(next),
      Math.min(this.ttlMs, remaining),
    );
    return written ? next : null;
  }

  async delete(callId: CallId): Promise<boolean> {
    return this.store.delete(this.key(callId));
  }
}
