/**
 * Key-value state shared by every replica. Sessions, rate-limit windows and the
 * delivery outbox all live behind this interface; nothing about a call is cached
 * in process memory.
 */
export interface StateStore {
  get(key: string): Promise<string | null>;
  /** Omitting `ttlMs` persists the key with no expiry. */
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  /** Writes only when the key already exists (SET ... XX). */
  setIfExists(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Writes only when the key is absent (SET ... NX). */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  /** Deletes the key only while it still holds `value`; releases a lease without freeing someone else's. */
  deleteIfEquals(key: string, value: string): Promise<boolean>;
  /** Remaining lifetime, or null when the key is missing or never expires. */
  ttlMs(key: string): Promise<number | null>;
  /**
   * Atomic INCR. The expiry is set when the counter is created and left alone
   * afterwards, so the window does not slide with activity.
   */
  incrementWindow(key: string, windowMs: number): Promise<number>;

  addToIndex(index: string, member: string, score: number): Promise<void>;
  removeFromIndex(index: string, member: string): Promise<boolean>;
  /** Members with score <= maxScore, lowest score first. */
  rangeByScore(index: string, maxScore: number, limit: number): Promise<string[]>;
  listIndex(index: string, offset: number, limit: number): Promise<string[]>;
  indexSize(index: string): Promise<number>;

  /** Rejects when the backing store cannot be reached. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
