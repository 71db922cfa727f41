import { Clock, StateStore, systemClock } from './types';

interface Entry {
  value: string;
  expiresAt: number | null;
}

/** In-memory StateStore for local development and tests. Expiry is evaluated lazily on access. */
export class MemoryStateStore implements StateStore {
  private readonly entries = new Map<string, Entry>();
  private readonly indexes = new Map<string, Map<string, number>>();
  private readonly now: Clock;

  constructor(options: { clock?: Clock } = {}) {
    this.now = options.clock ?? systemClock;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private expiry(ttlMs: number | undefined): number | null {
    return ttlMs === undefined ? null : this.now() + Math.max(ttlMs, 1);
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.expiry(ttlMs) });
  }

  async setIfExists(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (!this.live(key)) {
      return false;
    }
    this.entries.set(key, { value, expiresAt: this.expiry(ttlMs) });
    return true;
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    this.entries.set(key, { value, expiresAt: this.expiry(ttlMs) });
    return true;
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(key) !== undefined;
    this.entries.delete(key);
    return existed;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    if (this.live(key)?.value !== value) {
      return false;
    }
    this.entries.delete(key);
    return true;
  }

  async ttlMs(key: string): Promise<number | null> {
    const entry = this.live(key);
    if (!entry || entry.expiresAt === null) {
      return null;
    }
    return entry.expiresAt - this.now();
  }

  async incrementWindow(key: string, windowMs: number): Promise<number> {
    const entry = this.live(key);
    const current = entry ? Number.parseInt(entry.value, 10) || 0 : 0;
    const next = current + 1;
    const expiresAt = entry && entry.expiresAt !== null ? entry.expiresAt : this.expiry(windowMs);
    this.entries.set(key, { value: String(next), expiresAt });
    return next;
  }

  async addToIndex(index: string, member: string, score: number): Promise<void> {
    const members = this.indexes.get(index) ?? new Map<string, number>();
    members.set(member, score);
    this.indexes.set(index, members);
  }

  async removeFromIndex(index: string, member: string): Promise<boolean> {
    return this.indexes.get(index)?.delete(member) ?? false;
  }

  async rangeByScore(index: string, maxScore: number, limit: number): Promise<string[]> {
    return this.sorted(index)
      .filter(([, score]) => score <= maxScore)
      .slice(0, limit)
      .map(([member]) => member);
  }

  async listIndex(index: string, offset: number, limit: number): Promise<string[]> {
    return this.sorted(index)
      .slice(offset, offset + limit)
      .map(([member]) => member);
  }

  async indexSize(index: string): Promise<number> {
    return this.indexes.get(index)?.size ?? 0;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.entries.clear();
    this.indexes.clear();
  }

  // Redis sorted sets order ties lexicographically by member.
  private sorted(index: string): Array<[string, number]> {
    const members = this.indexes.get(index);
    if (!members) {
      return [];
    }
    return [...members.entries()].sort((a, b) => a[1] - b[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  }
}
