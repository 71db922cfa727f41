import { log } from '../log';
import { RedisClient } from '../redis/client';
import { StateStore } from './types';

export const INCREMENT_WINDOW_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 or redis.call('PTTL', KEYS[1]) < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
return count
`;

export const DELETE_IF_EQUALS_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.toUpperCase().includes('NOSCRIPT');
}

export class RedisStateStore implements StateStore {
  private readonly scriptShas = new Map<string, string>();

  constructor(private readonly redis: RedisClient) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    if (ttlMs === undefined) {
      await this.redis.set(key, value);
      return;
    }
    await this.redis.set(key, value, 'PX', Math.max(Math.ceil(ttlMs), 1));
  }

  async setIfExists(key: string, value: string, ttlMs: number): Promise<boolean> {
    const result = await this.redis.set(key, value, 'PX', Math.max(Math.ceil(ttlMs), 1), 'XX');
    return result === 'OK';
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const result = await this.redis.set(key, value, 'PX', Math.max(Math.ceil(ttlMs), 1), 'NX');
    return result === 'OK';
  }

  async delete(key: string): Promise<boolean> {
    return (await this.redis.del(key)) > 0;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    return Number(await this.evalScript(DELETE_IF_EQUALS_SCRIPT, key, value)) > 0;
  }

  async ttlMs(key: string): Promise<number | null> {
    const ttl = await this.redis.pttl(key);
    return ttl >= 0 ? ttl : null;
  }

  async incrementWindow(key: string, windowMs: number): Promise<number> {
    const result = await this.evalScript(INCREMENT_WINDOW_SCRIPT, key, Math.max(Math.ceil(windowMs), 1).toString());
    const count = Number(result);
    if (!Number.isInteger(count)) {
      log.error({ event: 'increment_window_unknown_result', key, result }, 'increment returned unknown result');
      throw new Error(`increment window returned non-integer result for ${key}`);
    }
    return count;
  }

  async addToIndex(index: string, member: string, score: number): Promise<void> {
    await this.redis.zadd(index, score, member);
  }

  async removeFromIndex(index: string, member: string): Promise<boolean> {
    return (await this.redis.zrem(index, member)) > 0;
  }

  async rangeByScore(index: string, maxScore: number, limit: number): Promise<string[]> {
    return this.redis.zrangebyscore(index, '-inf', maxScore, 'LIMIT', 0, limit);
  }

  async listIndex(index: string, offset: number, limit: number): Promise<string[]> {
    if (limit <= 0) {
      return [];
    }
    return this.redis.zrange(index, offset, offset + limit - 1);
  }

  async indexSize(index: string): Promise<number> {
    return this.redis.zcard(index);
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private async evalScript(script: string, key: string, arg: string): Promise<unknown> {
    const cachedSha = this.scriptShas.get(script);
    if (cachedSha) {
      try {
        return await this.redis.evalsha(cachedSha, 1, key, arg);
      } catch (error) {
        if (!isNoScriptError(error)) {
          throw error;
        }
      }
    }

    try {
      const loadedSha = String(await this.redis.script('LOAD', script));
      this.scriptShas.set(script, loadedSha);
      return await this.redis.evalsha(loadedSha, 1, key, arg);
    } catch (error) {
      log.warn({ err: error, event: 'script_load_failed' }, 'falling back to EVAL');
      return this.redis.eval(script, 1, key, arg);
    }
  }
}
