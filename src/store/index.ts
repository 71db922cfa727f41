import { env } from '../env';
import { log } from '../log';
import { getRedisClient } from '../redis/client';
import { MemoryStateStore } from './memoryStore';
import { RedisStateStore } from './redisStore';
import type { StateStore } from './types';

export function createStateStore(driver: typeof env.STATE_STORE = env.STATE_STORE): StateStore {
  if (driver === 'memory') {
    log.warn(
      { event: 'state_store_selected', driver },
      'using in-process state store; state is not shared across replicas',
    );
    return new MemoryStateStore();
  }

  log.info({ event: 'state_store_selected', driver }, 'using redis state store');
  return new RedisStateStore(getRedisClient());
}

export { MemoryStateStore, RedisStateStore };
export type { Clock, StateStore } from './types';
