import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

const DAY = 24 * 60 * 60 * 1000;

async function setup() {
  const { MemoryStateStore } = await import('../src/store/memoryStore');
  const { RateLimiter } = await import('../src/limits/rateLimiter');
  let now = Date.UTC(2024, 0, 1);
  const clock = () => now;
  const limiter = new RateLimiter({
    store: new MemoryStateStore({ clock }),
    clock,
    prefix: 'rl',
    windowMs: DAY,
  });
  return {
    limiter,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

test('caller is limited after the configured number of calls', async () => {
  const { limiter } = await setup();

  assert.deepEqual(await limiter.check('caller', 3), { limited: false, count: 0, limit: 3, resetAt: null });

  assert.equal(await limiter.increment('caller'), 1);
  assert.equal(await limiter.increment('caller'), 2);
  assert.equal((await limiter.check('caller', 3)).limited, false);
  assert.equal(await limiter.increment('caller'), 3);

  const status = await limiter.check('caller', 3);
  assert.equal(status.limited, true);
  assert.equal(status.count, 3);
  assert.equal(status.resetAt?.toISOString(), '2024-01-02T00:00:00.000Z');
});

test('window does not slide with later calls and resets once it closes', async () => {
  const { limiter, advance } = await setup();

  await limiter.increment('caller');
  advance(12 * 60 * 60 * 1000);
  await limiter.increment('caller');
  await limiter.increment('caller');

  const limited = await limiter.check('caller', 3);
  assert.equal(limited.resetAt?.toISOString(), '2024-01-02T00:00:00.000Z');

  advance(12 * 60 * 60 * 1000);
  assert.deepEqual(await limiter.check('caller', 3), { limited: false, count: 0, limit: 3, resetAt: null });
  assert.equal(await limiter.increment('caller'), 1);
});

test('callers are counted independently', async () => {
  const { limiter } = await setup();

  await limiter.increment('a');
  await limiter.increment('a');

  assert.equal((await limiter.check('a', 2)).limited, true);
  assert.equal((await limiter.check('b', 2)).limited, false);
  assert.equal(limiter.key('a'), 'rl:a');
});
