import assert from 'node:assert/strict';
import { createHmac } from 'node:crypto';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import type { DeliveryRequest, DeliveryResponse } from '../src/outbox/types';

setTestEnv();

const START = Date.UTC(2024, 0, 1);
const SECOND = 1000;

async function setup(respond: (request: DeliveryRequest) => Promise<DeliveryResponse>) {
  const { MemoryStateStore } = await import('../src/store/memoryStore');
  const { DeliveryOutbox } = await import('../src/outbox/outbox');
  let now = START;
  const clock = () => now;
  const store = new MemoryStateStore({ clock });
  const requests: DeliveryRequest[] = [];
  const outbox = new DeliveryOutbox({
    store,
    clock,
    signingSecret: 'test-secret',
    transport: async (request) => {
      requests.push(request);
      return respond(request);
    },
    config: {
      prefix: 'test_outbox',
      ttlMs: 7 * 24 * 3600 * SECOND,
      maxRetries: 5,
      initialDelayMs: 60 * SECOND,
      backoffMultiplier: 2,
      maxDelayMs: 3600 * SECOND,
      batchSize: 10,
      leaseMs: 120 * SECOND,
      timeoutMs: 5 * SECOND,
    },
  });
  return {
    store,
    outbox,
    requests,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

function sequence(...statuses: number[]): () => Promise<DeliveryResponse> {
  return async () => {
    const status = statuses.shift() ?? 200;
    return { status, body: status >= 300 ? 'boom' : 'ok' };
  };
}

test('retry delay grows exponentially up to the cap', async () => {
  const { computeRetryDelayMs } = await import('../src/outbox/outbox');
  const config = { initialDelayMs: 60 * SECOND, backoffMultiplier: 2, maxDelayMs: 3600 * SECOND };

  assert.deepEqual(
    [1, 2, 3, 4, 6].map((retryCount) => computeRetryDelayMs(retryCount, config)),
    [120 * SECOND, 240 * SECOND, 480 * SECOND, 960 * SECOND, 3600 * SECOND],
  );
});

test('failed deliveries are retried with growing delays until one succeeds', async () => {
  const { outbox, requests, advance } = await setup(sequence(500, 500, 200));
  const eventId = await outbox.enqueue('call-1', 'http://localhost/webhook', { callId: 'call-1' });

  const first = await outbox.drain();
  assert.deepEqual(first, { processed: 1, delivered: 0, retried: 1, deadLettered: 0, skipped: 0, errors: 0 });

  const pending = await outbox.get(eventId);
  assert.ok(pending);
  assert.equal(pending.retryCount, 1);
  assert.equal(pending.lastStatusCode, 500);
  assert.equal(pending.lastError, 'HTTP 500: boom');
  assert.equal(pending.nextRetryAt, new Date(START + 120 * SECOND).toISOString());

  assert.equal((await outbox.drain()).processed, 0);
  advance(119 * SECOND);
  assert.equal((await outbox.drain()).processed, 0);

  advance(1 * SECOND);
  assert.equal((await outbox.drain()).retried, 1);
  assert.equal((await outbox.get(eventId))?.nextRetryAt, new Date(START + 360 * SECOND).toISOString());

  advance(240 * SECOND);
  assert.equal((await outbox.drain()).delivered, 1);
  assert.equal(await outbox.get(eventId), null);
  assert.deepEqual(await outbox.stats(), { pending: 0, dead: 0 });
  assert.equal(requests.length, 3);
});

test('entries move to the dead-letter set after max retries and can be requeued', async () => {
  let status = 503;
  const { outbox, advance } = await setup(async () => ({ status, body: '' }));
  const eventId = await outbox.enqueue('call-1', 'http://localhost/webhook', { callId: 'call-1' });

  for (let attempt = 1; attempt <= 4; attempt += 1) {
    assert.equal((await outbox.drain()).retried, 1);
    advance(3600 * SECOND);
  }
  const final = await outbox.drain();
  assert.equal(final.deadLettered, 1);

  assert.equal(await outbox.get(eventId), null);
  assert.deepEqual(await outbox.stats(), { pending: 0, dead: 1 });
  const letter = await outbox.getDeadLetter(eventId);
  assert.ok(letter);
  assert.equal(letter.retryCount, 5);
  assert.equal(letter.reason, 'max_retries_exceeded');
  assert.equal(letter.lastError, 'HTTP 503');
  assert.equal(letter.lastStatusCode, 503);
  assert.deepEqual(
    (await outbox.listDeadLetters()).map((entry) => entry.eventId),
    [eventId],
  );

  advance(3600 * SECOND);
  assert.equal((await outbox.drain()).processed, 0);

  assert.equal(await outbox.requeueDeadLetter(eventId), true);
  assert.equal(await outbox.requeueDeadLetter(eventId), false);
  assert.deepEqual(await outbox.stats(), { pending: 1, dead: 0 });
  assert.equal((await outbox.get(eventId))?.retryCount, 0);

  status = 204;
  assert.equal((await outbox.drain()).delivered, 1);
  assert.deepEqual(await outbox.stats(), { pending: 0, dead: 0 });
});

test('concurrent drains deliver an entry once', async () => {
  const { outbox, requests } = await setup(
    () => new Promise<DeliveryResponse>((resolve) => setTimeout(() => resolve({ status: 200, body: "ok" }), 5)),
  );
  await outbox.enqueue('call-1', 'http://localhost/webhook', { callId: 'call-1' });

  const [a, b] = await Promise.all([outbox.drain(), outbox.drain()]);

  assert.equal(requests.length, 1);
  assert.equal(a.delivered + b.delivered, 1);
  assert.equal(a.skipped + b.skipped, 1);
});

test('transport errors are recorded without a status code', async () => {
  const { outbox } = await setup(async () => {
    throw new Error('connect ECONNREFUSED');
  });
  const eventId = await outbox.enqueue('call-1', 'http://localhost/webhook', { callId: 'call-1' });

  assert.equal((await outbox.drain()).retried, 1);
  const entry = await outbox.get(eventId);
  assert.equal(entry?.lastError, 'connect ECONNREFUSED');
  assert.equal(entry?.lastStatusCode, undefined);
});

test('requests carry the event envelope and a verifiable signature', async () => {
  const { outbox, requests } = await setup(sequence(200));
  const eventId = await outbox.enqueue('call-1', 'http://localhost/webhook', { callId: 'call-1', turns: 4 });

  await outbox.drain();

  const [request] = requests;
  assert.equal(request.url, 'http://localhost/webhook');
  assert.equal(request.timeoutMs, 5 * SECOND);
  assert.deepEqual(JSON.parse(request.body), {
    eventType: 'call.profile.completed',
    eventId,
    callId: 'call-1',
    timestamp: '2024-01-01T00:00:00.000Z',
    profile: { callId: 'call-1', turns: 4 },
  });

  const timestamp = String(START / 1000);
  const expected = createHmac('sha256', 'test-secret').update(`${timestamp}.${request.body}`).digest('hex');
  assert.deepEqual(request.headers, {
    'Content-Type': 'application/json',
    'User-Agent': 'interview-call-pipeline/1.0',
    'X-Event-Type': 'call.profile.completed',
    'X-Event-Id': eventId,
    'Idempotency-Key': eventId,
    'X-Call-Id': 'call-1',
    'X-Webhook-Timestamp': timestamp,
    'X-Webhook-Signature': `sha256=${expected}`,
  });
});

test('index members without a readable entry are dropped', async () => {
  const { outbox, store, requests } = await setup(sequence(200));
  await store.addToIndex('test_outbox:due', 'ghost', START);
  await store.set('test_outbox:entry:broken', '{not json');
  await store.addToIndex('test_outbox:due', 'broken', START);

  const stats = await outbox.drain();

  assert.deepEqual(stats, { processed: 0, delivered: 0, retried: 0, deadLettered: 0, skipped: 2, errors: 0 });
  assert.equal(requests.length, 0);
  assert.deepEqual(await outbox.stats(), { pending: 0, dead: 0 });
});

test('an entry that cannot be indexed is removed and the enqueue fails', async () => {
  const { outbox, store } = await setup(sequence(200));
  store.addToIndex = async () => {
    throw new Error('store timeout');
  };

  await assert.rejects(
    outbox.enqueue('call-1', 'http://localhost/webhook', { callId: 'call-1' }, { eventId: 'evt-1' }),
    /store timeout/,
  );
  assert.equal(await store.get('test_outbox:entry:evt-1'), null);
});

test('a drain releases only the lease it still holds', async () => {
  const lockKey = 'test_outbox:lock:evt-1';
  let duringDelivery = async (): Promise<void> => {};
  const { outbox, store, requests } = await setup(async () => {
    await duringDelivery();
    return { status: 200, body: 'ok' };
  });
  duringDelivery = async () => {
    // The first lease ran out and another drain claimed the entry.
    await store.delete(lockKey);
    await store.setIfAbsent(lockKey, 'other-drain', 120 * SECOND);
  };
  await outbox.enqueue('call-1', 'http://localhost/webhook', { callId: 'call-1' }, { eventId: 'evt-1' });

  assert.equal((await outbox.drain()).delivered, 1);
  assert.equal(requests.length, 1);
  assert.equal(await store.get(lockKey), 'other-drain');
});
