import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import type { DrainStats } from '../src/outbox/types';

setTestEnv();

function drainStats(processed: number): DrainStats {
  return { processed, delivered: processed, retried: 0, deadLettered: 0, skipped: 0, errors: 0 };
}

function fakeOutbox(drain: () => Promise<DrainStats>) {
  const calls = { drain: 0 };
  const outbox = {
    drain: async () => {
      calls.drain += 1;
      return drain();
    },
    stats: async () => ({ pending: 0, dead: 0 }),
  };
  return { calls, outbox };
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

test('concurrent runOnce calls share one drain', async () => {
  const { OutboxWorker } = await import('../src/outbox/worker');
  const { calls, outbox } = fakeOutbox(async () => {
    await wait(5);
    return drainStats(1);
  });
  const worker = new OutboxWorker(outbox as never, { intervalMs: 60_000, batchSize: 10 });

  const [a, b] = await Promise.all([worker.runOnce(), worker.runOnce()]);

  assert.equal(calls.drain, 1);
  assert.deepEqual(a, drainStats(1));
  assert.deepEqual(b, drainStats(1));
});

test('a failing drain is reported as null', async () => {
  const { OutboxWorker } = await import('../src/outbox/worker');
  const { outbox } = fakeOutbox(async () => {
    throw new Error('store unavailable');
  });
  const worker = new OutboxWorker(outbox as never, { intervalMs: 60_000, batchSize: 10 });

  assert.equal(await worker.runOnce(), null);
});

test('start drains immediately and waits for the interval afterwards', async () => {
  const { OutboxWorker } = await import('../src/outbox/worker');
  const { calls, outbox } = fakeOutbox(async () => drainStats(0));
  const worker = new OutboxWorker(outbox as never, { intervalMs: 60_000, batchSize: 10 });

  worker.start();
  assert.equal(worker.running, true);
  await wait(50);
  await worker.stop();

  assert.equal(calls.drain, 1);
  assert.equal(worker.running, false);
});

test('a full batch is followed by another drain without waiting', async () => {
  const { OutboxWorker } = await import('../src/outbox/worker');
  const batches = [10, 0];
  const { calls, outbox } = fakeOutbox(async () => drainStats(batches.shift() ?? 0));
  const worker = new OutboxWorker(outbox as never, { intervalMs: 60_000, batchSize: 10 });

  worker.start();
  await wait(50);
  await worker.stop();

  assert.equal(calls.drain, 2);
});

test('stop before the first tick prevents any drain', async () => {
  const { OutboxWorker } = await import('../src/outbox/worker');
  const { calls, outbox } = fakeOutbox(async () => drainStats(0));
  const worker = new OutboxWorker(outbox as never, { intervalMs: 60_000, batchSize: 10 });

  worker.start();
  await worker.stop();
  await wait(10);

  assert.equal(calls.drain, 0);
});

test('stop waits for the drain in progress', async () => {
  const { OutboxWorker } = await import('../src/outbox/worker');
  let finished = false;
  const { outbox } = fakeOutbox(async () => {
    await wait(20);
    finished = true;
    return drainStats(1);
  });
  const worker = new OutboxWorker(outbox as never, { intervalMs: 60_000, batchSize: 10 });

  const running = worker.runOnce();
  await worker.stop();

  assert.equal(finished, true);
  assert.deepEqual(await running, drainStats(1));
});
