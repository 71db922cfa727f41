import { env } from './env';
import { log } from './log';
import { createRuntime } from './pipeline/runtime';
import { buildServer } from './server';

const runtime = createRuntime();
const { server } = buildServer({ pipeline: runtime.pipeline, queue: runtime.queue, store: runtime.store });

server.listen(env.PORT, () => {
  log.info({ port: env.PORT, state_store: env.STATE_STORE }, 'server listening');
});

runtime.worker.start();

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ event: 'shutdown', signal }, 'shutting down');

  await new Promise<void>((resolve) => {
    server.close((error) => {
      if (error) {
        log.warn({ err: error, event: 'server_close_failed' }, 'server close failed');
      }
      resolve();
    });
  });
  await runtime.worker.stop();
  await runtime.store.close();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ err: error, event: 'shutdown_failed' }, 'shutdown failed');
        process.exit(1);
      });
  });
}
