import { log } from '../log';
import { setOutboxGauges } from '../metrics';
import type { DeliveryOutbox } from './outbox';
import type { DrainStats } from './types';

export interface OutboxWorkerOptions {
  intervalMs: number;
  batchSize: number;
}

/**
 * Polls the outbox on a timer. A full batch is followed immediately by
 * another drain; otherwise the worker waits for the next interval.
 */
export class OutboxWorker {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<DrainStats | null> | null = null;
  private stopped = true;

  constructor(
    private readonly outbox: DeliveryOutbox,
    private readonly options: OutboxWorkerOptions,
  ) {}

  get running(): boolean {
    return !this.stopped;
  }

  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    log.info(
      { event: 'outbox_worker_started', interval_ms: this.options.intervalMs, batch_size: this.options.batchSize },
      'outbox worker started',
    );
    this.schedule(0);
  }

  /** Runs one drain now; concurrent callers share the drain already in progress. */
  async runOnce(): Promise<DrainStats | null> {
    if (!this.inFlight) {
      this.inFlight = this.drainSafely().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Stops scheduling and waits for a drain in progress to finish. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    log.info({ event: 'outbox_worker_stopped' }, 'outbox worker stopped');
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
    this.timer.unref?.();
  }

  private async tick(): Promise<void> {
    const stats = await this.runOnce();
    if (this.stopped) {
      return;
    }
    const backlog = stats !== null && stats.processed >= this.options.batchSize;
    this.schedule(backlog ? 0 : this.options.intervalMs);
  }

  private async drainSafely(): Promise<DrainStats | null> {
    try {
      const stats = await this.outbox.drain(this.options.batchSize);
      setOutboxGauges(await this.outbox.stats());
      if (stats.processed > 0 || stats.errors > 0) {
        log.info({ event: 'outbox_drained', ...stats }, 'outbox drained');
      }
      return stats;
    } catch (error) {
      log.error({ err: error, event: 'outbox_drain_failed' }, 'outbox drain failed');
      return null;
    }
  }
}
