/**
 * Snapshot Job
 *
 * Persists the engine state every snapshotIntervalMs. A failed save is logged
 * by the store and retried on the next tick; the previous file stays valid.
 *
 * @module jobs/snapshot-job
 */

import type { StateStore } from '../db/store.js';
import { logger as defaultLogger } from '../utils/logger.js';

export interface SnapshotJobConfig {
  store: StateStore;
  /** Save interval in milliseconds. Default: 300000 (5 minutes) */
  intervalMs?: number;
  logger?: typeof defaultLogger;
}

export class SnapshotJob {
  private store: StateStore;
  private intervalMs: number;
  private logger: typeof defaultLogger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(config: SnapshotJobConfig) {
    this.store = config.store;
    this.intervalMs = config.intervalMs ?? 300_000;
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Run one save. A tick that lands while the previous save is still writing
   * is skipped.
   */
  async execute(): Promise<boolean> {
    if (this.running) {
      this.logger.debug({ event: 'snapshot_job.skipped' }, 'Previous snapshot still in progress');
      return false;
    }

    this.running = true;
    try {
      return await this.store.save();
    } finally {
      this.running = false;
    }
  }

  start(): void {
    if (this.timer) return;
    this.logger.info({ event: 'snapshot_job.started', intervalMs: this.intervalMs },
      `Snapshot job started (interval: ${this.intervalMs}ms)`);
    this.timer = setInterval(() => {
      this.execute().catch((error) => {
        this.logger.error({ event: 'snapshot_job.error', error }, 'Snapshot job failed');
      });
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info({ event: 'snapshot_job.stopped' }, 'Snapshot job stopped');
    }
  }
}
