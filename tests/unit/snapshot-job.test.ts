/**
 * Unit Tests for SnapshotJob
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/utils/logger.js', async () => {
  const { loggerMockFactory } = await import('../helpers/logger-mock.js');
  return loggerMockFactory();
});

const { createTestEngine } = await import('../helpers/engine.js');
const { SnapshotJob } = await import('../../src/jobs/snapshot-job.js');

describe('SnapshotJob', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('saves the store on execute', async () => {
    const { store, storage } = createTestEngine();
    const job = new SnapshotJob({ store });

    expect(await job.execute()).toBe(true);
    expect(storage.writes).toBe(1);
  });

  it('skips a run while the previous save is still in progress', async () => {
    const { store, storage } = createTestEngine();
    const job = new SnapshotJob({ store });

    const first = job.execute();
    const second = job.execute();

    expect(await second).toBe(false);
    expect(await first).toBe(true);
    expect(storage.writes).toBe(1);
  });

  it('reports a failed save', async () => {
    const { store, storage } = createTestEngine();
    storage.failWrites = true;
    const job = new SnapshotJob({ store });

    expect(await job.execute()).toBe(false);
  });

  it('saves on every interval until stopped', async () => {
    const { store, storage } = createTestEngine();
    const job = new SnapshotJob({ store, intervalMs: 1000 });

    job.start();
    await vi.advanceTimersByTimeAsync(3000);
    expect(storage.writes).toBe(3);

    job.stop();
    await vi.advanceTimersByTimeAsync(3000);
    expect(storage.writes).toBe(3);
  });

  it('ignores a second start', async () => {
    const { store, storage } = createTestEngine();
    const job = new SnapshotJob({ store, intervalMs: 1000 });

    job.start();
    job.start();
    await vi.advanceTimersByTimeAsync(1000);
    job.stop();

    expect(storage.writes).toBe(1);
  });
});
