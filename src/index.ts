/**
 * Levelup Service Entry Point
 *
 * Discord progression bot. This service:
 * - Awards XP for messages and voice time, with levels, prestige and achievements
 * - Keeps a composite-score leaderboard
 * - Aggregates daily server stats and posts a report when each day ends
 * - Persists everything to a JSON snapshot
 */

import { config } from './config.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { ensureSnapshotDirectory } from './db/file-storage.js';
import { createEngineServices } from './services/index.js';
import { DiscordService } from './services/discord.js';
import { SnapshotJob } from './jobs/snapshot-job.js';
import { DailyReportJob } from './jobs/daily-report.js';
import { DelayedActionScheduler } from './jobs/delayed-action.js';

async function main() {
  const token = config.discord.botToken;
  if (!token) {
    logger.fatal('DISCORD_BOT_TOKEN is not set');
    process.exit(1);
  }

  logger.info({ dataFile: config.persistence.dataFile }, 'Starting Levelup Service');

  // Fatal when the data directory is missing or read-only
  await ensureSnapshotDirectory(config.persistence.dataFile);

  const { store, engine } = createEngineServices(config);
  await store.load();

  const lastSeenDate = store.getDailyStats().date || null;
  engine.ensureCurrentDay();

  const scheduler = new DelayedActionScheduler();
  const discord = new DiscordService({
    token,
    context: { engine, store, scheduler, config },
  });
  engine.setNotifier(discord);

  const snapshotJob = new SnapshotJob({
    store,
    intervalMs: config.persistence.snapshotIntervalMs,
  });
  const reportJob = new DailyReportJob({
    engine,
    sink: discord,
    lastSeenDate,
    intervalMs: config.jobs.reportCheckIntervalMs,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, saving data...');

    snapshotJob.stop();
    reportJob.stop();
    scheduler.cancelAll();

    try {
      await discord.disconnect();
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error disconnecting from Discord');
    }

    const saved = await store.save();
    logger.info({ saved }, 'Shutdown complete');
    process.exit(saved ? 0 : 1);
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason: errorMessage(reason) }, 'Unhandled rejection');
  });

  snapshotJob.start();
  reportJob.start();

  await discord.connect();
  logger.info('Levelup Service started successfully');
}

main().catch((error) => {
  logger.fatal({ error: errorMessage(error) }, 'Failed to start Levelup Service');
  process.exit(1);
});
