import type { Config } from '../config.js';
import { FileSnapshotStorage } from '../db/file-storage.js';
import { StateStore } from '../db/store.js';
import type { ISnapshotStorage } from '../packages/core/ports/ISnapshotStorage.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { ProgressionEngine } from './engine.js';
import { ProgressionCalculator } from './progression.js';

export { ProgressionCalculator } from './progression.js';
export { LeaderboardService } from './leaderboard.js';
export { DailyStatsAggregator, computeDeltas } from './dailyStats.js';
export { XpAwardPipeline } from './xp.js';
export { ProgressionEngine } from './engine.js';
export * from './achievements.js';

export interface EngineServices {
  calculator: ProgressionCalculator;
  store: StateStore;
  engine: ProgressionEngine;
}

export interface EngineServicesOptions {
  /** Snapshot backend; defaults to the configured JSON file */
  storage?: ISnapshotStorage;
  random?: () => number;
  logger?: typeof defaultLogger;
}

/**
 * Wire the calculator, store and engine from configuration
 */
export function createEngineServices(cfg: Config, options: EngineServicesOptions = {}): EngineServices {
  const calculator = new ProgressionCalculator(cfg.progression);
  const store = new StateStore({
    storage: options.storage ?? new FileSnapshotStorage(cfg.persistence.dataFile),
    levelFromXp: (xp) => calculator.levelFromXp(xp),
    logger: options.logger,
  });
  const engine = new ProgressionEngine({
    store,
    calculator,
    settings: cfg.progression,
    topCount: cfg.stats.topCount,
    adminUserId: cfg.discord.adminUserId,
    random: options.random,
    logger: options.logger,
  });

  return { calculator, store, engine };
}
