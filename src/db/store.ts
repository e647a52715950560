/**
 * State Store
 *
 * Owns every piece of mutable engine state and the single mutation boundary.
 * All writes go through mutate(); reads are synchronous on the event loop, so
 * a reader never observes a half-applied mutation.
 *
 * @module db/store
 */

import type { ISnapshotStorage } from '../packages/core/ports/ISnapshotStorage.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { ConcurrencyViolationError, errorMessage } from '../utils/errors.js';
import {
  DEFAULT_EVENTS_MESSAGE,
  decodeSnapshot,
  emptyDailyStats,
  emptyUserProgress,
  encodeSnapshot,
  type SnapshotDocument,
} from './snapshot.js';
import type {
  DailyStats,
  DailySummary,
  DateKey,
  UserId,
  UserProgress,
} from '../types/index.js';

/**
 * Mutable engine state
 */
export interface EngineState {
  users: Map<UserId, UserProgress>;
  /** Voice session start times (epoch ms); never persisted */
  voiceSessions: Map<UserId, number>;
  eventsMessage: string;
  totalServerMessages: number;
  dailyStats: DailyStats;
  dailyHistory: Map<DateKey, DailySummary>;
  /** Active user ids of recently frozen days, oldest first; never persisted */
  frozenActiveUsers: Map<DateKey, Set<UserId>>;
}

export interface StateStoreConfig {
  storage: ISnapshotStorage;
  /** Maps XP to a level when restoring a snapshot */
  levelFromXp: (xp: number) => number;
  /**
   * Throw on overlapping mutations instead of skipping them.
   * Default: true unless NODE_ENV is production.
   */
  strictMutations?: boolean;
  logger?: typeof defaultLogger;
}

function createEmptyState(): EngineState {
  return {
    users: new Map(),
    voiceSessions: new Map(),
    eventsMessage: DEFAULT_EVENTS_MESSAGE,
    totalServerMessages: 0,
    dailyStats: emptyDailyStats(),
    dailyHistory: new Map(),
    frozenActiveUsers: new Map(),
  };
}

export class StateStore {
  private state: EngineState = createEmptyState();
  private activeMutation: string | null = null;
  private saveChain: Promise<unknown> = Promise.resolve();

  private readonly storage: ISnapshotStorage;
  private readonly levelFromXp: (xp: number) => number;
  private readonly strictMutations: boolean;
  private readonly logger: typeof defaultLogger;

  constructor(config: StateStoreConfig) {
    this.storage = config.storage;
    this.levelFromXp = config.levelFromXp;
    this.strictMutations = config.strictMutations ?? process.env.NODE_ENV !== 'production';
    this.logger = config.logger ?? defaultLogger;
  }

  // ===========================================================================
  // Mutation boundary
  // ===========================================================================

  /**
   * Run a state change inside the mutation boundary.
   *
   * Mutations must not overlap. An overlapping call throws
   * ConcurrencyViolationError in strict mode; otherwise it is logged and
   * skipped, returning undefined.
   */
  mutate<T>(operation: string, fn: (state: EngineState) => T): T | undefined {
    if (this.activeMutation !== null) {
      const violation = new ConcurrencyViolationError(operation, this.activeMutation);
      if (this.strictMutations) {
        throw violation;
      }
      this.logger.error(
        { operation, activeOperation: this.activeMutation },
        'Overlapping state mutation skipped'
      );
      return undefined;
    }

    this.activeMutation = operation;
    try {
      return fn(this.state);
    } finally {
      this.activeMutation = null;
    }
  }

  /**
   * Whether a mutation is currently running
   */
  isMutating(): boolean {
    return this.activeMutation !== null;
  }

  /**
   * Get a user's progress, creating it on first use.
   * Takes the state handed to a mutate() callback.
   */
  getOrCreateUser(state: EngineState, userId: UserId): UserProgress {
    let user = state.users.get(userId);
    if (!user) {
      user = emptyUserProgress();
      state.users.set(userId, user);
      this.logger.debug({ userId }, 'Created user progress');
    }
    return user;
  }

  // ===========================================================================
  // Read access
  // ===========================================================================

  getUser(userId: UserId): Readonly<UserProgress> | undefined {
    return this.state.users.get(userId);
  }

  users(): ReadonlyMap<UserId, Readonly<UserProgress>> {
    return this.state.users;
  }

  getDailyStats(): Readonly<DailyStats> {
    return this.state.dailyStats;
  }

  getDailyHistory(): ReadonlyMap<DateKey, DailySummary> {
    return this.state.dailyHistory;
  }

  getEventsMessage(): string {
    return this.state.eventsMessage;
  }

  getTotalServerMessages(): number {
    return this.state.totalServerMessages;
  }

  getFrozenActiveUsers(date: DateKey): ReadonlySet<UserId> | undefined {
    return this.state.frozenActiveUsers.get(date);
  }

  hasVoiceSession(userId: UserId): boolean {
    return this.state.voiceSessions.has(userId);
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  /**
   * Serialize the current state
   */
  toSnapshot(): SnapshotDocument {
    return encodeSnapshot(this.state);
  }

  /**
   * Populate state from the durable snapshot.
   * A missing snapshot is a fresh start; an unreadable or invalid one is
   * logged and leaves the defaults in place.
   *
   * @returns true when a snapshot was restored
   */
  async load(): Promise<boolean> {
    try {
      const raw = await this.storage.read();
      if (raw === null) {
        this.state = createEmptyState();
        this.logger.info({ location: this.storage.location }, 'No existing data file found, starting fresh');
        return false;
      }

      const decoded = decodeSnapshot(raw, this.levelFromXp);
      if (decoded.unknownAchievements.length > 0) {
        this.logger.warn(
          { achievements: [...new Set(decoded.unknownAchievements)] },
          'Ignoring unknown achievement ids in snapshot'
        );
      }
      if (decoded.rejectedEntries.length > 0) {
        this.logger.warn(
          { entries: decoded.rejectedEntries },
          'Dropping invalid entries in snapshot'
        );
      }

      this.state = {
        users: decoded.users,
        voiceSessions: new Map(),
        eventsMessage: decoded.eventsMessage,
        totalServerMessages: decoded.totalServerMessages,
        dailyStats: decoded.dailyStats,
        dailyHistory: decoded.dailyHistory,
        frozenActiveUsers: new Map(),
      };

      this.logger.info(
        { location: this.storage.location, users: decoded.users.size, historyDays: decoded.dailyHistory.size },
        'Data loaded successfully'
      );
      return true;
    } catch (error) {
      this.state = createEmptyState();
      this.logger.error(
        { location: this.storage.location, error: errorMessage(error) },
        'Error loading data, starting with empty state'
      );
      return false;
    }
  }

  /**
   * Persist the current state. Saves run one after another; each one
   * serializes the state at the moment it starts writing.
   *
   * @returns true when the snapshot was written
   */
  save(): Promise<boolean> {
    const run = this.saveChain.then(() => this.writeSnapshot());
    this.saveChain = run;
    return run;
  }

  private async writeSnapshot(): Promise<boolean> {
    try {
      await this.storage.write(this.toSnapshot());
      this.logger.info({ location: this.storage.location }, 'Data saved successfully');
      return true;
    } catch (error) {
      this.logger.error(
        { location: this.storage.location, error: errorMessage(error) },
        'Error saving data, previous snapshot kept'
      );
      return false;
    }
  }
}
