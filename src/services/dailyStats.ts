/**
 * Daily Stats Aggregator
 *
 * Accumulates server activity for the current calendar day and rolls it into
 * history when the date changes. The rollover is keyed on date comparison, so
 * it is idempotent and catches up after downtime.
 *
 * States:
 * - accumulating: stored date == today
 * - needs-rollover: stored date != today (including the initial empty date)
 */

import type { EngineState, StateStore } from '../db/store.js';
import { emptyDailyStats, summarizeDailyStats } from '../db/snapshot.js';
import { previousDateKey, toDateKey } from '../utils/dates.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type {
  DailyStatsComparison,
  DailyStatsDelta,
  DailyStatsDeltas,
  DailySummary,
  DateKey,
  UserId,
} from '../types/index.js';

/**
 * Outcome of ensureCurrentDay
 */
export interface RolloverResult {
  /** Day that was frozen into history, or null when nothing was frozen */
  frozenDate: DateKey | null;
  /** Whether the live counters were reset */
  reset: boolean;
}

/**
 * Finished days whose active user ids are kept in memory for reporting
 */
const RETAINED_ACTIVE_USER_DAYS = 7;

function nonNegative(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Keep a frozen day's active user ids; history itself keeps only the count
 */
function retainActiveUsers(state: EngineState, date: DateKey, users: ReadonlySet<UserId>): void {
  state.frozenActiveUsers.set(date, new Set(users));
  while (state.frozenActiveUsers.size > RETAINED_ACTIVE_USER_DAYS) {
    const oldest = state.frozenActiveUsers.keys().next();
    if (oldest.done) {
      break;
    }
    state.frozenActiveUsers.delete(oldest.value);
  }
}

/**
 * Headline deltas between two daily summaries
 */
export function computeDeltas(today: DailySummary, previous: DailySummary): DailyStatsDeltas {
  return {
    messages: today.messages - previous.messages,
    activeUsers: today.activeUsers - previous.activeUsers,
    xpGained: today.xpGained - previous.xpGained,
  };
}

export class DailyStatsAggregator {
  private readonly logger: typeof defaultLogger;

  constructor(
    private readonly store: StateStore,
    logger: typeof defaultLogger = defaultLogger
  ) {
    this.logger = logger;
  }

  /**
   * Roll the live counters over when the calendar date has changed.
   * Takes the state handed to a mutate() callback.
   */
  ensureCurrentDay(state: EngineState, now: Date): RolloverResult {
    const today = toDateKey(now);
    const current = state.dailyStats;

    if (current.date === today) {
      return { frozenDate: null, reset: false };
    }

    let frozenDate: DateKey | null = null;
    if (current.date !== '') {
      if (state.dailyHistory.has(current.date)) {
        this.logger.warn({ date: current.date }, 'History entry already exists, keeping the original');
      } else {
        state.dailyHistory.set(current.date, summarizeDailyStats(current));
        frozenDate = current.date;
        retainActiveUsers(state, current.date, current.activeUsers);
      }
    }

    state.dailyStats = emptyDailyStats(today);
    this.logger.info({ previousDate: current.date || null, date: today }, 'Daily stats rolled over');

    return { frozenDate, reset: true };
  }

  /**
   * Add activity to today's counters.
   * userId is null for events without a user (member joins).
   */
  record(state: EngineState, now: Date, userId: UserId | null, delta: DailyStatsDelta): void {
    this.ensureCurrentDay(state, now);
    const stats = state.dailyStats;

    stats.messages += nonNegative(delta.messages);
    stats.xpGained += nonNegative(delta.xp);
    stats.voiceMinutes += nonNegative(delta.voiceMinutes);
    if (userId !== null) {
      stats.activeUsers.add(userId);
    }
    if (delta.levelUp) {
      stats.levelUps += 1;
    }
    if (delta.prestige) {
      stats.prestiges += 1;
    }
    if (delta.newMember) {
      stats.newMembers += 1;
    }
  }

  /**
   * Today's live stats against yesterday's.
   *
   * Read-only: when the live counters still belong to yesterday (no rollover
   * yet), they are reported as yesterday and today is empty.
   */
  comparison(now: Date): DailyStatsComparison {
    const today = toDateKey(now);
    const yesterday = previousDateKey(today);
    const live = this.store.getDailyStats();

    const todaySummary = live.date === today
      ? summarizeDailyStats(live)
      : summarizeDailyStats(emptyDailyStats(today));

    let previous: DailySummary | null = this.store.getDailyHistory().get(yesterday) ?? null;
    if (!previous && live.date === yesterday) {
      previous = summarizeDailyStats(live);
    }

    return {
      date: today,
      today: todaySummary,
      previous,
      deltas: previous ? computeDeltas(todaySummary, previous) : null,
    };
  }

  /**
   * Active user ids of a recently frozen day.
   * null after a restart or once the day is older than the retention window.
   */
  getActiveUsers(date: DateKey): ReadonlySet<UserId> | null {
    return this.store.getFrozenActiveUsers(date) ?? null;
  }

  /**
   * Frozen summary for a past day
   */
  getHistory(date: DateKey): DailySummary | null {
    return this.store.getDailyHistory().get(date) ?? null;
  }
}
