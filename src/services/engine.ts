/**
 * Progression Engine
 *
 * Entry point for transport events and read queries. Every state change runs
 * inside StateStore.mutate(); notifications are sent after the mutation has
 * finished and never block it.
 */

import type { ProgressionSettings } from '../config.js';
import type { StateStore } from '../db/store.js';
import type { INotificationSink } from '../packages/core/ports/INotificationSink.js';
import { ForbiddenError, ValidationError, errorMessage } from '../utils/errors.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { previousDateKey } from '../utils/dates.js';
import { applyAchievements, describeAchievements } from './achievements.js';
import { computeDeltas, DailyStatsAggregator, type RolloverResult } from './dailyStats.js';
import { LeaderboardService } from './leaderboard.js';
import type { ProgressionCalculator } from './progression.js';
import {
  XpAwardPipeline,
  type MessageAwardResult,
  type VoiceAwardResult,
} from './xp.js';
import type {
  AddXpResult,
  AwardSource,
  DailyReport,
  DailyStatsComparison,
  DateKey,
  GuildContext,
  LeaderboardEntry,
  ProfileView,
  ProgressNotification,
  ServerTotals,
  UserId,
} from '../types/index.js';

/**
 * Longest events text accepted by setEventsMessage
 */
export const MAX_EVENTS_MESSAGE_LENGTH = 2000;

export interface ProgressionEngineOptions {
  store: StateStore;
  calculator: ProgressionCalculator;
  settings: ProgressionSettings;
  /** Users listed in the daily report */
  topCount: number;
  adminUserId?: string;
  notifier?: INotificationSink;
  random?: () => number;
  logger?: typeof defaultLogger;
}

export class ProgressionEngine {
  readonly leaderboard: LeaderboardService;
  readonly dailyStats: DailyStatsAggregator;
  readonly xp: XpAwardPipeline;

  private readonly store: StateStore;
  private readonly calculator: ProgressionCalculator;
  private readonly topCount: number;
  private readonly adminUserId: string | undefined;
  private notifier: INotificationSink | undefined;
  private readonly logger: typeof defaultLogger;

  constructor(options: ProgressionEngineOptions) {
    this.store = options.store;
    this.calculator = options.calculator;
    this.topCount = options.topCount;
    this.adminUserId = options.adminUserId;
    this.notifier = options.notifier;
    this.logger = options.logger ?? defaultLogger;

    this.dailyStats = new DailyStatsAggregator(this.store, this.logger);
    this.leaderboard = new LeaderboardService(
      this.store,
      this.calculator,
      options.settings.voiceWeightFactor
    );
    this.xp = new XpAwardPipeline(this.store, this.calculator, this.dailyStats, options.settings, {
      random: options.random,
      logger: this.logger,
    });
  }

  /**
   * Attach the transport that delivers notifications
   */
  setNotifier(notifier: INotificationSink): void {
    this.notifier = notifier;
  }

  // ===========================================================================
  // Inbound events
  // ===========================================================================

  /**
   * A guild message was sent
   * @returns the award, or null when nothing was awarded
   */
  onMessage(userId: UserId, context: GuildContext, now: Date = new Date()): MessageAwardResult | null {
    const award = this.store.mutate('message', (state) => {
      state.totalServerMessages += 1;

      const result = this.xp.awardMessageXp(state, userId, now);
      if (!result) {
        return null;
      }

      const user = this.store.getOrCreateUser(state, userId);
      result.unlocked.push(...applyAchievements(user, this.leaderboard.rank(userId)));
      return result;
    });

    if (award) {
      this.announce(userId, award, 'message', context.channelId);
    }
    return award ?? null;
  }

  /**
   * User joined a voice channel
   */
  onVoiceJoin(userId: UserId, now: Date = new Date()): void {
    this.store.mutate('voiceJoin', (state) => {
      state.voiceSessions.set(userId, now.getTime());
    });
  }

  /**
   * User left voice. Closes the session and awards XP for it.
   * @returns the award, or null for an unknown or too short session
   */
  onVoiceLeave(userId: UserId, now: Date = new Date()): VoiceAwardResult | null {
    const award = this.store.mutate('voiceLeave', (state) => {
      const startedAt = state.voiceSessions.get(userId);
      if (startedAt === undefined) {
        return null;
      }
      state.voiceSessions.delete(userId);

      const minutes = Math.max(0, now.getTime() - startedAt) / 60_000;
      return this.xp.awardVoiceXp(state, userId, minutes, now);
    });

    if (award) {
      this.announce(userId, award, 'voice', null);
    }
    return award ?? null;
  }

  /**
   * A member joined the guild
   */
  onMemberJoin(now: Date = new Date()): void {
    this.store.mutate('memberJoin', (state) => {
      this.dailyStats.record(state, now, null, { newMember: true });
    });
  }

  /**
   * Roll the daily counters over if the date changed
   */
  ensureCurrentDay(now: Date = new Date()): RolloverResult {
    return (
      this.store.mutate('rollover', (state) => this.dailyStats.ensureCurrentDay(state, now)) ?? {
        frozenDate: null,
        reset: false,
      }
    );
  }

  // ===========================================================================
  // Read queries
  // ===========================================================================

  /**
   * Profile for a user; never-seen users get zero values
   */
  getProfile(userId: UserId): ProfileView {
    const user = this.store.getUser(userId);
    const xp = user?.xp ?? 0;
    const level = user?.level ?? 0;
    const { progress, requirementForNext } = this.calculator.progressInLevel(xp, level);

    return {
      userId,
      xp,
      level,
      prestige: user?.prestige ?? 0,
      progress,
      requirementForNext,
      rank: this.leaderboard.rank(userId),
      score: this.leaderboard.score(userId),
      messageCount: user?.messageCount ?? 0,
      voiceMinutes: user?.voiceMinutes ?? 0,
      dailyStreak: user?.dailyStreak ?? 0,
      achievements: user ? describeAchievements(user.achievements) : [],
    };
  }

  getLeaderboard(limit?: number): LeaderboardEntry[] {
    return this.leaderboard.getLeaderboard(limit);
  }

  getComparison(now: Date = new Date()): DailyStatsComparison {
    return this.dailyStats.comparison(now);
  }

  getServerTotals(): ServerTotals {
    return this.leaderboard.totals();
  }

  /**
   * Report for a finished day
   * @returns null when no history exists for the date
   */
  buildDailyReport(date: DateKey): DailyReport | null {
    const summary = this.dailyStats.getHistory(date);
    if (!summary) {
      return null;
    }

    const previous = this.dailyStats.getHistory(previousDateKey(date));
    const activeUsers = this.dailyStats.getActiveUsers(date);

    return {
      date,
      summary,
      previous,
      deltas: previous ? computeDeltas(summary, previous) : null,
      // Prefer the day's own active users; fall back to the overall board after a restart
      topUsers: activeUsers
        ? this.leaderboard.topAmong(activeUsers, this.topCount)
        : this.leaderboard.getLeaderboard(this.topCount),
      totals: this.leaderboard.totals(),
      averageXpPerMessage: summary.messages > 0 ? summary.xpGained / summary.messages : null,
      averageVoiceMinutesPerUser:
        summary.activeUsers > 0 ? summary.voiceMinutes / summary.activeUsers : null,
    };
  }

  // ===========================================================================
  // Events text
  // ===========================================================================

  getEventsMessage(): string {
    return this.store.getEventsMessage();
  }

  /**
   * Replace the events text. Administrator only.
   */
  setEventsMessage(requesterId: UserId, text: string): void {
    if (this.adminUserId === undefined || requesterId !== this.adminUserId) {
      throw new ForbiddenError('Only the administrator can update events');
    }

    const trimmed = text.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('Events message cannot be empty', 'text');
    }
    if (trimmed.length > MAX_EVENTS_MESSAGE_LENGTH) {
      throw new ValidationError(
        `Events message cannot exceed ${MAX_EVENTS_MESSAGE_LENGTH} characters`,
        'text'
      );
    }

    this.store.mutate('setEvents', (state) => {
      state.eventsMessage = trimmed;
    });
    this.logger.info({ requesterId, length: trimmed.length }, 'Events message updated');
  }

  // ===========================================================================
  // Notifications
  // ===========================================================================

  private announce(
    userId: UserId,
    result: AddXpResult,
    source: AwardSource,
    channelId: string | null
  ): void {
    let notification: ProgressNotification | null = null;
    if (result.prestiged) {
      const prestige = this.store.getUser(userId)?.prestige ?? 0;
      notification = { kind: 'prestige', userId, prestige, source, channelId };
    } else if (result.leveledUp) {
      notification = { kind: 'levelUp', userId, level: result.newLevel, source, channelId };
    }

    if (notification) {
      this.dispatch(notification);
    }
  }

  private dispatch(notification: ProgressNotification): void {
    const notifier = this.notifier;
    if (!notifier) {
      return;
    }

    Promise.resolve()
      .then(() => notifier.notify(notification))
      .catch((error) => {
        this.logger.error(
          { kind: notification.kind, userId: notification.userId, error: errorMessage(error) },
          'Failed to deliver notification'
        );
      });
  }
}
