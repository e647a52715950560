/**
 * XP Award Pipeline
 *
 * Turns messages and finished voice sessions into XP, applies the daily and
 * streak bonuses, and runs the level/prestige transition. Every method takes
 * the state handed to a StateStore.mutate() callback.
 *
 * Message XP:
 *   (baseMessageXp * dailyMultiplier * streakMultiplier) + bonus
 *
 * The daily multiplier applies to the first message of a calendar day, the
 * streak multiplier once the streak reaches streakBonusDays; the random bonus
 * is added after both and is not multiplied.
 */

import type { ProgressionSettings } from '../config.js';
import type { EngineState, StateStore } from '../db/store.js';
import { previousDateKey, toDateKey } from '../utils/dates.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { applyAchievements, grantAchievement } from './achievements.js';
import type { DailyStatsAggregator } from './dailyStats.js';
import type { ProgressionCalculator } from './progression.js';
import type { AddXpResult, UserId, UserProgress } from '../types/index.js';

/**
 * Shortest voice session that earns XP, in minutes
 */
export const MIN_VOICE_SESSION_MINUTES = 1;

/**
 * Tuning values the pipeline reads
 */
export type XpSettings = Pick<
  ProgressionSettings,
  | 'baseMessageXp'
  | 'bonusXpChance'
  | 'bonusXpMin'
  | 'bonusXpMax'
  | 'voiceXpPerMinute'
  | 'dailyBonusMultiplier'
  | 'streakBonusDays'
  | 'streakBonusMultiplier'
  | 'prestigeThreshold'
  | 'antispamCooldownSeconds'
>;

/**
 * Result of a message that earned XP
 */
export interface MessageAwardResult extends AddXpResult {
  xpGained: number;
  /** Random bonus included in xpGained */
  bonusXp: number;
  /** Whether this was the user's first XP message of the day */
  dailyBonusApplied: boolean;
}

/**
 * Result of a voice session that earned XP
 */
export interface VoiceAwardResult extends AddXpResult {
  xpGained: number;
  minutes: number;
}

export interface XpAwardPipelineOptions {
  /** Uniform random source in [0, 1) */
  random?: () => number;
  logger?: typeof defaultLogger;
}

interface MessageXp {
  total: number;
  bonus: number;
  dailyBonusApplied: boolean;
}

export class XpAwardPipeline {
  private readonly random: () => number;
  private readonly logger: typeof defaultLogger;

  constructor(
    private readonly store: StateStore,
    private readonly calculator: ProgressionCalculator,
    private readonly dailyStats: DailyStatsAggregator,
    private readonly settings: XpSettings,
    options: XpAwardPipelineOptions = {}
  ) {
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Award XP for a message.
   * @returns null when the user is still on cooldown
   */
  awardMessageXp(state: EngineState, userId: UserId, now: Date): MessageAwardResult | null {
    const user = this.store.getOrCreateUser(state, userId);
    const nowMs = now.getTime();
    const cooldownMs = this.settings.antispamCooldownSeconds * 1000;

    if (user.lastMessageAt !== null && nowMs - user.lastMessageAt < cooldownMs) {
      return null;
    }
    user.lastMessageAt = nowMs;

    const earned = this.computeMessageXp(user, now);
    user.messageCount += 1;

    const result = this.applyXp(state, userId, user, earned.total, now);
    this.dailyStats.record(state, now, userId, { messages: 1, xp: earned.total });

    return {
      ...result,
      xpGained: earned.total,
      bonusXp: earned.bonus,
      dailyBonusApplied: earned.dailyBonusApplied,
    };
  }

  /**
   * Award XP for a finished voice session.
   * @returns null when the session was shorter than a minute
   */
  awardVoiceXp(
    state: EngineState,
    userId: UserId,
    durationMinutes: number,
    now: Date
  ): VoiceAwardResult | null {
    if (!Number.isFinite(durationMinutes) || durationMinutes < MIN_VOICE_SESSION_MINUTES) {
      return null;
    }

    const user = this.store.getOrCreateUser(state, userId);
    // Voice time is counted before the award so voice_hour sees the new total
    user.voiceMinutes += durationMinutes;

    const xpGained = durationMinutes * this.settings.voiceXpPerMinute;
    const result = this.applyXp(state, userId, user, xpGained, now);
    this.dailyStats.record(state, now, userId, { xp: xpGained, voiceMinutes: durationMinutes });

    return { ...result, xpGained, minutes: durationMinutes };
  }

  /**
   * Add XP to a user and run the level/prestige transition.
   *
   * Crossing the prestige threshold resets XP and level to 0 and increments
   * prestige exactly once, however far the award overshoots. Non-finite,
   * zero or negative amounts are rejected without touching the user.
   */
  addXp(state: EngineState, userId: UserId, amount: number, now: Date = new Date()): AddXpResult {
    if (!Number.isFinite(amount) || amount <= 0) {
      this.logger.warn({ userId, amount }, 'Rejected non-positive XP amount');
      const existing = state.users.get(userId);
      return { leveledUp: false, newLevel: existing?.level ?? 0, prestiged: false, unlocked: [] };
    }

    const user = this.store.getOrCreateUser(state, userId);
    const oldLevel = user.level;
    user.xp += amount;
    user.level = this.calculator.levelFromXp(user.xp);
    const newLevel = user.level;

    const unlocked = applyAchievements(user);
    const threshold = this.settings.prestigeThreshold;

    if (newLevel >= threshold && oldLevel < threshold) {
      user.prestige += 1;
      user.xp = 0;
      user.level = 0;
      if (grantAchievement(user, 'first_prestige')) {
        unlocked.push('first_prestige');
      }
      this.dailyStats.record(state, now, userId, { prestige: true });
      this.logger.info({ userId, prestige: user.prestige }, 'User prestiged');
      return { leveledUp: false, newLevel: 0, prestiged: true, unlocked };
    }

    const leveledUp = newLevel > oldLevel;
    if (leveledUp) {
      this.dailyStats.record(state, now, userId, { levelUp: true });
      this.logger.debug({ userId, level: newLevel }, 'User leveled up');
    }

    return { leveledUp, newLevel, prestiged: false, unlocked };
  }

  /**
   * Message XP including bonuses. Updates the daily streak.
   */
  private computeMessageXp(user: UserProgress, now: Date): MessageXp {
    const today = toDateKey(now);
    let multiplier = 1;
    let dailyBonusApplied = false;

    if (user.lastDailyDate !== today) {
      multiplier = this.settings.dailyBonusMultiplier;
      dailyBonusApplied = true;
      user.dailyStreak = user.lastDailyDate === previousDateKey(today) ? user.dailyStreak + 1 : 1;
      user.lastDailyDate = today;
    }

    if (user.dailyStreak >= this.settings.streakBonusDays) {
      multiplier *= this.settings.streakBonusMultiplier;
    }

    let bonus = 0;
    if (this.random() < this.settings.bonusXpChance) {
      const { bonusXpMin, bonusXpMax } = this.settings;
      bonus = Math.floor(this.random() * (bonusXpMax - bonusXpMin + 1)) + bonusXpMin;
    }

    return { total: this.settings.baseMessageXp * multiplier + bonus, bonus, dailyBonusApplied };
  }

  /**
   * addXp for an earned amount; a zero amount still re-checks achievements
   */
  private applyXp(
    state: EngineState,
    userId: UserId,
    user: UserProgress,
    amount: number,
    now: Date
  ): AddXpResult {
    if (amount > 0) {
      return this.addXp(state, userId, amount, now);
    }
    return { leveledUp: false, newLevel: user.level, prestiged: false, unlocked: applyAchievements(user) };
  }
}
