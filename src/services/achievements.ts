/**
 * Achievement Evaluator
 *
 * Stateless threshold rules over a user's progression metrics.
 * Each rule is checked on every relevant event; granting is idempotent and
 * achievements are never revoked.
 */

import type {
  AchievementDefinition,
  AchievementId,
  UserProgress,
} from '../types/index.js';

/**
 * Achievement catalog, in display order
 */
export const ACHIEVEMENTS: readonly AchievementDefinition[] = [
  { id: 'first_message', name: 'First Steps', description: 'Send your first message', emoji: '👶' },
  { id: '100_xp', name: 'Getting Started', description: 'Reach 100 XP', emoji: '🌱' },
  { id: '1000_xp', name: 'Experienced', description: 'Reach 1000 XP', emoji: '💪' },
  { id: 'level_10', name: 'Double Digits', description: 'Reach level 10', emoji: '🔟' },
  { id: 'level_25', name: 'Quarter Century', description: 'Reach level 25', emoji: '🎯' },
  { id: 'first_prestige', name: 'Prestige Master', description: 'Achieve your first prestige', emoji: '⭐' },
  { id: '10_day_streak', name: 'Dedicated', description: 'Maintain a 10-day streak', emoji: '🔥' },
  { id: 'voice_hour', name: 'Socializer', description: 'Spend 60 minutes in voice', emoji: '🎤' },
  { id: 'top_3', name: 'Podium Finish', description: 'Reach top 3 on leaderboard', emoji: '🏆' },
];

const ACHIEVEMENT_BY_ID = new Map<AchievementId, AchievementDefinition>(
  ACHIEVEMENTS.map((achievement) => [achievement.id, achievement])
);

/**
 * Metrics the rules are evaluated against
 */
export interface AchievementContext {
  progress: Pick<UserProgress, 'xp' | 'level' | 'prestige' | 'messageCount' | 'voiceMinutes' | 'dailyStreak'>;
  /** Leaderboard rank, when the caller has computed it */
  rank?: number;
}

/**
 * A single unlock rule
 */
export interface AchievementRule {
  id: AchievementId;
  unlocked: (context: AchievementContext) => boolean;
}

/**
 * Unlock thresholds
 */
export const ACHIEVEMENT_THRESHOLDS = {
  xp100: 100,
  xp1000: 1000,
  level10: 10,
  level25: 25,
  streakDays: 10,
  voiceMinutes: 60,
  topRank: 3,
} as const;

export const ACHIEVEMENT_RULES: readonly AchievementRule[] = [
  { id: 'first_message', unlocked: ({ progress }) => progress.messageCount >= 1 },
  { id: '100_xp', unlocked: ({ progress }) => progress.xp >= ACHIEVEMENT_THRESHOLDS.xp100 },
  { id: '1000_xp', unlocked: ({ progress }) => progress.xp >= ACHIEVEMENT_THRESHOLDS.xp1000 },
  { id: 'level_10', unlocked: ({ progress }) => progress.level >= ACHIEVEMENT_THRESHOLDS.level10 },
  { id: 'level_25', unlocked: ({ progress }) => progress.level >= ACHIEVEMENT_THRESHOLDS.level25 },
  { id: 'first_prestige', unlocked: ({ progress }) => progress.prestige >= 1 },
  { id: '10_day_streak', unlocked: ({ progress }) => progress.dailyStreak >= ACHIEVEMENT_THRESHOLDS.streakDays },
  { id: 'voice_hour', unlocked: ({ progress }) => progress.voiceMinutes >= ACHIEVEMENT_THRESHOLDS.voiceMinutes },
  {
    id: 'top_3',
    unlocked: ({ rank }) => rank !== undefined && rank >= 1 && rank <= ACHIEVEMENT_THRESHOLDS.topRank,
  },
];

/**
 * Ids whose rule holds for the context and that are not already held
 */
export function evaluateAchievements(
  context: AchievementContext,
  held: ReadonlySet<AchievementId>
): AchievementId[] {
  return ACHIEVEMENT_RULES
    .filter((rule) => !held.has(rule.id) && rule.unlocked(context))
    .map((rule) => rule.id);
}

/**
 * Evaluate the rules and add newly unlocked ids to the user's set
 * @returns The ids unlocked by this call
 */
export function applyAchievements(user: UserProgress, rank?: number): AchievementId[] {
  const unlocked = evaluateAchievements({ progress: user, rank }, user.achievements);
  for (const id of unlocked) {
    user.achievements.add(id);
  }
  return unlocked;
}

/**
 * Grant one achievement directly
 * @returns true when it was not held before
 */
export function grantAchievement(user: UserProgress, id: AchievementId): boolean {
  if (user.achievements.has(id)) {
    return false;
  }
  user.achievements.add(id);
  return true;
}

export function getAchievementDefinition(id: AchievementId): AchievementDefinition | undefined {
  return ACHIEVEMENT_BY_ID.get(id);
}

export function isAchievementId(value: string): value is AchievementId {
  return ACHIEVEMENTS.some((achievement) => achievement.id === value);
}

/**
 * Catalog entries for a user's held achievements, in catalog order
 */
export function describeAchievements(held: ReadonlySet<AchievementId>): AchievementDefinition[] {
  return ACHIEVEMENTS.filter((achievement) => held.has(achievement.id));
}
