/**
 * Leaderboard Service
 *
 * Ranks users by a composite score:
 *
 *   score = xp + voiceMinutes * voiceWeightFactor + prestige * prestigeXpValue
 *
 * where prestigeXpValue is the full XP cost of one prestige cycle, so XP lost
 * on a prestige reset still counts. Ties keep store insertion order.
 */

import type { StateStore } from '../db/store.js';
import type { ProgressionCalculator } from './progression.js';
import type { LeaderboardEntry, ServerTotals, UserId, UserProgress } from '../types/index.js';

/**
 * Default leaderboard size
 */
export const DEFAULT_LEADERBOARD_SIZE = 10;

/**
 * Maximum leaderboard size
 */
export const MAX_LEADERBOARD_SIZE = 100;

type ScoredUser = Pick<UserProgress, 'xp' | 'voiceMinutes' | 'prestige'>;

export class LeaderboardService {
  constructor(
    private readonly store: StateStore,
    private readonly calculator: ProgressionCalculator,
    private readonly voiceWeightFactor: number
  ) {}

  /**
   * Composite score for a progress record
   */
  scoreOf(user: ScoredUser): number {
    const prestigeBonus = user.prestige > 0 ? user.prestige * this.calculator.prestigeXpValue() : 0;
    return user.xp + user.voiceMinutes * this.voiceWeightFactor + prestigeBonus;
  }

  /**
   * Score for a user id; unknown users score 0
   */
  score(userId: UserId): number {
    const user = this.store.getUser(userId);
    return user ? this.scoreOf(user) : 0;
  }

  /**
   * All users with a positive score, best first
   */
  sortedLeaderboard(): LeaderboardEntry[] {
    const scored: Array<Omit<LeaderboardEntry, 'rank'>> = [];
    for (const [userId, user] of this.store.users()) {
      const score = this.scoreOf(user);
      if (score > 0) {
        scored.push({ userId, score, level: user.level, prestige: user.prestige });
      }
    }

    // Array.prototype.sort is stable, so equal scores keep insertion order
    scored.sort((a, b) => b.score - a.score);

    return scored.map((entry, index) => ({ ...entry, rank: index + 1 }));
  }

  /**
   * Top N entries
   */
  getLeaderboard(limit: number = DEFAULT_LEADERBOARD_SIZE): LeaderboardEntry[] {
    const normalizedLimit = Math.min(MAX_LEADERBOARD_SIZE, Math.max(1, Math.floor(limit)));
    return this.sortedLeaderboard().slice(0, normalizedLimit);
  }

  /**
   * 1-based rank of a user.
   * With no recorded XP at all the rank is 1; a user missing from a
   * non-empty board is ranked just below the last entry.
   */
  rank(userId: UserId): number {
    if (this.store.users().size === 0) {
      return 1;
    }

    const board = this.sortedLeaderboard();
    const index = board.findIndex((entry) => entry.userId === userId);
    return index === -1 ? board.length + 1 : index + 1;
  }

  /**
   * Best-scoring users among a given set
   */
  topAmong(userIds: Iterable<UserId>, limit: number): LeaderboardEntry[] {
    const wanted = new Set(userIds);
    return this.sortedLeaderboard()
      .filter((entry) => wanted.has(entry.userId))
      .slice(0, limit);
  }

  /**
   * All-time server totals
   */
  totals(): ServerTotals {
    let totalXp = 0;
    let totalVoiceMinutes = 0;
    let totalPrestiges = 0;
    for (const user of this.store.users().values()) {
      totalXp += user.xp;
      totalVoiceMinutes += user.voiceMinutes;
      totalPrestiges += user.prestige;
    }

    return {
      totalMessages: this.store.getTotalServerMessages(),
      totalXp,
      totalVoiceMinutes,
      totalPrestiges,
      trackedUsers: this.store.users().size,
    };
  }
}
