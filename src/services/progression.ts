/**
 * Progression Calculator
 *
 * Pure XP <-> level mapping on an exponential requirement curve:
 *
 *   levelRequirement(n) = floor(base * multiplier^(n-1))      (n >= 1)
 *   totalXpForLevel(n)  = sum of levelRequirement(1..n)
 *
 * totalXpForLevel is the single source of truth for cumulative requirements;
 * levelFromXp inverts exactly that table, so the two never disagree after
 * floor rounding. Levels are capped at the prestige threshold.
 */

import type { ProgressionSettings } from '../config.js';

/**
 * Curve parameters used by the calculator
 */
export type CurveSettings = Pick<
  ProgressionSettings,
  'baseXpRequirement' | 'xpMultiplier' | 'prestigeThreshold'
>;

/**
 * Progress within the current level, for progress bars
 */
export interface LevelProgress {
  /** XP earned since reaching the current level */
  progress: number;
  /** XP needed to go from the current level to the next; 0 when none is defined */
  requirementForNext: number;
}

export class ProgressionCalculator {
  readonly prestigeThreshold: number;

  private readonly base: number;
  private readonly multiplier: number;
  /** requirements[n] = levelRequirement(n), n in 0..prestigeThreshold + 1 */
  private readonly requirements: number[];
  /** cumulative[n] = totalXpForLevel(n), n in 0..prestigeThreshold */
  private readonly cumulative: number[];

  constructor(settings: CurveSettings) {
    this.base = settings.baseXpRequirement;
    this.multiplier = settings.xpMultiplier;
    this.prestigeThreshold = settings.prestigeThreshold;

    this.requirements = [];
    for (let level = 0; level <= this.prestigeThreshold + 1; level++) {
      this.requirements.push(this.computeRequirement(level));
    }

    this.cumulative = [0];
    for (let level = 1; level <= this.prestigeThreshold; level++) {
      this.cumulative.push(this.cumulative[level - 1] + this.requirements[level]);
    }
  }

  /**
   * XP needed to go from level - 1 to level
   */
  levelRequirement(level: number): number {
    if (!Number.isInteger(level) || level <= 0) {
      return 0;
    }
    return this.requirements[level] ?? this.computeRequirement(level);
  }

  /**
   * Cumulative XP needed to reach a level from zero
   */
  totalXpForLevel(level: number): number {
    if (!Number.isInteger(level) || level <= 0) {
      return 0;
    }
    const cached = this.cumulative[level];
    if (cached !== undefined) {
      return cached;
    }

    let total = this.cumulative[this.prestigeThreshold];
    for (let i = this.prestigeThreshold + 1; i <= level; i++) {
      total += this.levelRequirement(i);
    }
    return total;
  }

  /**
   * Highest level whose cumulative requirement does not exceed xp,
   * bounded to [0, prestigeThreshold]
   */
  levelFromXp(xp: number): number {
    if (!(xp > 0)) {
      return 0;
    }

    let low = 0;
    let high = this.prestigeThreshold;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.cumulative[mid] <= xp) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low;
  }

  /**
   * Position inside the current level
   */
  progressInLevel(xp: number, level: number): LevelProgress {
    return {
      progress: xp - this.totalXpForLevel(level),
      requirementForNext: level >= this.prestigeThreshold ? 0 : this.levelRequirement(level + 1),
    };
  }

  /**
   * Full XP cost of one prestige cycle; used as the per-prestige leaderboard bonus
   */
  prestigeXpValue(): number {
    return this.totalXpForLevel(this.prestigeThreshold);
  }

  private computeRequirement(level: number): number {
    if (level === 0) {
      return 0;
    }
    return Math.floor(this.base * Math.pow(this.multiplier, level - 1));
  }
}
