/**
 * Discord user id (snowflake) kept as its decimal string form
 */
export type UserId = string;

/**
 * Calendar date in local time, formatted YYYY-MM-DD
 */
export type DateKey = string;

/**
 * Achievement identifiers
 */
export type AchievementId =
  | 'first_message'
  | '100_xp'
  | '1000_xp'
  | 'level_10'
  | 'level_25'
  | 'first_prestige'
  | '10_day_streak'
  | 'voice_hour'
  | 'top_3';

/**
 * Static achievement catalog entry
 */
export interface AchievementDefinition {
  id: AchievementId;
  name: string;
  description: string;
  emoji: string;
}

/**
 * Per-user progression state
 */
export interface UserProgress {
  /** Cumulative experience since the last prestige */
  xp: number;
  /** Always levelFromXp(xp) */
  level: number;
  /** Completed prestige cycles */
  prestige: number;
  /** Lifetime count of messages that earned XP */
  messageCount: number;
  /** Lifetime minutes spent in voice */
  voiceMinutes: number;
  /** Consecutive calendar days with at least one XP message */
  dailyStreak: number;
  /** Last date the daily bonus was granted */
  lastDailyDate: DateKey | null;
  /** Last time a message earned XP (epoch ms, not persisted) */
  lastMessageAt: number | null;
  achievements: Set<AchievementId>;
}

/**
 * Result of a single XP award
 */
export interface AddXpResult {
  leveledUp: boolean;
  newLevel: number;
  prestiged: boolean;
  /** Achievements unlocked by this award */
  unlocked: AchievementId[];
}

/**
 * Live counters for the current calendar day
 */
export interface DailyStats {
  /** Empty string before the first rollover */
  date: DateKey | '';
  messages: number;
  xpGained: number;
  voiceMinutes: number;
  activeUsers: Set<UserId>;
  levelUps: number;
  prestiges: number;
  newMembers: number;
}

/**
 * Frozen daily summary stored in history
 */
export interface DailySummary {
  messages: number;
  xpGained: number;
  voiceMinutes: number;
  activeUsers: number;
  levelUps: number;
  prestiges: number;
  newMembers: number;
}

/**
 * Increment applied to the current day's counters
 */
export interface DailyStatsDelta {
  messages?: number;
  xp?: number;
  voiceMinutes?: number;
  levelUp?: boolean;
  prestige?: boolean;
  newMember?: boolean;
}

/**
 * Day-over-day change for the headline counters
 */
export interface DailyStatsDeltas {
  messages: number;
  activeUsers: number;
  xpGained: number;
}

/**
 * Today's live stats with yesterday's summary for comparison
 */
export interface DailyStatsComparison {
  date: DateKey;
  today: DailySummary;
  /** null when no stats exist for yesterday (e.g. downtime) */
  previous: DailySummary | null;
  deltas: DailyStatsDeltas | null;
}

/**
 * One row of the ranked leaderboard
 */
export interface LeaderboardEntry {
  userId: UserId;
  score: number;
  rank: number;
  level: number;
  prestige: number;
}

/**
 * Read-only profile view; unknown users get zero values
 */
export interface ProfileView {
  userId: UserId;
  xp: number;
  level: number;
  prestige: number;
  /** XP earned inside the current level */
  progress: number;
  /** XP required for the next level, 0 when no further level exists */
  requirementForNext: number;
  rank: number;
  score: number;
  messageCount: number;
  voiceMinutes: number;
  dailyStreak: number;
  achievements: AchievementDefinition[];
}

/**
 * All-time server totals
 */
export interface ServerTotals {
  totalMessages: number;
  totalXp: number;
  totalVoiceMinutes: number;
  totalPrestiges: number;
  trackedUsers: number;
}

/**
 * Report posted once a calendar day has finished
 */
export interface DailyReport {
  date: DateKey;
  summary: DailySummary;
  previous: DailySummary | null;
  deltas: DailyStatsDeltas | null;
  topUsers: LeaderboardEntry[];
  totals: ServerTotals;
  averageXpPerMessage: number | null;
  averageVoiceMinutesPerUser: number | null;
}

/**
 * Where an award came from; used to pick the notification channel
 */
export type AwardSource = 'message' | 'voice';

/**
 * Channel context of an inbound guild message
 */
export interface GuildContext {
  guildId: string;
  channelId: string;
}

/**
 * Outbound notification requested from the transport
 */
export type ProgressNotification =
  | {
      kind: 'levelUp';
      userId: UserId;
      level: number;
      source: AwardSource;
      channelId: string | null;
    }
  | {
      kind: 'prestige';
      userId: UserId;
      prestige: number;
      source: AwardSource;
      channelId: string | null;
    };
