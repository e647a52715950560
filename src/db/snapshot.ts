/**
 * Snapshot document schema and codec
 *
 * The snapshot keeps one map per user field, keyed by the string form of the
 * user id, plus the server-wide counters and the daily stats/history.
 * Sets (achievements, active users) are stored as arrays.
 */

import { z } from 'zod';
import { isAchievementId } from '../services/achievements.js';
import { isDateKey } from '../utils/dates.js';
import type {
  AchievementId,
  DailyStats,
  DailySummary,
  DateKey,
  UserId,
  UserProgress,
} from '../types/index.js';

export const DEFAULT_EVENTS_MESSAGE = 'No upcoming events.';

const userIdKeySchema = z.string().regex(/^\d+$/, 'User id keys must be integers');

/** Older snapshots stored active users as JSON numbers */
const userIdValueSchema = z.union([
  userIdKeySchema,
  z.number().int().nonnegative().transform((value) => String(value)),
]);

const dateKeySchema = z.string().refine(isDateKey, 'Expected YYYY-MM-DD');

const counter = z.number().nonnegative().catch(0);

/** Keyed map read loosely; decodeSnapshot validates each entry on its own */
const looseMap = z.record(z.string(), z.unknown()).catch({}).default({});

const dailyStatsSchema = z.object({
  date: z.union([dateKeySchema, z.literal('')]).catch(''),
  messages: counter.default(0),
  xp_gained: counter.default(0),
  voice_time: counter.default(0),
  active_users: z.array(userIdValueSchema).catch([]).default([]),
  level_ups: counter.default(0),
  prestiges: counter.default(0),
  new_members: counter.default(0),
});

const dailySummarySchema = z.object({
  messages: counter.default(0),
  xp_gained: counter.default(0),
  voice_time: counter.default(0),
  active_users: counter.default(0),
  level_ups: counter.default(0),
  prestiges: counter.default(0),
  new_members: counter.default(0),
});

const userValueSchemas = {
  user_xp: z.number().nonnegative(),
  user_level: z.number().int().nonnegative(),
  user_prestige: z.number().int().nonnegative(),
  user_daily_streak: z.number().int().nonnegative(),
  user_last_daily: z.union([dateKeySchema, z.literal('')]),
  user_message_count: z.number().int().nonnegative(),
  user_voice_time: z.number().nonnegative(),
  user_achievements: z.array(z.string()),
};

export const snapshotSchema = z.object({
  user_xp: looseMap,
  user_level: looseMap,
  user_prestige: looseMap,
  user_daily_streak: looseMap,
  user_last_daily: looseMap,
  user_message_count: looseMap,
  user_voice_time: looseMap,
  user_achievements: looseMap,
  events_message: z.string().catch(DEFAULT_EVENTS_MESSAGE).default(DEFAULT_EVENTS_MESSAGE),
  total_server_messages: z.number().int().nonnegative().catch(0).default(0),
  daily_stats: dailyStatsSchema.optional().catch(undefined),
  daily_history: looseMap,
});

/**
 * Snapshot document as written to disk
 */
export type SnapshotDocument = z.input<typeof snapshotSchema>;

type ParsedSnapshot = z.output<typeof snapshotSchema>;

/**
 * In-memory engine state restored from a snapshot
 */
export interface DecodedSnapshot {
  users: Map<UserId, UserProgress>;
  eventsMessage: string;
  totalServerMessages: number;
  dailyStats: DailyStats;
  dailyHistory: Map<DateKey, DailySummary>;
  /** Achievement ids in the file that are not in the catalog */
  unknownAchievements: string[];
  /** Map entries dropped for an invalid key or value, as `field.key` */
  rejectedEntries: string[];
}

/**
 * Entries of a loosely read map whose key and value both validate.
 * Rejected entries are appended to `rejected`.
 */
function validEntries<V>(
  field: string,
  map: Record<string, unknown>,
  keySchema: z.ZodType<string, z.ZodTypeDef, unknown>,
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
  rejected: string[]
): Array<[string, V]> {
  const entries: Array<[string, V]> = [];
  for (const [key, value] of Object.entries(map)) {
    const parsedKey = keySchema.safeParse(key);
    const parsedValue = valueSchema.safeParse(value);
    if (parsedKey.success && parsedValue.success) {
      entries.push([parsedKey.data, parsedValue.data]);
    } else {
      rejected.push(`${field}.${key}`);
    }
  }
  return entries;
}

export function emptyUserProgress(): UserProgress {
  return {
    xp: 0,
    level: 0,
    prestige: 0,
    messageCount: 0,
    voiceMinutes: 0,
    dailyStreak: 0,
    lastDailyDate: null,
    lastMessageAt: null,
    achievements: new Set<AchievementId>(),
  };
}

export function emptyDailyStats(date: DateKey | '' = ''): DailyStats {
  return {
    date,
    messages: 0,
    xpGained: 0,
    voiceMinutes: 0,
    activeUsers: new Set<UserId>(),
    levelUps: 0,
    prestiges: 0,
    newMembers: 0,
  };
}

/**
 * Reduce a day's live counters to the frozen history form
 */
export function summarizeDailyStats(stats: DailyStats): DailySummary {
  return {
    messages: stats.messages,
    xpGained: stats.xpGained,
    voiceMinutes: stats.voiceMinutes,
    activeUsers: stats.activeUsers.size,
    levelUps: stats.levelUps,
    prestiges: stats.prestiges,
    newMembers: stats.newMembers,
  };
}

/**
 * Build the snapshot document for the given state
 */
export function encodeSnapshot(state: {
  users: ReadonlyMap<UserId, UserProgress>;
  eventsMessage: string;
  totalServerMessages: number;
  dailyStats: DailyStats;
  dailyHistory: ReadonlyMap<DateKey, DailySummary>;
}): SnapshotDocument {
  const userXp: Record<string, number> = {};
  const userLevel: Record<string, number> = {};
  const userPrestige: Record<string, number> = {};
  const userDailyStreak: Record<string, number> = {};
  const userLastDaily: Record<string, string> = {};
  const userMessageCount: Record<string, number> = {};
  const userVoiceTime: Record<string, number> = {};
  const userAchievements: Record<string, string[]> = {};

  for (const [userId, user] of state.users) {
    userXp[userId] = user.xp;
    userLevel[userId] = user.level;
    userPrestige[userId] = user.prestige;
    userDailyStreak[userId] = user.dailyStreak;
    if (user.lastDailyDate) {
      userLastDaily[userId] = user.lastDailyDate;
    }
    userMessageCount[userId] = user.messageCount;
    userVoiceTime[userId] = user.voiceMinutes;
    userAchievements[userId] = [...user.achievements];
  }

  const dailyHistory: Record<string, z.input<typeof dailySummarySchema>> = {};
  for (const [date, summary] of state.dailyHistory) {
    dailyHistory[date] = {
      messages: summary.messages,
      xp_gained: summary.xpGained,
      voice_time: summary.voiceMinutes,
      active_users: summary.activeUsers,
      level_ups: summary.levelUps,
      prestiges: summary.prestiges,
      new_members: summary.newMembers,
    };
  }

  return {
    user_xp: userXp,
    user_level: userLevel,
    user_prestige: userPrestige,
    user_daily_streak: userDailyStreak,
    user_last_daily: userLastDaily,
    user_message_count: userMessageCount,
    user_voice_time: userVoiceTime,
    user_achievements: userAchievements,
    events_message: state.eventsMessage,
    total_server_messages: state.totalServerMessages,
    daily_stats: {
      date: state.dailyStats.date,
      messages: state.dailyStats.messages,
      xp_gained: state.dailyStats.xpGained,
      voice_time: state.dailyStats.voiceMinutes,
      active_users: [...state.dailyStats.activeUsers],
      level_ups: state.dailyStats.levelUps,
      prestiges: state.dailyStats.prestiges,
      new_members: state.dailyStats.newMembers,
    },
    daily_history: dailyHistory,
  };
}

/**
 * Validate a raw snapshot and restore the in-memory state.
 * Missing fields default to empty/zero; levels are recomputed from XP.
 * Invalid map entries are dropped and reported in `rejectedEntries`.
 *
 * @throws ZodError when the document is not a JSON object
 */
export function decodeSnapshot(
  raw: unknown,
  levelFromXp: (xp: number) => number
): DecodedSnapshot {
  const parsed: ParsedSnapshot = snapshotSchema.parse(raw ?? {});
  const users = new Map<UserId, UserProgress>();
  const unknownAchievements: string[] = [];
  const rejectedEntries: string[] = [];
  const userEntries = <V>(
    field: keyof typeof userValueSchemas,
    valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>
  ) => validEntries(field, parsed[field], userIdKeySchema, valueSchema, rejectedEntries);

  const userFor = (userId: UserId): UserProgress => {
    let user = users.get(userId);
    if (!user) {
      user = emptyUserProgress();
      users.set(userId, user);
    }
    return user;
  };

  for (const [userId, xp] of userEntries('user_xp', userValueSchemas.user_xp)) {
    const user = userFor(userId);
    user.xp = xp;
    user.level = levelFromXp(xp);
  }
  // user_level is derived; only its keys matter for users without XP
  for (const [userId] of userEntries('user_level', userValueSchemas.user_level)) {
    userFor(userId);
  }
  for (const [userId, prestige] of userEntries('user_prestige', userValueSchemas.user_prestige)) {
    userFor(userId).prestige = prestige;
  }
  for (const [userId, streak] of userEntries('user_daily_streak', userValueSchemas.user_daily_streak)) {
    userFor(userId).dailyStreak = streak;
  }
  for (const [userId, date] of userEntries('user_last_daily', userValueSchemas.user_last_daily)) {
    userFor(userId).lastDailyDate = date === '' ? null : date;
  }
  for (const [userId, count] of userEntries('user_message_count', userValueSchemas.user_message_count)) {
    userFor(userId).messageCount = count;
  }
  for (const [userId, minutes] of userEntries('user_voice_time', userValueSchemas.user_voice_time)) {
    userFor(userId).voiceMinutes = minutes;
  }
  for (const [userId, ids] of userEntries('user_achievements', userValueSchemas.user_achievements)) {
    const user = userFor(userId);
    for (const id of ids) {
      if (isAchievementId(id)) {
        user.achievements.add(id);
      } else {
        unknownAchievements.push(id);
      }
    }
  }

  const dailyStats = emptyDailyStats();
  if (parsed.daily_stats) {
    dailyStats.date = parsed.daily_stats.date;
    dailyStats.messages = parsed.daily_stats.messages;
    dailyStats.xpGained = parsed.daily_stats.xp_gained;
    dailyStats.voiceMinutes = parsed.daily_stats.voice_time;
    dailyStats.activeUsers = new Set(parsed.daily_stats.active_users);
    dailyStats.levelUps = parsed.daily_stats.level_ups;
    dailyStats.prestiges = parsed.daily_stats.prestiges;
    dailyStats.newMembers = parsed.daily_stats.new_members;
  }

  const dailyHistory = new Map<DateKey, DailySummary>();
  const history = validEntries(
    'daily_history',
    parsed.daily_history,
    dateKeySchema,
    dailySummarySchema,
    rejectedEntries
  );
  for (const [date, entry] of history) {
    dailyHistory.set(date, {
      messages: entry.messages,
      xpGained: entry.xp_gained,
      voiceMinutes: entry.voice_time,
      activeUsers: entry.active_users,
      levelUps: entry.level_ups,
      prestiges: entry.prestiges,
      newMembers: entry.new_members,
    });
  }

  return {
    users,
    eventsMessage: parsed.events_message,
    totalServerMessages: parsed.total_server_messages,
    dailyStats,
    dailyHistory,
    unknownAchievements,
    rejectedEntries,
  };
}
