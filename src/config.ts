import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';

// Load environment variables from .env.local for development
dotenvConfig({ path: '.env.local' });
dotenvConfig(); // Fallback to .env

/**
 * Zod schema for Discord snowflake ids
 */
const snowflakeSchema = z.string().regex(/^\d+$/, 'Invalid Discord id');

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  // Discord Configuration
  discord: z.object({
    botToken: z.string().optional(),
    guildId: snowflakeSchema.optional(),
    // The single administrator allowed to run privileged commands
    adminUserId: snowflakeSchema.optional(),
    channels: z.object({
      // Channel names, resolved against the guild at send time
      greeting: z.string().min(1).default('general'),
      stats: z.string().min(1).default('daily-stats'),
    }),
  }),

  // XP, level and prestige tuning
  progression: z.object({
    baseMessageXp: z.coerce.number().min(0).default(2),
    bonusXpChance: z.coerce.number().min(0).max(1).default(0.15),
    bonusXpMin: z.coerce.number().int().min(0).default(1),
    bonusXpMax: z.coerce.number().int().min(0).default(5),
    voiceXpPerMinute: z.coerce.number().min(0).default(0.3),
    dailyBonusMultiplier: z.coerce.number().min(1).default(1.5),
    streakBonusDays: z.coerce.number().int().min(1).default(7),
    streakBonusMultiplier: z.coerce.number().min(1).default(2.0),
    voiceWeightFactor: z.coerce.number().min(0).default(10),
    baseXpRequirement: z.coerce.number().int().min(1).default(15),
    xpMultiplier: z.coerce.number().gt(1).default(1.4),
    prestigeThreshold: z.coerce.number().int().min(1).max(500).default(50),
    antispamCooldownSeconds: z.coerce.number().min(0).default(5),
  }).refine((p) => p.bonusXpMax >= p.bonusXpMin, {
    message: 'bonusXpMax must be greater than or equal to bonusXpMin',
    path: ['bonusXpMax'],
  }),

  // Daily stats reporting
  stats: z.object({
    topCount: z.coerce.number().int().min(1).max(25).default(5),
  }),

  // Snapshot persistence
  persistence: z.object({
    dataFile: z.string().min(1).default('./data/bot_data.json'),
    snapshotIntervalMs: z.coerce.number().int().min(1000).default(5 * 60 * 1000),
  }),

  // Background jobs
  jobs: z.object({
    reportCheckIntervalMs: z.coerce.number().int().min(1000).default(60 * 1000),
  }),

  // Logging Configuration
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  }),
});

/**
 * Typed configuration object
 */
export type Config = z.infer<typeof configSchema>;

/**
 * XP, level and prestige tuning values
 */
export type ProgressionSettings = Config['progression'];

/**
 * Parse and validate configuration from environment variables
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const rawConfig = {
    discord: {
      botToken: env.DISCORD_BOT_TOKEN || undefined,
      guildId: env.DISCORD_GUILD_ID || undefined,
      adminUserId: env.ADMIN_USER_ID || undefined,
      channels: {
        greeting: env.DISCORD_GREETING_CHANNEL,
        stats: env.DISCORD_STATS_CHANNEL,
      },
    },
    progression: {
      baseMessageXp: env.XP_BASE_MESSAGE,
      bonusXpChance: env.XP_BONUS_CHANCE,
      bonusXpMin: env.XP_BONUS_MIN,
      bonusXpMax: env.XP_BONUS_MAX,
      voiceXpPerMinute: env.XP_VOICE_PER_MINUTE,
      dailyBonusMultiplier: env.XP_DAILY_BONUS_MULTIPLIER,
      streakBonusDays: env.XP_STREAK_BONUS_DAYS,
      streakBonusMultiplier: env.XP_STREAK_BONUS_MULTIPLIER,
      voiceWeightFactor: env.LEADERBOARD_VOICE_WEIGHT,
      baseXpRequirement: env.LEVEL_BASE_REQUIREMENT,
      xpMultiplier: env.LEVEL_MULTIPLIER,
      prestigeThreshold: env.PRESTIGE_THRESHOLD,
      antispamCooldownSeconds: env.ANTISPAM_COOLDOWN_SECONDS,
    },
    stats: {
      topCount: env.STATS_TOP_COUNT,
    },
    persistence: {
      dataFile: env.DATA_FILE,
      snapshotIntervalMs: env.SNAPSHOT_INTERVAL_MS,
    },
    jobs: {
      reportCheckIntervalMs: env.REPORT_CHECK_INTERVAL_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

/**
 * Validated and typed configuration
 */
export const config: Config = parseConfig(process.env);
