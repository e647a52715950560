/**
 * Profile and leaderboard embeds
 */

import { EmbedBuilder, userMention } from 'discord.js';
import type { LeaderboardEntry, ProfileView, UserProgress } from '../../types/index.js';
import { COLORS, formatNumber, prestigeSuffix, rankMarker } from './format.js';

/**
 * Characters in the level progress bar
 */
const PROGRESS_BAR_LENGTH = 20;

/**
 * Achievements listed before the "+ n more" line
 */
const MAX_LISTED_ACHIEVEMENTS = 5;

/**
 * Text progress bar, or null when there is no next level
 */
export function buildProgressBar(progress: number, requirementForNext: number): string | null {
  if (requirementForNext <= 0) {
    return null;
  }

  const percent = Math.min(100, Math.max(0, (progress / requirementForNext) * 100));
  const filled = Math.floor((PROGRESS_BAR_LENGTH * percent) / 100);
  const bar = '█'.repeat(filled) + '░'.repeat(PROGRESS_BAR_LENGTH - filled);
  return `\`${bar}\` ${percent.toFixed(1)}%`;
}

export function buildProfileEmbed(
  profile: ProfileView,
  displayName: string,
  avatarUrl?: string | null
): EmbedBuilder {
  const suffix = prestigeSuffix(profile.prestige);
  const embed = new EmbedBuilder()
    .setTitle(`👤 ${displayName}'s Profile${suffix}`)
    .setDescription(
      [
        `🏆 **Level:** ${profile.level}${suffix}`,
        `💎 **Total XP:** ${formatNumber(profile.xp)}`,
        `📊 **Progress:** ${formatNumber(profile.progress)}/${formatNumber(profile.requirementForNext)} XP`,
        `🥇 **Server Rank:** #${profile.rank}`,
        `💬 **Messages:** ${formatNumber(profile.messageCount)}`,
        `🔊 **Voice Time:** ${formatNumber(profile.voiceMinutes)} minutes`,
        `🔥 **Current Streak:** ${profile.dailyStreak} days`,
      ].join('\n')
    )
    .setColor(COLORS.BLURPLE);

  const bar = buildProgressBar(profile.progress, profile.requirementForNext);
  if (bar) {
    embed.addFields({ name: '📈 Level Progress', value: bar, inline: false });
  }

  if (profile.achievements.length > 0) {
    const listed = profile.achievements
      .slice(0, MAX_LISTED_ACHIEVEMENTS)
      .map((achievement) => `${achievement.emoji} ${achievement.name}`);
    const hidden = profile.achievements.length - listed.length;
    if (hidden > 0) {
      listed.push(`+ ${hidden} more...`);
    }
    embed.addFields({ name: '🏅 Achievements', value: listed.join('\n'), inline: false });
  }

  if (avatarUrl) {
    embed.setThumbnail(avatarUrl);
  }

  return embed;
}

/**
 * Per-user detail shown under each leaderboard row
 */
export type LeaderboardDetail = Pick<UserProgress, 'xp' | 'voiceMinutes'>;

export function buildLeaderboardEmbed(
  entries: LeaderboardEntry[],
  details: ReadonlyMap<string, LeaderboardDetail>,
  voiceWeightFactor: number
): EmbedBuilder {
  if (entries.length === 0) {
    return new EmbedBuilder()
      .setTitle('🏆 Leaderboards')
      .setDescription('No activity data yet. Start chatting to appear on the leaderboard!')
      .setColor(COLORS.BLURPLE);
  }

  const lines = entries.map((entry) => {
    const detail = details.get(entry.userId);
    const xp = formatNumber(detail?.xp ?? 0);
    const voice = formatNumber(detail?.voiceMinutes ?? 0);
    return (
      `${rankMarker(entry.rank)} ${userMention(entry.userId)} - Lv.${entry.level}${prestigeSuffix(entry.prestige)}\n` +
      `    💎 ${xp} XP • 🔊 ${voice}m • 📊 ${formatNumber(entry.score)} total`
    );
  });

  return new EmbedBuilder()
    .setTitle('🏆 Activity Leaderboards')
    .setDescription(lines.join('\n\n'))
    .addFields({
      name: '📊 Scoring System',
      value: `XP + (Voice minutes × ${voiceWeightFactor}) + Prestige bonus`,
      inline: false,
    })
    .setColor(COLORS.BLURPLE);
}
