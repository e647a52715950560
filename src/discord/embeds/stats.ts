/**
 * Daily stats, report, server info, events and help embeds
 */

import { EmbedBuilder, userMention } from 'discord.js';
import type {
  DailyReport,
  DailyStatsComparison,
  DailyStatsDeltas,
  DailySummary,
  ServerTotals,
} from '../../types/index.js';
import type { ProgressionSettings } from '../../config.js';
import {
  COLORS,
  formatNumber,
  formatSigned,
  prestigeSuffix,
  rankMarker,
  trendArrow,
} from './format.js';

/**
 * Active users needed for the green / yellow report colour
 */
const HIGH_ACTIVITY_USERS = 10;
const MODERATE_ACTIVITY_USERS = 5;

function activityLines(summary: DailySummary): string {
  return [
    `💬 **Messages:** ${formatNumber(summary.messages)}`,
    `👥 **Active Users:** ${summary.activeUsers}`,
    `⭐ **XP Gained:** ${formatNumber(summary.xpGained)}`,
    `🔊 **Voice Time:** ${formatNumber(summary.voiceMinutes)} minutes`,
    `📊 **Level Ups:** ${summary.levelUps}`,
    `🌟 **Prestiges:** ${summary.prestiges}`,
    `👋 **New Members:** ${summary.newMembers}`,
  ].join('\n');
}

function deltaLines(deltas: DailyStatsDeltas): string {
  return [
    `${trendArrow(deltas.messages)} **Messages:** ${formatSigned(deltas.messages)}`,
    `${trendArrow(deltas.activeUsers)} **Active Users:** ${formatSigned(deltas.activeUsers)}`,
    `${trendArrow(deltas.xpGained)} **XP Gained:** ${formatSigned(deltas.xpGained)}`,
  ].join('\n');
}

function totalsLines(totals: ServerTotals): string {
  return [
    `💬 **Total Messages:** ${formatNumber(totals.totalMessages)}`,
    `⭐ **Total XP:** ${formatNumber(totals.totalXp)}`,
    `🔊 **Total Voice Time:** ${formatNumber(totals.totalVoiceMinutes)}m`,
    `🌟 **Total Prestiges:** ${totals.totalPrestiges}`,
  ].join('\n');
}

/**
 * Live stats for /dailystats
 */
export function buildDailyStatsEmbed(comparison: DailyStatsComparison, statsChannel: string): EmbedBuilder {
  if (comparison.today.messages === 0) {
    return new EmbedBuilder()
      .setTitle('📊 Daily Statistics')
      .setDescription('No activity recorded today yet. Start chatting!')
      .setColor(COLORS.BLURPLE);
  }

  const embed = new EmbedBuilder()
    .setTitle(`📊 Today's Server Statistics - ${comparison.date}`)
    .addFields({ name: "📈 Today's Activity", value: activityLines(comparison.today), inline: false })
    .setColor(COLORS.BLURPLE)
    .setFooter({ text: `Next auto-update in #${statsChannel} • Use /leaderboard for rankings` });

  if (comparison.deltas) {
    embed.addFields({ name: '📊 Compared to Yesterday', value: deltaLines(comparison.deltas), inline: false });
  }

  return embed;
}

/**
 * Colour by how many users were active
 */
export function reportColor(activeUsers: number): number {
  if (activeUsers >= HIGH_ACTIVITY_USERS) return COLORS.GREEN;
  if (activeUsers >= MODERATE_ACTIVITY_USERS) return COLORS.YELLOW;
  return COLORS.ORANGE;
}

/**
 * End-of-day report posted to the stats channel
 */
export function buildDailyReportEmbed(report: DailyReport): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(`📊 Daily Server Statistics - ${report.date}`)
    .addFields({ name: '📈 Activity', value: activityLines(report.summary), inline: true })
    .setColor(reportColor(report.summary.activeUsers))
    .setFooter({ text: 'Next update at midnight • Use /leaderboard for live rankings' });

  if (report.deltas) {
    embed.addFields({ name: '📊 vs Previous Day', value: deltaLines(report.deltas), inline: true });
  }

  if (report.topUsers.length > 0) {
    const rows = report.topUsers.map(
      (entry, index) =>
        `${rankMarker(index + 1)} ${userMention(entry.userId)} - Lv.${entry.level}${prestigeSuffix(entry.prestige)}`
    );
    embed.addFields({ name: '🏆 Top Active Users', value: rows.join('\n'), inline: false });
  }

  embed.addFields({ name: '🎯 All-Time Server Stats', value: totalsLines(report.totals), inline: false });

  const facts: string[] = [];
  if (report.averageXpPerMessage !== null) {
    facts.push(`💡 Average XP per message: ${report.averageXpPerMessage.toFixed(1)}`);
  }
  if (report.averageVoiceMinutesPerUser !== null && report.summary.voiceMinutes > 0) {
    facts.push(`🎤 Average voice time per user: ${report.averageVoiceMinutesPerUser.toFixed(0)}m`);
  }
  if (facts.length > 0) {
    embed.addFields({ name: '🎲 Fun Facts', value: facts.join('\n'), inline: false });
  }

  return embed;
}

/**
 * Guild facts shown by /info
 */
export interface GuildInfo {
  name: string;
  ownerId: string | null;
  memberCount: number;
  createdAt: Date;
  textChannels: number;
  voiceChannels: number;
  roles: number;
  boostTier: number;
  boosts: number;
  iconUrl: string | null;
}

export function buildInfoEmbed(guild: GuildInfo, totals: ServerTotals): EmbedBuilder {
  const owner = guild.ownerId ? userMention(guild.ownerId) : 'N/A';
  const embed = new EmbedBuilder()
    .setTitle(`ℹ️ Server Info - ${guild.name}`)
    .setDescription(
      [
        `👑 **Owner:** ${owner}`,
        `👥 **Members:** ${guild.memberCount}`,
        `📅 **Created:** ${guild.createdAt.toISOString().slice(0, 10)}`,
        `💬 **Text Channels:** ${guild.textChannels}`,
        `🔊 **Voice Channels:** ${guild.voiceChannels}`,
        `🎭 **Roles:** ${guild.roles}`,
        `⚡ **Boost Level:** ${guild.boostTier}`,
        `💎 **Boosts:** ${guild.boosts}`,
        '',
        '📊 **Server Activity:**',
        `💬 **Total Messages Tracked:** ${formatNumber(totals.totalMessages)}`,
        `⭐ **Total XP Earned:** ${formatNumber(totals.totalXp)}`,
        `🔊 **Total Voice Time:** ${formatNumber(totals.totalVoiceMinutes)} minutes`,
      ].join('\n')
    )
    .setColor(COLORS.BLURPLE);

  if (guild.iconUrl) {
    embed.setThumbnail(guild.iconUrl);
  }

  return embed;
}

export function buildEventsEmbed(eventsMessage: string): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('📅 Current Events')
    .setDescription(eventsMessage)
    .setColor(COLORS.BLURPLE);
}

export type HelpSettings = Pick<
  ProgressionSettings,
  | 'baseMessageXp'
  | 'voiceXpPerMinute'
  | 'dailyBonusMultiplier'
  | 'streakBonusDays'
  | 'streakBonusMultiplier'
  | 'prestigeThreshold'
>;

export function buildHelpEmbed(
  settings: HelpSettings,
  statsChannel: string,
  showModeration: boolean
): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle('📜 Available Commands')
    .setDescription('Complete list of bot commands')
    .addFields(
      {
        name: '🧭 **General Commands**',
        value: [
          '**/help** - Shows this command list',
          '**/events** - Display current events',
          '**/setevents <text>** - Set events (admin only)',
          '**/info** - Server info + total messages',
          '**/leaderboard** - Top users by XP + voice',
          "**/profile [user]** - User's level, XP, and rank",
          "**/dailystats** - Show today's server statistics",
        ].join('\n'),
        inline: false,
      },
      {
        name: '📊 **XP & Leveling System**',
        value: [
          `• Messages: ${settings.baseMessageXp} XP + bonuses`,
          `• Voice: ${settings.voiceXpPerMinute} XP/minute`,
          `• Daily bonus: ${settings.dailyBonusMultiplier}x first message`,
          `• ${settings.streakBonusDays}-day streak: ${settings.streakBonusMultiplier}x multiplier`,
          `• Prestige at level ${settings.prestigeThreshold}`,
          `• Daily stats at midnight in #${statsChannel}`,
        ].join('\n'),
        inline: false,
      }
    )
    .setColor(COLORS.BLURPLE)
    .setFooter({ text: '💾 All data is saved persistently' });

  if (showModeration) {
    embed.addFields({
      name: '🛡️ **Moderation Commands**',
      value: '**/tempban <user> <seconds> [reason]** - Temporary ban',
      inline: false,
    });
  }

  return embed;
}
