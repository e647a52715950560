/**
 * Level-up, prestige and welcome embeds
 */

import { EmbedBuilder, userMention } from 'discord.js';
import type { ProgressNotification } from '../../types/index.js';
import { COLORS } from './format.js';

/**
 * Delay before a level-up announcement is deleted
 */
export const LEVEL_UP_MESSAGE_TTL_MS = 10_000;

/**
 * Delay before a prestige announcement is deleted
 */
export const PRESTIGE_MESSAGE_TTL_MS = 15_000;

type LevelUpNotification = Extract<ProgressNotification, { kind: 'levelUp' }>;
type PrestigeNotification = Extract<ProgressNotification, { kind: 'prestige' }>;

/**
 * Flavour line for milestone levels
 */
export function levelMilestone(level: number, prestigeThreshold: number): string | null {
  if (level === 10) return '🎯 First milestone reached!';
  if (level === 25) return '🚀 Quarter century!';
  if (level === prestigeThreshold - 1) return '⚠️ One level away from Prestige!';
  return null;
}

export function buildLevelUpEmbed(
  notification: LevelUpNotification,
  prestigeThreshold: number
): EmbedBuilder {
  const fromVoice = notification.source === 'voice' ? ' from voice activity' : '';
  let description = `${userMention(notification.userId)} reached **Level ${notification.level}**${fromVoice}! 🎊`;

  const milestone = levelMilestone(notification.level, prestigeThreshold);
  if (milestone) {
    description += `\n${milestone}`;
  }

  return new EmbedBuilder()
    .setTitle('🎉 Level Up!')
    .setDescription(description)
    .setColor(COLORS.BLURPLE);
}

export function buildPrestigeEmbed(notification: PrestigeNotification): EmbedBuilder {
  const fromVoice = notification.source === 'voice' ? ' from voice activity' : '';

  return new EmbedBuilder()
    .setTitle('🌟 PRESTIGE ACHIEVED! 🌟')
    .setDescription(
      `🎊 ${userMention(notification.userId)} has achieved **Prestige ${notification.prestige}**${fromVoice}!\n` +
        '⭐ Your journey begins anew with ultimate bragging rights! ⭐'
    )
    .setColor(COLORS.GOLD);
}

export function buildWelcomeEmbed(
  guildName: string,
  userId: string,
  avatarUrl?: string | null
): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(`Welcome to ${guildName}! 👋`)
    .setDescription(
      `Hello ${userMention(userId)}! Welcome to our server.\n\n` +
        '📝 Make sure to read the rules\n' +
        '💬 Introduce yourself in the chat\n' +
        '🎉 Have fun and enjoy your stay!\n\n' +
        'Type `/help` to see available commands.\n' +
        '🎮 Start earning XP by chatting and joining voice channels!'
    )
    .setColor(COLORS.BLURPLE);

  if (avatarUrl) {
    embed.setThumbnail(avatarUrl);
  }

  return embed;
}
