/**
 * /leaderboard Slash Command
 *
 * Top members by composite score (XP, weighted voice time, prestige bonus).
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_LEADERBOARD_SIZE } from '../../services/leaderboard.js';
import { buildLeaderboardEmbed, type LeaderboardDetail } from '../embeds/profile.js';
import { replyWithError, type CommandContext } from './context.js';

/**
 * Largest board that fits in one embed description
 */
const MAX_DISPLAYED_ENTRIES = 25;

export const leaderboardCommand = new SlashCommandBuilder()
  .setName('leaderboard')
  .setDescription('Top members by XP and voice activity')
  .addIntegerOption((option) =>
    option
      .setName('limit')
      .setDescription(`Number of entries (default ${DEFAULT_LEADERBOARD_SIZE})`)
      .setMinValue(1)
      .setMaxValue(MAX_DISPLAYED_ENTRIES)
      .setRequired(false)
  );

export async function handleLeaderboardCommand(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  try {
    const limit = interaction.options.getInteger('limit') ?? DEFAULT_LEADERBOARD_SIZE;
    const entries = context.engine.getLeaderboard(limit);

    const details = new Map<string, LeaderboardDetail>();
    for (const entry of entries) {
      const profile = context.engine.getProfile(entry.userId);
      details.set(entry.userId, { xp: profile.xp, voiceMinutes: profile.voiceMinutes });
    }

    const embed = buildLeaderboardEmbed(
      entries,
      details,
      context.config.progression.voiceWeightFactor
    );

    const rank = context.engine.leaderboard.rank(interaction.user.id);
    if (entries.length > 0 && rank > entries.length) {
      embed.setFooter({ text: `Your position: #${rank}` });
    }

    await interaction.reply({ embeds: [embed] });

    logger.debug({ userId: interaction.user.id, entries: entries.length }, 'Leaderboard viewed');
  } catch (error) {
    await replyWithError(interaction, error);
  }
}
