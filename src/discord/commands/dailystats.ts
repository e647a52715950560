/**
 * /dailystats Slash Command
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js';
import { buildDailyStatsEmbed } from '../embeds/stats.js';
import { replyWithError, type CommandContext } from './context.js';

export const dailyStatsCommand = new SlashCommandBuilder()
  .setName('dailystats')
  .setDescription("Show today's server statistics");

export async function handleDailyStatsCommand(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  try {
    const comparison = context.engine.getComparison();
    const embed = buildDailyStatsEmbed(comparison, context.config.discord.channels.stats);
    await interaction.reply({ embeds: [embed] });
  } catch (error) {
    await replyWithError(interaction, error);
  }
}
