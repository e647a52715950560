/**
 * /profile Slash Command
 *
 * Shows level, XP, progress, rank, streak and achievements for yourself or
 * another member. Users the bot has never seen get an all-zero profile.
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js';
import { logger } from '../../utils/logger.js';
import { buildProfileEmbed } from '../embeds/profile.js';
import { replyWithError, type CommandContext } from './context.js';

export const profileCommand = new SlashCommandBuilder()
  .setName('profile')
  .setDescription("View a member's level, XP and rank")
  .addUserOption((option) =>
    option
      .setName('user')
      .setDescription('Member to look up (defaults to you)')
      .setRequired(false)
  );

export async function handleProfileCommand(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  try {
    const target = interaction.options.getUser('user') ?? interaction.user;
    const profile = context.engine.getProfile(target.id);

    const embed = buildProfileEmbed(profile, target.displayName, target.displayAvatarURL());
    await interaction.reply({ embeds: [embed] });

    logger.debug({ userId: interaction.user.id, targetId: target.id }, 'Profile viewed');
  } catch (error) {
    await replyWithError(interaction, error);
  }
}
