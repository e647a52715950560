/**
 * /events and /setevents Slash Commands
 *
 * The events text is shared server-wide and persisted with the snapshot.
 * Only the configured administrator can change it.
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js';
import { logger } from '../../utils/logger.js';
import { MAX_EVENTS_MESSAGE_LENGTH } from '../../services/engine.js';
import { buildEventsEmbed } from '../embeds/stats.js';
import { replyWithError, type CommandContext } from './context.js';

export const eventsCommand = new SlashCommandBuilder()
  .setName('events')
  .setDescription('Display current events');

export const setEventsCommand = new SlashCommandBuilder()
  .setName('setevents')
  .setDescription('Set the current events text (admin only)')
  .addStringOption((option) =>
    option
      .setName('text')
      .setDescription('New events text')
      .setMaxLength(MAX_EVENTS_MESSAGE_LENGTH)
      .setRequired(true)
  );

export async function handleEventsCommand(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  try {
    await interaction.reply({ embeds: [buildEventsEmbed(context.engine.getEventsMessage())] });
  } catch (error) {
    await replyWithError(interaction, error);
  }
}

export async function handleSetEventsCommand(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  try {
    const text = interaction.options.getString('text', true);
    context.engine.setEventsMessage(interaction.user.id, text);

    const saved = await context.store.save();
    if (!saved) {
      logger.warn({ userId: interaction.user.id }, 'Events updated but snapshot save failed');
    }

    await interaction.reply({ content: '✅ Events updated successfully.', ephemeral: true });
  } catch (error) {
    await replyWithError(interaction, error);
  }
}
