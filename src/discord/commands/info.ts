/**
 * /info and /help Slash Commands
 */

import {
  ChannelType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js';
import { buildHelpEmbed, buildInfoEmbed } from '../embeds/stats.js';
import { replyWithError, type CommandContext } from './context.js';

export const infoCommand = new SlashCommandBuilder()
  .setName('info')
  .setDescription('Server info and activity totals')
  .setDMPermission(false);

export const helpCommand = new SlashCommandBuilder()
  .setName('help')
  .setDescription('List the available commands');

export async function handleInfoCommand(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  try {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: 'This command can only be used in a server.', ephemeral: true });
      return;
    }

    const guild = interaction.guild;
    const channels = [...guild.channels.cache.values()];
    const embed = buildInfoEmbed(
      {
        name: guild.name,
        ownerId: guild.ownerId || null,
        memberCount: guild.memberCount,
        createdAt: guild.createdAt,
        textChannels: channels.filter((channel) => channel.type === ChannelType.GuildText).length,
        voiceChannels: channels.filter((channel) => channel.type === ChannelType.GuildVoice).length,
        roles: guild.roles.cache.size,
        boostTier: guild.premiumTier,
        boosts: guild.premiumSubscriptionCount ?? 0,
        iconUrl: guild.iconURL(),
      },
      context.engine.getServerTotals()
    );

    await interaction.reply({ embeds: [embed] });
  } catch (error) {
    await replyWithError(interaction, error);
  }
}

export async function handleHelpCommand(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  try {
    const canBan = interaction.memberPermissions?.has(PermissionFlagsBits.BanMembers) ?? false;
    const embed = buildHelpEmbed(
      context.config.progression,
      context.config.discord.channels.stats,
      canBan
    );
    await interaction.reply({ embeds: [embed], ephemeral: true });
  } catch (error) {
    await replyWithError(interaction, error);
  }
}
