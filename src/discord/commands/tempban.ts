/**
 * /tempban Slash Command
 *
 * Bans a member and schedules the unban through the delayed action
 * scheduler. If the ban was already lifted by the time the timer fires, the
 * unban is a no-op.
 */

import {
  DiscordAPIError,
  EmbedBuilder,
  PermissionFlagsBits,
  RESTJSONErrorCodes,
  SlashCommandBuilder,
  userMention,
  type ChatInputCommandInteraction,
  type Guild,
  type GuildMember,
} from 'discord.js';
import { logger } from '../../utils/logger.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { replyWithError, type CommandContext } from './context.js';
import { COLORS } from '../embeds/format.js';

/**
 * Longest temporary ban, in seconds (7 days)
 */
export const MAX_TEMPBAN_SECONDS = 7 * 24 * 60 * 60;

export const tempbanCommand = new SlashCommandBuilder()
  .setName('tempban')
  .setDescription('Temporarily ban a member')
  .setDefaultMemberPermissions(PermissionFlagsBits.BanMembers)
  .setDMPermission(false)
  .addUserOption((option) =>
    option.setName('user').setDescription('Member to ban').setRequired(true)
  )
  .addIntegerOption((option) =>
    option
      .setName('seconds')
      .setDescription('Ban duration in seconds')
      .setMinValue(1)
      .setMaxValue(MAX_TEMPBAN_SECONDS)
      .setRequired(true)
  )
  .addStringOption((option) =>
    option.setName('reason').setDescription('Reason for the ban').setRequired(false)
  );

/**
 * Scheduler key for a member's pending unban
 */
export function tempbanKey(guildId: string, userId: string): string {
  return `tempban:${guildId}:${userId}`;
}

/**
 * Lift a ban. A ban that no longer exists is reported as NotFoundError.
 */
export async function liftBan(guild: Guild, userId: string): Promise<void> {
  try {
    await guild.bans.remove(userId, 'Temporary ban expired');
  } catch (error) {
    if (error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.UnknownBan) {
      throw new NotFoundError('Ban', userId);
    }
    throw error;
  }
}

async function fetchMember(guild: Guild, userId: string): Promise<GuildMember | null> {
  try {
    return await guild.members.fetch(userId);
  } catch (error) {
    if (error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.UnknownMember) {
      return null;
    }
    throw error;
  }
}

export async function handleTempbanCommand(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  try {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: 'This command can only be used in a server.', ephemeral: true });
      return;
    }

    const guild = interaction.guild;
    const target = interaction.options.getUser('user', true);
    const seconds = interaction.options.getInteger('seconds', true);
    const reason = interaction.options.getString('reason') ?? 'No reason provided';

    if (target.id === interaction.user.id) {
      throw new ValidationError('You cannot ban yourself.', 'user');
    }

    const targetMember = await fetchMember(guild, target.id);
    if (!targetMember) {
      throw new NotFoundError('Member', target.id);
    }
    if (targetMember.roles.highest.comparePositionTo(interaction.member.roles.highest) >= 0) {
      throw new ValidationError('You cannot ban someone with equal or higher role.', 'user');
    }

    await guild.members.ban(target.id, { reason: `Temp banned by ${interaction.user.tag}: ${reason}` });

    context.scheduler.schedule(tempbanKey(guild.id, target.id), seconds * 1000, () =>
      liftBan(guild, target.id)
    );

    const embed = new EmbedBuilder()
      .setTitle('⏰ Member Temporarily Banned')
      .setDescription(
        `✅ ${userMention(target.id)} has been banned for ${seconds} seconds.\n📝 **Reason:** ${reason}`
      )
      .setColor(COLORS.RED);
    await interaction.reply({ embeds: [embed] });

    logger.info(
      { moderatorId: interaction.user.id, targetId: target.id, seconds },
      'Member temporarily banned'
    );
  } catch (error) {
    await replyWithError(interaction, error);
  }
}
