import {
  ChannelType,
  Client,
  Events,
  GatewayIntentBits,
  type EmbedBuilder,
  type Guild,
  type GuildMember,
  type Interaction,
  type Message,
  type TextChannel,
  type VoiceState,
} from 'discord.js';
import type { INotificationSink } from '../packages/core/ports/INotificationSink.js';
import type { DailyReport, ProgressNotification } from '../types/index.js';
import {
  commandHandlers,
  registerCommands,
  type CommandContext,
} from '../discord/commands/index.js';
import {
  LEVEL_UP_MESSAGE_TTL_MS,
  PRESTIGE_MESSAGE_TTL_MS,
  buildDailyReportEmbed,
  buildLevelUpEmbed,
  buildPrestigeEmbed,
  buildWelcomeEmbed,
} from '../discord/embeds/index.js';
import { errorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ component: 'discord' });

/**
 * Chance of a ✨ reaction on a message that earned bonus XP
 */
const SPARKLE_CHANCE = 0.3;

export interface DiscordServiceOptions {
  token: string;
  context: CommandContext;
  random?: () => number;
}

/**
 * Discord Service
 *
 * Transport for the progression engine. Handles:
 * - Bot lifecycle (connect, disconnect)
 * - Forwarding messages, voice joins/leaves and member joins to the engine
 * - Level-up and prestige announcements
 * - Daily report posting to the stats channel
 * - Slash command dispatch
 */
export class DiscordService implements INotificationSink {
  private client: Client;
  private guild: Guild | null = null;
  private isReady = false;
  private readonly token: string;
  private readonly context: CommandContext;
  private readonly random: () => number;

  constructor(options: DiscordServiceOptions) {
    this.token = options.token;
    this.context = options.context;
    this.random = options.random ?? Math.random;

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMembers,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.GuildVoiceStates,
      ],
    });

    this.setupEventHandlers();
  }

  /**
   * Set up Discord client event handlers
   */
  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, async (client) => {
      logger.info({ user: client.user.tag }, 'Discord bot connected');
      this.isReady = true;

      try {
        const guildId = this.context.config.discord.guildId;
        this.guild = guildId
          ? await client.guilds.fetch(guildId)
          : client.guilds.cache.first() ?? null;
        logger.info({ guildName: this.guild?.name ?? null }, 'Connected to guild');

        await registerCommands(client.user.id, this.token, guildId);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to fetch guild or register commands');
      }
    });

    this.client.on(Events.ShardDisconnect, () => {
      logger.warn('Discord shard disconnected, waiting for automatic reconnection');
    });

    this.client.on(Events.Error, (error) => {
      logger.error({ error: error.message }, 'Discord client error');
    });

    this.client.on(Events.Warn, (message) => {
      logger.warn({ message }, 'Discord client warning');
    });

    this.client.on(Events.InteractionCreate, async (interaction) => {
      await this.handleInteraction(interaction);
    });

    this.client.on(Events.MessageCreate, async (message) => {
      await this.handleMessageCreate(message);
    });

    this.client.on(Events.VoiceStateUpdate, (oldState, newState) => {
      this.handleVoiceStateUpdate(oldState, newState);
    });

    this.client.on(Events.GuildMemberAdd, async (member) => {
      await this.handleMemberAdd(member);
    });
  }

  /**
   * Handle slash commands
   */
  private async handleInteraction(interaction: Interaction): Promise<void> {
    if (!interaction.isChatInputCommand()) {
      return;
    }

    try {
      const handler = commandHandlers.get(interaction.commandName);
      if (!handler) {
        logger.warn({ commandName: interaction.commandName }, 'Unknown slash command');
        await interaction.reply({ content: 'Unknown command', ephemeral: true });
        return;
      }
      await handler(interaction, this.context);
    } catch (error) {
      logger.error(
        { error: errorMessage(error), commandName: interaction.commandName },
        'Error handling interaction'
      );
    }
  }

  /**
   * Award XP for guild messages from humans
   */
  private async handleMessageCreate(message: Message): Promise<void> {
    if (message.author.bot || !message.inGuild()) {
      return;
    }

    try {
      const award = this.context.engine.onMessage(
        message.author.id,
        { guildId: message.guildId, channelId: message.channelId },
        message.createdAt
      );

      const bonusThreshold = this.context.config.progression.baseMessageXp * 1.5;
      if (
        award &&
        !award.leveledUp &&
        !award.prestiged &&
        award.xpGained > bonusThreshold &&
        this.random() < SPARKLE_CHANCE
      ) {
        await message.react('✨');
      }
    } catch (error) {
      logger.error({ error: errorMessage(error), userId: message.author.id }, 'Failed to process message');
    }
  }

  /**
   * Track voice sessions. Moving between channels keeps the session open.
   */
  private handleVoiceStateUpdate(oldState: VoiceState, newState: VoiceState): void {
    const member = newState.member ?? oldState.member;
    if (!member || member.user.bot) {
      return;
    }

    try {
      if (!oldState.channelId && newState.channelId) {
        this.context.engine.onVoiceJoin(member.id);
      } else if (oldState.channelId && !newState.channelId) {
        this.context.engine.onVoiceLeave(member.id);
      }
    } catch (error) {
      logger.error({ error: errorMessage(error), userId: member.id }, 'Failed to process voice state');
    }
  }

  /**
   * Count the new member and post a welcome
   */
  private async handleMemberAdd(member: GuildMember): Promise<void> {
    try {
      this.context.engine.onMemberJoin();

      const channel = this.findTextChannel(member.guild, this.context.config.discord.channels.greeting);
      if (!channel) {
        return;
      }

      const embed = buildWelcomeEmbed(member.guild.name, member.id, member.displayAvatarURL());
      await channel.send({ embeds: [embed] });
    } catch (error) {
      logger.error({ error: errorMessage(error), userId: member.id }, 'Failed to welcome member');
    }
  }

  // ===========================================================================
  // INotificationSink
  // ===========================================================================

  async notify(notification: ProgressNotification): Promise<void> {
    const channel = await this.resolveNotificationChannel(notification.channelId);
    if (!channel) {
      logger.warn({ kind: notification.kind, userId: notification.userId }, 'No channel for notification');
      return;
    }

    if (notification.kind === 'prestige') {
      await this.sendTemporary(channel, buildPrestigeEmbed(notification), PRESTIGE_MESSAGE_TTL_MS);
    } else {
      const embed = buildLevelUpEmbed(notification, this.context.config.progression.prestigeThreshold);
      await this.sendTemporary(channel, embed, LEVEL_UP_MESSAGE_TTL_MS);
    }
  }

  async reportDailyStats(report: DailyReport): Promise<void> {
    const statsChannel = this.context.config.discord.channels.stats;
    const channel = this.guild ? this.findTextChannel(this.guild, statsChannel) : null;
    if (!channel) {
      logger.warn({ channel: statsChannel }, 'Stats channel not found');
      return;
    }

    await channel.send({ embeds: [buildDailyReportEmbed(report)] });
    logger.info({ channel: channel.name, date: report.date }, 'Posted daily stats');
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * The channel the triggering message came from, else the greeting channel,
   * else the guild's system channel
   */
  private async resolveNotificationChannel(channelId: string | null): Promise<TextChannel | null> {
    if (channelId) {
      const channel = await this.client.channels.fetch(channelId);
      if (channel && channel.type === ChannelType.GuildText) {
        return channel;
      }
    }

    if (!this.guild) {
      return null;
    }
    return (
      this.findTextChannel(this.guild, this.context.config.discord.channels.greeting) ??
      this.guild.systemChannel
    );
  }

  private findTextChannel(guild: Guild, name: string): TextChannel | null {
    return (
      guild.channels.cache.find(
        (channel): channel is TextChannel =>
          channel.type === ChannelType.GuildText && channel.name === name
      ) ?? null
    );
  }

  /**
   * Send an embed and delete it after ttlMs
   */
  private async sendTemporary(channel: TextChannel, embed: EmbedBuilder, ttlMs: number): Promise<void> {
    const sent = await channel.send({ embeds: [embed] });
    const timer = setTimeout(() => {
      sent.delete().catch((error) => {
        logger.debug({ error: errorMessage(error), messageId: sent.id }, 'Could not delete announcement');
      });
    }, ttlMs);
    timer.unref();
  }

  /**
   * Connect to Discord
   */
  async connect(): Promise<void> {
    if (this.isReady) {
      logger.debug('Discord bot already connected');
      return;
    }

    logger.info('Connecting to Discord...');
    await this.client.login(this.token);
  }

  /**
   * Disconnect from Discord
   */
  async disconnect(): Promise<void> {
    if (!this.isReady) {
      return;
    }

    logger.info('Disconnecting from Discord...');
    await this.client.destroy();
    this.isReady = false;
    this.guild = null;
  }
}
