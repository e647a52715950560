import {
  REST,
  Routes,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { logger } from '../../utils/logger.js';
import type { CommandHandler } from './context.js';
import { profileCommand, handleProfileCommand } from './profile.js';
import { leaderboardCommand, handleLeaderboardCommand } from './leaderboard.js';
import { dailyStatsCommand, handleDailyStatsCommand } from './dailystats.js';
import {
  eventsCommand,
  setEventsCommand,
  handleEventsCommand,
  handleSetEventsCommand,
} from './events.js';
import { helpCommand, infoCommand, handleHelpCommand, handleInfoCommand } from './info.js';
import { tempbanCommand, handleTempbanCommand } from './tempban.js';

/**
 * All registered slash commands
 */
export const commands: RESTPostAPIChatInputApplicationCommandsJSONBody[] = [
  profileCommand.toJSON(),
  leaderboardCommand.toJSON(),
  dailyStatsCommand.toJSON(),
  eventsCommand.toJSON(),
  setEventsCommand.toJSON(),
  infoCommand.toJSON(),
  helpCommand.toJSON(),
  tempbanCommand.toJSON(),
];

/**
 * Command name to handler mapping
 */
export const commandHandlers: ReadonlyMap<string, CommandHandler> = new Map<string, CommandHandler>([
  ['profile', handleProfileCommand],
  ['leaderboard', handleLeaderboardCommand],
  ['dailystats', handleDailyStatsCommand],
  ['events', handleEventsCommand],
  ['setevents', handleSetEventsCommand],
  ['info', handleInfoCommand],
  ['help', handleHelpCommand],
  ['tempban', handleTempbanCommand],
]);

export type { CommandContext, CommandHandler } from './context.js';

/**
 * Register slash commands with Discord API.
 * Guild commands update instantly; without a guild id they are registered
 * globally.
 */
export async function registerCommands(
  clientId: string,
  token: string,
  guildId?: string
): Promise<void> {
  const rest = new REST({ version: '10' }).setToken(token);
  const route = guildId
    ? Routes.applicationGuildCommands(clientId, guildId)
    : Routes.applicationCommands(clientId);

  try {
    logger.info(
      { commandCount: commands.length },
      'Registering slash commands...'
    );

    await rest.put(route, { body: commands });

    logger.info(
      { commandCount: commands.length, guildId: guildId ?? 'global' },
      'Successfully registered slash commands'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to register slash commands');
    throw error;
  }
}
