import type { ChatInputCommandInteraction } from 'discord.js';
import type { Config } from '../../config.js';
import type { StateStore } from '../../db/store.js';
import type { DelayedActionScheduler } from '../../jobs/delayed-action.js';
import type { ProgressionEngine } from '../../services/engine.js';
import { formatUserError, logError } from '../../utils/errors.js';

/**
 * Services available to slash command handlers
 */
export interface CommandContext {
  engine: ProgressionEngine;
  store: StateStore;
  scheduler: DelayedActionScheduler;
  config: Config;
}

export type CommandHandler = (
  interaction: ChatInputCommandInteraction,
  context: CommandContext
) => Promise<void>;

/**
 * Log a command failure and tell the user, whether or not a reply went out
 */
export async function replyWithError(
  interaction: ChatInputCommandInteraction,
  error: unknown
): Promise<void> {
  logError(error, { command: interaction.commandName, userId: interaction.user.id });

  const content = `❌ ${formatUserError(error)}`;
  if (interaction.replied || interaction.deferred) {
    await interaction.followUp({ content, ephemeral: true });
  } else {
    await interaction.reply({ content, ephemeral: true });
  }
}
