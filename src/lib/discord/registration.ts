import { REST, Routes } from 'discord.js';
import { createLogger } from '../logger';
import { commands } from './commands';

const logger = createLogger('discord-registration');

/**
 * Derive the application ID from a bot token.
 * The first dot-separated segment of a token is the base64-encoded bot user ID.
 */
export function applicationIdFromToken(botToken: string): string {
  const [encodedId] = botToken.split('.');
  const decoded = Buffer.from(encodedId ?? '', 'base64').toString();

  if (botToken.split('.').length < 2 || !/^\d+$/.test(decoded)) {
    throw new Error('Invalid bot token format');
  }

  return decoded;
}

/**
 * Register slash commands with Discord, for one guild when `guildId` is set
 * (visible at once) or globally otherwise
 */
export async function registerSlashCommands(botToken: string, guildId?: string): Promise<number> {
  const applicationId = applicationIdFromToken(botToken);
  const rest = new REST({ version: '10' }).setToken(botToken);
  const body = commands.map(command => command.toJSON());

  logger.info(
    { applicationId, guildId, commands: body.map(command => command.name) },
    'Started refreshing application (/) commands'
  );

  const route = guildId
    ? Routes.applicationGuildCommands(applicationId, guildId)
    : Routes.applicationCommands(applicationId);
  const data = await rest.put(route, { body });

  const count = Array.isArray(data) ? data.length : 0;
  logger.info(`Successfully reloaded ${count} application (/) commands`);
  return count;
}
