import { Command } from 'commander';
import { ValidatedConfiguration as Configuration } from '../../../../config/validated';
import { createLogger } from '../../../../lib/logger';
import { DiscordClient } from '../../../../lib/discord/client';
import { registerSlashCommands } from '../../../../lib/discord/registration';
import { createMarketCapCalculator } from '../../../../services/market';
import { formatErrorForLogging } from '../../../../shared/errors';

const logger = createLogger('cli:discord');

function requireBotToken(): string {
  const botToken = Configuration.discord.token;

  if (!botToken) {
    logger.error('DISCORD_BOT_TOKEN is not set in environment variables');
    process.exit(1);
  }

  return botToken;
}

export function registerDiscordCommands(program: Command) {
  program
    .command('start')
    .description('Connect to Discord and answer slash commands')
    .action(async () => {
      const botToken = requireBotToken();
      const discordClient = new DiscordClient({
        calculator: createMarketCapCalculator(),
        tokenSymbol: Configuration.token.symbol,
      });

      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        discordClient
          .destroy()
          .then(() => process.exit(0))
          .catch(error => {
            logger.error(formatErrorForLogging(error), 'Error during shutdown');
            process.exit(1);
          });
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));

      await discordClient.login(botToken);
    });

  program
    .command('register-commands')
    .description('Register the bot slash commands with Discord')
    .option('-g, --guild <id>', 'Register for one guild instead of globally', Configuration.discord.guildId)
    .action(async (options: { guild?: string }) => {
      const botToken = requireBotToken();
      await registerSlashCommands(botToken, options.guild);
    });
}
