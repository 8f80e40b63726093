import { ChatInputCommandInteraction, Client, Events, GatewayIntentBits, MessageFlags } from 'discord.js';
import { createLogger } from '../logger';
import { formatErrorForLogging } from '../../shared/errors';
import { BotCommand } from '../../shared/enums';
import { MarketCapCalculator } from '../../services/market';
import { handleMarketCapCommand, handleStartCommand, replyWithError } from './handlers';

const logger = createLogger('DiscordClient');

export interface CommandContext {
  calculator: MarketCapCalculator;
  tokenSymbol: string;
}

/**
 * Route one slash command to its handler
 */
export async function dispatchCommand(interaction: ChatInputCommandInteraction, context: CommandContext): Promise<void> {
  switch (interaction.commandName) {
    case BotCommand.START:
      await handleStartCommand(interaction, context.tokenSymbol);
      break;
    case BotCommand.MARKET_CAP:
      await handleMarketCapCommand(interaction, context.calculator, context.tokenSymbol);
      break;
    default:
      logger.warn({ commandName: interaction.commandName }, 'Unknown command');
      await interaction.reply({
        content: 'Unknown command',
        flags: MessageFlags.Ephemeral,
      });
  }
}

export class DiscordClient {
  public readonly client: Client;

  constructor(private readonly context: CommandContext) {
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds],
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers() {
    this.client.on(Events.ClientReady, readyClient => {
      logger.info(`Bot logged in as ${readyClient.user.tag}`);
      logger.info(`Bot is in ${readyClient.guilds.cache.size} guilds`);
    });

    this.client.on(Events.Error, error => {
      logger.error(formatErrorForLogging(error), 'Discord client error');
    });

    this.client.on(Events.Warn, info => {
      logger.warn({ info }, 'Discord warning');
    });

    this.client.on(Events.InteractionCreate, async interaction => {
      if (!interaction.isChatInputCommand()) {
        logger.debug({ type: interaction.type, user: interaction.user.tag }, 'Received non-command interaction');
        return;
      }

      logger.info(
        {
          commandName: interaction.commandName,
          user: interaction.user.tag,
          guild: interaction.guild?.name,
          interactionId: interaction.id,
        },
        'Processing command'
      );

      try {
        await dispatchCommand(interaction, this.context);
      } catch (error) {
        logger.error(
          { ...formatErrorForLogging(error), commandName: interaction.commandName, user: interaction.user.tag },
          'Error handling command'
        );
        await replyWithError(interaction);
      }
    });
  }

  async login(token: string): Promise<void> {
    try {
      await this.client.login(token);
      logger.info('Successfully logged in to Discord');
    } catch (error) {
      logger.error(formatErrorForLogging(error), 'Failed to login to Discord');
      throw error;
    }
  }

  async destroy(): Promise<void> {
    await this.client.destroy();
  }
}
