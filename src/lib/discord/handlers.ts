import { ChatInputCommandInteraction, MessageFlags } from 'discord.js';
import { createLogger } from '../logger';
import { formatErrorForLogging } from '../../shared/errors';
import { MarketCapCalculator } from '../../services/market';

const logger = createLogger('discord-handlers');

const GENERIC_ERROR_MESSAGE = 'Sorry, there was an error processing your command.';

export function welcomeMessage(tokenSymbol: string): string {
  return (
    `Welcome to the ${tokenSymbol} Market Cap Bot! 🚀\n\n` +
    `Use /marketcap to get the current market cap of ${tokenSymbol}.`
  );
}

export async function handleStartCommand(interaction: ChatInputCommandInteraction, tokenSymbol: string): Promise<void> {
  await interaction.reply({ content: welcomeMessage(tokenSymbol) });
}

export async function handleMarketCapCommand(
  interaction: ChatInputCommandInteraction,
  calculator: MarketCapCalculator,
  tokenSymbol: string
): Promise<void> {
  try {
    // Upstream retries can take several seconds, longer than Discord's reply window
    await interaction.deferReply();

    const content = await calculator.computeMarketCap(tokenSymbol);
    await interaction.editReply({ content });

    logger.info({ user: interaction.user.tag, content }, 'Sent market cap reply');
  } catch (error) {
    logger.error(
      {
        ...formatErrorForLogging(error),
        interaction: {
          id: interaction.id,
          commandName: interaction.commandName,
          user: interaction.user.tag,
        },
      },
      'Error handling marketcap command'
    );
    await replyWithError(interaction);
  }
}

/**
 * Tell the user something went wrong, whatever state the interaction is in
 */
export async function replyWithError(interaction: ChatInputCommandInteraction): Promise<void> {
  try {
    if (interaction.deferred) {
      await interaction.editReply({ content: GENERIC_ERROR_MESSAGE });
    } else if (interaction.replied) {
      await interaction.followUp({ content: GENERIC_ERROR_MESSAGE, flags: MessageFlags.Ephemeral });
    } else {
      await interaction.reply({ content: GENERIC_ERROR_MESSAGE, flags: MessageFlags.Ephemeral });
    }
  } catch (followupError) {
    logger.error(
      { ...formatErrorForLogging(followupError), commandName: interaction.commandName },
      'Error sending error response'
    );
  }
}
