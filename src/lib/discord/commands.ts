import { SlashCommandBuilder } from 'discord.js';
import { ValidatedConfiguration as Configuration } from '../../config/validated';
import { BotCommand } from '../../shared/enums';

export function buildCommands(tokenSymbol: string = Configuration.token.symbol) {
  return [
    new SlashCommandBuilder().setName(BotCommand.START).setDescription(`How to use the ${tokenSymbol} market cap bot`),
    new SlashCommandBuilder()
      .setName(BotCommand.MARKET_CAP)
      .setDescription(`Show the current market cap of ${tokenSymbol}`),
  ];
}

export const commands = buildCommands();
