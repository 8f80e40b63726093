import { MessageFlags } from 'discord.js';
import { mock, MockProxy } from 'jest-mock-extended';
import {
  handleMarketCapCommand,
  handleStartCommand,
  replyWithError,
  welcomeMessage,
} from '../../../../src/lib/discord/handlers';
import { dispatchCommand } from '../../../../src/lib/discord/client';
import { MarketCapCalculator } from '../../../../src/services/market';
import { createFakeInteraction } from '../../../helpers/discord';

const GENERIC_ERROR = 'Sorry, there was an error processing your command.';

describe('discord handlers', () => {
  let calculator: MockProxy<MarketCapCalculator>;

  beforeEach(() => {
    calculator = mock<MarketCapCalculator>();
  });

  describe('welcomeMessage', () => {
    it('should name the token twice', () => {
      expect(welcomeMessage('ANDR')).toBe(
        'Welcome to the ANDR Market Cap Bot! 🚀\n\nUse /marketcap to get the current market cap of ANDR.'
      );
    });
  });

  describe('handleStartCommand', () => {
    it('should reply with the welcome text', async () => {
      const { fake, interaction } = createFakeInteraction('start');

      await handleStartCommand(interaction, 'ANDR');

      expect(fake.reply).toHaveBeenCalledWith({ content: welcomeMessage('ANDR') });
    });
  });

  describe('handleMarketCapCommand', () => {
    it('should defer and then edit in the computed market cap', async () => {
      const { fake, interaction } = createFakeInteraction('marketcap');
      calculator.computeMarketCap.mockResolvedValue('ANDR Market Cap: $9,876,000');

      await handleMarketCapCommand(interaction, calculator, 'ANDR');

      expect(fake.deferReply).toHaveBeenCalledTimes(1);
      expect(calculator.computeMarketCap).toHaveBeenCalledWith('ANDR');
      expect(fake.editReply).toHaveBeenCalledWith({ content: 'ANDR Market Cap: $9,876,000' });
    });

    it('should pass the failure message through unchanged', async () => {
      const { fake, interaction } = createFakeInteraction('marketcap');
      calculator.computeMarketCap.mockResolvedValue('Failed to fetch data, please try again later.');

      await handleMarketCapCommand(interaction, calculator, 'ANDR');

      expect(fake.editReply).toHaveBeenCalledWith({ content: 'Failed to fetch data, please try again later.' });
    });

    it('should edit in a generic error when computing throws', async () => {
      const { fake, interaction } = createFakeInteraction('marketcap');
      calculator.computeMarketCap.mockRejectedValue(new Error('boom'));

      await handleMarketCapCommand(interaction, calculator, 'ANDR');

      expect(fake.editReply).toHaveBeenCalledTimes(1);
      expect(fake.editReply).toHaveBeenCalledWith({ content: GENERIC_ERROR });
    });
  });

  describe('replyWithError', () => {
    it('should reply ephemerally when nothing was sent yet', async () => {
      const { fake, interaction } = createFakeInteraction('marketcap');

      await replyWithError(interaction);

      expect(fake.reply).toHaveBeenCalledWith({ content: GENERIC_ERROR, flags: MessageFlags.Ephemeral });
    });

    it('should follow up after a reply', async () => {
      const { fake, interaction } = createFakeInteraction('marketcap', { replied: true });

      await replyWithError(interaction);

      expect(fake.followUp).toHaveBeenCalledWith({ content: GENERIC_ERROR, flags: MessageFlags.Ephemeral });
      expect(fake.reply).not.toHaveBeenCalled();
    });

    it('should not reject when the error reply itself fails', async () => {
      const { fake, interaction } = createFakeInteraction('marketcap');
      fake.reply.mockRejectedValue(new Error('Unknown interaction'));

      await expect(replyWithError(interaction)).resolves.toBeUndefined();
    });
  });

  describe('dispatchCommand', () => {
    it('should route start to the welcome reply', async () => {
      const { fake, interaction } = createFakeInteraction('start');

      await dispatchCommand(interaction, { calculator, tokenSymbol: 'ANDR' });

      expect(fake.reply).toHaveBeenCalledWith({ content: welcomeMessage('ANDR') });
      expect(calculator.computeMarketCap).not.toHaveBeenCalled();
    });

    it('should route marketcap to the calculator', async () => {
      const { fake, interaction } = createFakeInteraction('marketcap');
      calculator.computeMarketCap.mockResolvedValue('ANDR Market Cap: $1');

      await dispatchCommand(interaction, { calculator, tokenSymbol: 'ANDR' });

      expect(fake.editReply).toHaveBeenCalledWith({ content: 'ANDR Market Cap: $1' });
    });

    it('should answer an unknown command ephemerally', async () => {
      const { fake, interaction } = createFakeInteraction('price');

      await dispatchCommand(interaction, { calculator, tokenSymbol: 'ANDR' });

      expect(fake.reply).toHaveBeenCalledWith({ content: 'Unknown command', flags: MessageFlags.Ephemeral });
    });
  });
});
