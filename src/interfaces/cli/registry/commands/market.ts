import { Command } from 'commander';
import { ValidatedConfiguration as Configuration } from '../../../../config/validated';
import { createMarketCapCalculator, MarketCapCalculator, MARKET_CAP_UNAVAILABLE_MESSAGE } from '../../../../services/market';

export function registerMarketCommands(
  program: Command,
  calculatorFactory: () => MarketCapCalculator = () => createMarketCapCalculator()
) {
  program
    .command('marketcap')
    .description('Fetch supply and price once and print the market cap')
    .option('--json', 'Print supply, price and market cap as JSON')
    .action(async (options: { json?: boolean }) => {
      const calculator = calculatorFactory();

      if (!options.json) {
        process.stdout.write(`${await calculator.computeMarketCap(Configuration.token.symbol)}\n`);
        return;
      }

      const snapshot = await calculator.getMarketCap();
      if (!snapshot) {
        process.stderr.write(`${MARKET_CAP_UNAVAILABLE_MESSAGE}\n`);
        process.exitCode = 1;
        return;
      }

      process.stdout.write(`${JSON.stringify({ token: Configuration.token.symbol, ...snapshot })}\n`);
    });
}
