import { createLogger } from '../../lib/logger';
import { formatErrorForLogging } from '../../shared/errors';
import { formatUsd } from '../../utils/format';
import { SupplyProvider } from './SupplyProvider';
import { PriceProvider } from './PriceProvider';

const logger = createLogger('MarketCapCalculator');

export const MARKET_CAP_UNAVAILABLE_MESSAGE = 'Failed to fetch data, please try again later.';

export interface MarketCapSnapshot {
  supply: number;
  price: number;
  marketCap: number;
}

/**
 * Market capitalization = circulating supply x spot price.
 * Retries live in the fetcher; a failure seen here is final for the call.
 */
export class MarketCapCalculator {
  constructor(
    private readonly supplyProvider: SupplyProvider,
    private readonly priceProvider: PriceProvider
  ) {}

  /**
   * @returns Both inputs and their product, or null if either input is unavailable
   */
  async getMarketCap(): Promise<MarketCapSnapshot | null> {
    const [supply, price] = await Promise.all([
      this.supplyProvider.getCirculatingSupply(),
      this.priceProvider.getPrice(),
    ]);

    if (supply === null || price === null) {
      logger.error(
        { supplyAvailable: supply !== null, priceAvailable: price !== null },
        'Market cap inputs unavailable'
      );
      return null;
    }

    return { supply, price, marketCap: supply * price };
  }

  /**
   * Formatted market cap such as `$9,876,000`, or the user-facing failure
   * message. Never rejects.
   * @param tokenSymbol When given, success reads `ANDR Market Cap: $9,876,000`
   */
  async computeMarketCap(tokenSymbol?: string): Promise<string> {
    try {
      const snapshot = await this.getMarketCap();

      if (!snapshot) {
        return MARKET_CAP_UNAVAILABLE_MESSAGE;
      }

      const formatted = formatUsd(snapshot.marketCap);
      logger.info({ ...snapshot, formatted }, 'Computed market cap');
      return tokenSymbol ? `${tokenSymbol} Market Cap: ${formatted}` : formatted;
    } catch (error) {
      logger.error(formatErrorForLogging(error), 'Unexpected error computing market cap');
      return MARKET_CAP_UNAVAILABLE_MESSAGE;
    }
  }
}
