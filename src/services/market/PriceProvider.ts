import { createLogger } from '../../lib/logger';
import { TtlSlot } from '../../infrastructure/cache/TtlSlot';
import { RetryingFetcher } from '../../shared/http/RetryingFetcher';
import { TickerResponseSchema } from '../../shared/schemas/api-responses';
import { BaseMarketDataProvider } from './BaseMarketDataProvider';

/**
 * Spot price of one trading pair, taken from the first ticker record's last
 * trade. Price is volatile, so its cache is short-lived.
 */
export class PriceProvider extends BaseMarketDataProvider {
  constructor(
    fetcher: RetryingFetcher,
    cache: TtlSlot<number>,
    private readonly url: string,
    private readonly pairSymbol: string
  ) {
    super(fetcher, cache, createLogger('PriceProvider'), `${pairSymbol} price`);
  }

  async getPrice(): Promise<number | null> {
    return this.read(this.url, TickerResponseSchema, ticker => ticker.data[0].last, {
      symbol: this.pairSymbol,
    });
  }
}
