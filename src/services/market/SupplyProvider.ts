import { createLogger } from '../../lib/logger';
import { TtlSlot } from '../../infrastructure/cache/TtlSlot';
import { RetryingFetcher } from '../../shared/http/RetryingFetcher';
import { CirculatingSupplyResponseSchema } from '../../shared/schemas/api-responses';
import { BaseMarketDataProvider } from './BaseMarketDataProvider';

/**
 * Circulating token supply. The value moves slowly, so a day-old cached
 * figure is served when the endpoint is unreachable.
 */
export class SupplyProvider extends BaseMarketDataProvider {
  constructor(
    fetcher: RetryingFetcher,
    cache: TtlSlot<number>,
    private readonly url: string
  ) {
    super(fetcher, cache, createLogger('SupplyProvider'), 'circulating supply');
  }

  async getCirculatingSupply(): Promise<number | null> {
    return this.read(this.url, CirculatingSupplyResponseSchema, supply => supply);
  }
}
