import { ValidatedConfiguration } from '../../config/validated';
import type { ApplicationConfig } from '../../config/types';
import { TtlSlot } from '../../infrastructure/cache/TtlSlot';
import { RetryingFetcher, RetryingFetcherOptions } from '../../shared/http/RetryingFetcher';
import { retryPolicyFromConfig } from '../../shared/http/RetryPolicy';
import { Clock, systemClock } from '../../utils/clock';
import { MarketCapCalculator } from './MarketCapCalculator';
import { PriceProvider } from './PriceProvider';
import { SupplyProvider } from './SupplyProvider';

export { MarketCapCalculator, MARKET_CAP_UNAVAILABLE_MESSAGE } from './MarketCapCalculator';
export type { MarketCapSnapshot } from './MarketCapCalculator';
export { SupplyProvider } from './SupplyProvider';
export { PriceProvider } from './PriceProvider';

export interface MarketCapDependencies extends Omit<RetryingFetcherOptions, 'policy'> {
  clock?: Clock;
}

/**
 * Wire the market cap pipeline. Call once per process: the two caches created
 * here live as long as the returned calculator.
 */
export function createMarketCapCalculator(
  config: Pick<ApplicationConfig, 'apis' | 'http' | 'cache'> = ValidatedConfiguration,
  dependencies: MarketCapDependencies = {}
): MarketCapCalculator {
  const { clock = systemClock, ...fetcherOptions } = dependencies;
  const policy = retryPolicyFromConfig(config.http);

  const supplyCache = new TtlSlot<number>('circulating-supply', config.cache.supplyTtl * 1000, clock);
  const priceCache = new TtlSlot<number>('spot-price', config.cache.priceTtl * 1000, clock);

  const supplyProvider = new SupplyProvider(
    new RetryingFetcher('SUPPLY_API', { ...fetcherOptions, policy }),
    supplyCache,
    config.apis.supply.url
  );
  const priceProvider = new PriceProvider(
    new RetryingFetcher('PRICE_API', { ...fetcherOptions, policy }),
    priceCache,
    config.apis.price.url,
    config.apis.price.pairSymbol
  );

  return new MarketCapCalculator(supplyProvider, priceProvider);
}
