import { mock, MockProxy } from 'jest-mock-extended';
import {
  MarketCapCalculator,
  MARKET_CAP_UNAVAILABLE_MESSAGE,
  PriceProvider,
  SupplyProvider,
  createMarketCapCalculator,
} from '../../../../src/services/market';
import { ManualClock } from '../../../helpers/ManualClock';
import { createStubTransport, deferred, jsonResponse, recordingSleep } from '../../../helpers/http';

describe('MarketCapCalculator', () => {
  let supplyProvider: MockProxy<SupplyProvider>;
  let priceProvider: MockProxy<PriceProvider>;
  let calculator: MarketCapCalculator;

  beforeEach(() => {
    supplyProvider = mock<SupplyProvider>();
    priceProvider = mock<PriceProvider>();
    calculator = new MarketCapCalculator(supplyProvider, priceProvider);
  });

  describe('getMarketCap', () => {
    it('should multiply supply by price', async () => {
      supplyProvider.getCirculatingSupply.mockResolvedValue(1000);
      priceProvider.getPrice.mockResolvedValue(2.5);

      await expect(calculator.getMarketCap()).resolves.toEqual({ supply: 1000, price: 2.5, marketCap: 2500 });
    });

    it('should return null when either input is missing', async () => {
      supplyProvider.getCirculatingSupply.mockResolvedValue(1000);
      priceProvider.getPrice.mockResolvedValue(null);

      await expect(calculator.getMarketCap()).resolves.toBeNull();
    });

    it('should request both inputs before either one arrives', async () => {
      const supply = deferred<number | null>();
      supplyProvider.getCirculatingSupply.mockReturnValue(supply.promise);
      priceProvider.getPrice.mockResolvedValue(2);

      const pending = calculator.getMarketCap();
      expect(supplyProvider.getCirculatingSupply).toHaveBeenCalledTimes(1);
      expect(priceProvider.getPrice).toHaveBeenCalledTimes(1);

      supply.resolve(10);
      await expect(pending).resolves.toEqual({ supply: 10, price: 2, marketCap: 20 });
    });
  });

  describe('computeMarketCap', () => {
    it('should format the product as whole US dollars', async () => {
      supplyProvider.getCirculatingSupply.mockResolvedValue(120000000);
      priceProvider.getPrice.mockResolvedValue(0.0823);

      await expect(calculator.computeMarketCap()).resolves.toBe('$9,876,000');
    });

    it('should prefix the token symbol when given one', async () => {
      supplyProvider.getCirculatingSupply.mockResolvedValue(120000000);
      priceProvider.getPrice.mockResolvedValue(0.0823);

      await expect(calculator.computeMarketCap('ANDR')).resolves.toBe('ANDR Market Cap: $9,876,000');
    });

    it('should round to the nearest dollar', async () => {
      supplyProvider.getCirculatingSupply.mockResolvedValue(3);
      priceProvider.getPrice.mockResolvedValue(0.5);

      await expect(calculator.computeMarketCap()).resolves.toBe('$2');
    });

    it('should report zero supply as $0', async () => {
      supplyProvider.getCirculatingSupply.mockResolvedValue(0);
      priceProvider.getPrice.mockResolvedValue(0.0823);

      await expect(calculator.computeMarketCap()).resolves.toBe('$0');
    });

    it('should return the failure message when supply is unavailable', async () => {
      supplyProvider.getCirculatingSupply.mockResolvedValue(null);
      priceProvider.getPrice.mockResolvedValue(0.0823);

      await expect(calculator.computeMarketCap('ANDR')).resolves.toBe(MARKET_CAP_UNAVAILABLE_MESSAGE);
    });

    it('should return the failure message when price is unavailable', async () => {
      supplyProvider.getCirculatingSupply.mockResolvedValue(120000000);
      priceProvider.getPrice.mockResolvedValue(null);

      await expect(calculator.computeMarketCap()).resolves.toBe(
        'Failed to fetch data, please try again later.'
      );
    });

    it('should return the failure message when a provider throws', async () => {
      supplyProvider.getCirculatingSupply.mockRejectedValue(new Error('boom'));
      priceProvider.getPrice.mockResolvedValue(0.0823);

      await expect(calculator.computeMarketCap()).resolves.toBe(MARKET_CAP_UNAVAILABLE_MESSAGE);
    });
  });
});

describe('createMarketCapCalculator', () => {
  const SUPPLY_URL = 'https://supply.example.test/circulating';
  const PRICE_URL = 'https://prices.example.test/api/ticker';
  const config = {
    apis: {
      supply: { url: SUPPLY_URL },
      price: { url: PRICE_URL, pairSymbol: 'ANDR_USDT' },
    },
    http: { timeout: 10000, maxAttempts: 3, backoffFactor: 500 },
    cache: { supplyTtl: 86400, priceTtl: 300 },
  };

  it('should compute from live data and fall back to cached data until it expires', async () => {
    // Arrange
    const { transport, get } = createStubTransport();
    const sleep = recordingSleep();
    const clock = new ManualClock();
    get.mockImplementation((url: string) =>
      Promise.resolve(
        url === SUPPLY_URL ? jsonResponse(120000000) : jsonResponse({ data: [{ symbol: 'ANDR_USDT', last: '0.0823' }] })
      )
    );
    const calculator = createMarketCapCalculator(config, { transport, sleep, clock });

    // Act & Assert: live
    await expect(calculator.computeMarketCap()).resolves.toBe('$9,876,000');
    await expect(calculator.computeMarketCap()).resolves.toBe('$9,876,000');
    expect(get).toHaveBeenCalledTimes(4);
    expect(get).toHaveBeenCalledWith(PRICE_URL, expect.objectContaining({ params: { symbol: 'ANDR_USDT' } }));
    expect(sleep).not.toHaveBeenCalled();

    // Both endpoints down, both caches warm
    get.mockReset();
    get.mockRejectedValue(new Error('connect ECONNREFUSED'));
    clock.advance(300 * 1000 - 1);
    await expect(calculator.computeMarketCap('ANDR')).resolves.toBe('ANDR Market Cap: $9,876,000');
    expect(get).toHaveBeenCalledTimes(6);
    expect(sleep.mock.calls.map(([ms]) => ms).sort((a, b) => a - b)).toEqual([500, 500, 1000, 1000]);

    // Price cache expired
    clock.advance(1);
    await expect(calculator.computeMarketCap('ANDR')).resolves.toBe(MARKET_CAP_UNAVAILABLE_MESSAGE);
  });
});
