import { z } from 'zod';
import type { Logger } from '../../lib/logger';
import { TtlSlot } from '../../infrastructure/cache/TtlSlot';
import { RetryingFetcher, QueryParams } from '../../shared/http/RetryingFetcher';
import { ValidationError } from '../../shared/errors';

/**
 * Shared read path for a remote numeric value backed by a single-slot cache:
 * fetch, validate, cache on success, otherwise fall back to the cached value.
 */
export abstract class BaseMarketDataProvider {
  protected constructor(
    protected readonly fetcher: RetryingFetcher,
    protected readonly cache: TtlSlot<number>,
    protected readonly logger: Logger,
    private readonly label: string
  ) {}

  /**
   * @returns The fresh value, the cached value when the fetch fails, or null
   *   when neither is available
   */
  protected async read<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    extract: (parsed: T) => number,
    params?: QueryParams
  ): Promise<number | null> {
    const ticket = this.cache.reserve();
    const result = await this.fetcher.fetch(url, params);

    if (result.ok) {
      const parsed = schema.safeParse(result.data);

      if (parsed.success) {
        const value = extract(parsed.data);
        this.cache.set(value, ticket);
        this.logger.debug({ url, value }, `Fetched ${this.label}`);
        return value;
      }

      this.logger.error(
        { url, reason: ValidationError.fromZodError(parsed.error).message },
        `Failed to parse ${this.label} from response`
      );
    } else {
      this.logger.error({ url, reason: result.error.message }, `Failed to fetch ${this.label}`);
    }

    return this.fallback();
  }

  private fallback(): number | null {
    const cached = this.cache.get();

    if (cached === null) {
      this.logger.error(`No cached ${this.label} available`);
      return null;
    }

    this.logger.warn(
      { value: cached, remainingTtlMs: this.cache.remainingTtl() },
      `Serving cached ${this.label}`
    );
    return cached;
  }
}
