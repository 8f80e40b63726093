import { createLogger } from '../../lib/logger';
import { Clock, systemClock } from '../../utils/clock';

const logger = createLogger('TtlSlot');

interface CacheEntry<T> {
  value: T;
  expiry: number;
  ticket: number;
}

/**
 * Single-slot in-memory cache with a fixed time-to-live.
 * Only the most recent value is kept; it stays readable until its expiry and
 * is never evicted early.
 */
export class TtlSlot<T> {
  private entry: CacheEntry<T> | null = null;
  private lastTicket = 0;

  /**
   * @param name Label used in log lines
   * @param ttlMs Lifetime of each written value in milliseconds
   * @param clock Time source, replaceable in tests
   */
  constructor(
    private readonly name: string,
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Get the cached value
   * @returns The value, or null if nothing was written or it has expired
   */
  get(): T | null {
    if (!this.entry) {
      return null;
    }

    if (this.clock.now() >= this.entry.expiry) {
      return null;
    }

    return this.entry.value;
  }

  /**
   * Reserve a write ticket before starting the request whose result will be
   * cached. Tickets increase strictly, in the order requests start.
   */
  reserve(): number {
    this.lastTicket += 1;
    return this.lastTicket;
  }

  /**
   * Replace the cached value with a fresh expiry.
   *
   * A value carrying a ticket older than the cached one is dropped, so a slow
   * response that lands late cannot overwrite a newer one. The check and the
   * write happen in one synchronous step.
   *
   * @param ticket From `reserve()`; omitted for an unconditional write
   * @returns Whether the value was stored
   */
  set(value: T, ticket: number = this.reserve()): boolean {
    if (this.entry && ticket < this.entry.ticket) {
      logger.debug(
        { cache: this.name, ticket, currentTicket: this.entry.ticket },
        'Ignoring cache write from an older request'
      );
      return false;
    }

    const now = this.clock.now();
    this.entry = {
      value,
      expiry: now + this.ttlMs,
      ticket,
    };

    logger.debug({ cache: this.name, expiresAt: new Date(this.entry.expiry).toISOString() }, 'Cache updated');
    return true;
  }

  /**
   * Milliseconds until the current value expires, or 0 when absent
   */
  remainingTtl(): number {
    if (!this.entry) {
      return 0;
    }
    return Math.max(0, this.entry.expiry - this.clock.now());
  }
}
