/**
 * Configuration type definitions with strict validation
 * Using TypeScript's satisfies operator for compile-time validation
 */

import { Environment, LogLevel } from '../shared/enums';

/**
 * Server configuration interface
 */
export interface ServerConfig {
  readonly nodeEnv: Environment;
}

/**
 * Token being reported on
 */
export interface TokenConfig {
  readonly symbol: string;
}

/**
 * API endpoint configuration
 */
export interface ApiEndpointConfig {
  readonly url: string;
}

/**
 * Spot price endpoint, queried for one trading pair
 */
export interface PriceApiConfig extends ApiEndpointConfig {
  readonly pairSymbol: string;
}

/**
 * APIs configuration interface
 */
export interface ApisConfig {
  readonly supply: ApiEndpointConfig;
  readonly price: PriceApiConfig;
}

/**
 * HTTP client configuration interface
 */
export interface HttpConfig {
  readonly timeout: number;
  readonly maxAttempts: number;
  readonly backoffFactor: number;
}

/**
 * Cache lifetimes, in seconds
 */
export interface CacheConfig {
  readonly supplyTtl: number;
  readonly priceTtl: number;
}

export interface LoggingConfig {
  readonly level: LogLevel;
}

export interface DiscordConfig {
  readonly token: string | undefined;
  readonly guildId: string | undefined;
}

/**
 * Complete application configuration interface
 */
export interface ApplicationConfig {
  readonly server: ServerConfig;
  readonly token: TokenConfig;
  readonly apis: ApisConfig;
  readonly http: HttpConfig;
  readonly cache: CacheConfig;
  readonly logging: LoggingConfig;
  readonly discord: DiscordConfig;
}

/**
 * Configuration constraints for validation
 */
export const ConfigurationConstraints = {
  http: {
    timeout: { min: 1000, max: 120000 }, // 1s to 2min
    maxAttempts: { min: 1, max: 10 },
    backoffFactor: { min: 0, max: 60000 }, // up to 1min
  },
  cache: {
    supplyTtl: { min: 1, max: 7 * 86400 }, // up to a week
    priceTtl: { min: 1, max: 86400 }, // up to a day
  },
} as const;

/**
 * Type guard to check if a value is within numeric constraints
 */
export function isWithinConstraints(value: number, constraints: { min: number; max: number }): boolean {
  return value >= constraints.min && value <= constraints.max;
}
