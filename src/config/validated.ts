/**
 * Type-safe configuration with compile-time validation
 * Using TypeScript's satisfies operator for strict type checking
 */

import { config as dotenvConfig } from 'dotenv';
import { Environment, LogLevel } from '../shared/enums';
import type { ApplicationConfig } from './types';
import { ConfigurationConstraints, isWithinConstraints } from './types';

// Load environment variables before anything below reads them
dotenvConfig();

export const DEFAULT_SUPPLY_API_URL = 'https://api.andromedaprotocol.io/v1/chain/circulating_supply.json';
export const DEFAULT_PRICE_API_URL = 'https://mexc.com/open/api/v2/market/ticker';

/**
 * Parse environment variable as number with validation
 */
export function parseNumber(
  envVar: string | undefined,
  defaultValue: number,
  constraints?: { min: number; max: number }
): number {
  const value = envVar ? Number(envVar) : defaultValue;

  if (isNaN(value)) {
    console.warn(`Invalid number value for environment variable: ${envVar}`);
    return defaultValue;
  }

  if (constraints && !isWithinConstraints(value, constraints)) {
    console.warn(`Value ${value} is outside constraints [${constraints.min}, ${constraints.max}]`);
    return defaultValue;
  }

  return value;
}

/**
 * Parse environment variable as a whole number with validation
 */
export function parseInteger(
  envVar: string | undefined,
  defaultValue: number,
  constraints?: { min: number; max: number }
): number {
  const value = parseNumber(envVar, defaultValue, constraints);

  if (!Number.isInteger(value)) {
    console.warn(`Expected a whole number for environment variable: ${envVar}`);
    return defaultValue;
  }

  return value;
}

/**
 * Parse an HTTP(S) endpoint URL, falling back to the default when malformed
 */
export function parseUrl(envVar: string | undefined, defaultValue: string): string {
  if (!envVar) return defaultValue;

  let parsed: URL;
  try {
    parsed = new URL(envVar);
  } catch (error) {
    console.warn(`Invalid URL: ${envVar} (${error instanceof Error ? error.message : String(error)})`);
    return defaultValue;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    console.warn(`Unsupported URL scheme for ${envVar}, expected http or https`);
    return defaultValue;
  }

  return envVar;
}

/**
 * Validate log level
 */
export function validateLogLevel(level: string): LogLevel {
  const match = Object.values(LogLevel).find(candidate => candidate === level);

  if (match) {
    return match;
  }

  console.warn(`Invalid log level: ${level}, defaulting to 'info'`);
  return LogLevel.INFO;
}

/**
 * Validate environment
 */
export function validateEnvironment(env: string): Environment {
  const match = Object.values(Environment).find(candidate => candidate === env);

  if (match) {
    return match;
  }

  console.warn(`Invalid environment: ${env}, defaulting to 'development'`);
  return Environment.DEVELOPMENT;
}

function optionalString(envVar: string | undefined): string | undefined {
  const trimmed = envVar?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Type-safe validated configuration object
 */
export const ValidatedConfiguration = {
  server: {
    nodeEnv: validateEnvironment(process.env.NODE_ENV ?? 'development'),
  },
  token: {
    symbol: optionalString(process.env.TOKEN_SYMBOL) ?? 'ANDR',
  },
  apis: {
    supply: {
      url: parseUrl(process.env.SUPPLY_API_URL, DEFAULT_SUPPLY_API_URL),
    },
    price: {
      url: parseUrl(process.env.PRICE_API_URL, DEFAULT_PRICE_API_URL),
      pairSymbol: optionalString(process.env.PRICE_SYMBOL) ?? 'ANDR_USDT',
    },
  },
  http: {
    timeout: parseNumber(process.env.HTTP_TIMEOUT, 10000, ConfigurationConstraints.http.timeout),
    maxAttempts: parseInteger(process.env.HTTP_MAX_ATTEMPTS, 3, ConfigurationConstraints.http.maxAttempts),
    backoffFactor: parseNumber(process.env.HTTP_BACKOFF_FACTOR, 500, ConfigurationConstraints.http.backoffFactor),
  },
  cache: {
    supplyTtl: parseNumber(process.env.SUPPLY_CACHE_TTL, 86400, ConfigurationConstraints.cache.supplyTtl),
    priceTtl: parseNumber(process.env.PRICE_CACHE_TTL, 300, ConfigurationConstraints.cache.priceTtl),
  },
  logging: {
    level: validateLogLevel(process.env.LOG_LEVEL ?? 'info'),
  },
  discord: {
    token: optionalString(process.env.DISCORD_BOT_TOKEN),
    guildId: optionalString(process.env.DISCORD_GUILD_ID),
  },
} satisfies ApplicationConfig;
