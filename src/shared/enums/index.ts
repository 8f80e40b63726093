/**
 * Centralized enum definitions for commonly used string literals
 */

// Log levels
export enum LogLevel {
  TRACE = 'trace',
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

// Environment types
export enum Environment {
  DEVELOPMENT = 'development',
  STAGING = 'staging',
  PRODUCTION = 'production',
  TEST = 'test',
}

// Slash command names
export enum BotCommand {
  START = 'start',
  MARKET_CAP = 'marketcap',
}
