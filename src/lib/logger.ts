import pino, { LoggerOptions } from 'pino';
import { ValidatedConfiguration } from '../config/validated';
import { Environment } from '../shared/enums';

// Create base logger configuration
const baseConfig: LoggerOptions = {
  level: ValidatedConfiguration.logging.level,
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
};

// Development configuration with pretty printing
const devConfig: LoggerOptions = {
  ...baseConfig,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false, // Allow multi-line for objects
    },
  },
};

// Production configuration (JSON format)
const prodConfig: LoggerOptions = {
  ...baseConfig,
  timestamp: () => `,"time":"${new Date().toISOString()}"`,
};

// Create logger instance based on environment
const logger = pino(ValidatedConfiguration.server.nodeEnv === Environment.PRODUCTION ? prodConfig : devConfig);

// Create child logger with context
export function createLogger(context: string) {
  return logger.child({ context });
}

export type Logger = ReturnType<typeof createLogger>;
export { logger };
