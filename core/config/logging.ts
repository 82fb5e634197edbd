import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // File output, only used when OS_STRINGS_LOG_DIR is set
  files: {
    mainLog: 'os-strings.log',
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  defaultLevel: 'error',

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    strings: {
      level: 'error'
    },
    path: {
      level: 'error'
    }
  }
} as const;

export type LoggingService = keyof typeof loggingConfig.services;
